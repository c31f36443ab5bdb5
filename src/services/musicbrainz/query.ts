/**
 * MusicBrainz search query helpers
 */

export type QueryField = 'recording' | 'artist' | 'release';

/**
 * Build a fielded search query such as `recording:Creep artist:Radiohead`.
 *
 * Values are inserted as given, without Lucene escaping; the whole query is
 * URL-escaped when it is sent as the `query` parameter.
 */
export function buildFieldQuery(fields: ReadonlyArray<readonly [QueryField, string]>): string {
  return fields.map(([field, value]) => `${field}:${value}`).join(' ');
}
