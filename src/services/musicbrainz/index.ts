import { initializeLogger } from '../../utils/logging.js';
import type { Artist, MBID, Recording, RecordingTags, Release } from '../../types/musicbrainz.js';
import { MusicBrainzClient, type RequestOptions } from './MusicBrainzClient.js';

export {
  MusicBrainzClient,
  type MusicBrainzClientOptions,
  type RequestOptions,
} from './MusicBrainzClient.js';
export { buildFieldQuery, type QueryField } from './query.js';

let defaultClient: MusicBrainzClient | undefined;

/**
 * Process-wide client built from ConfigManager settings on first use
 */
export function getDefaultClient(): MusicBrainzClient {
  if (!defaultClient) {
    initializeLogger();
    defaultClient = new MusicBrainzClient();
  }
  return defaultClient;
}

/**
 * Replace the process-wide client, or clear it so the next call rebuilds it
 */
export function setDefaultClient(client: MusicBrainzClient | undefined): void {
  defaultClient = client;
}

export function searchArtists(name: string, limit: number, options?: RequestOptions): Promise<Artist[]> {
  return getDefaultClient().searchArtists(name, limit, options);
}

export function getArtistById(id: MBID, options?: RequestOptions): Promise<Artist> {
  return getDefaultClient().getArtistById(id, options);
}

export function searchReleases(title: string, limit: number, options?: RequestOptions): Promise<Release[]> {
  return getDefaultClient().searchReleases(title, limit, options);
}

export function getReleaseById(id: MBID, options?: RequestOptions): Promise<Release> {
  return getDefaultClient().getReleaseById(id, options);
}

export function searchRecordings(
  title: string,
  limit: number,
  options?: RequestOptions
): Promise<Recording[]> {
  return getDefaultClient().searchRecordings(title, limit, options);
}

export function getRecordingById(id: MBID, options?: RequestOptions): Promise<Recording> {
  return getDefaultClient().getRecordingById(id, options);
}

export function searchRecordingsByTitleAndArtist(
  title: string,
  artist: string,
  options?: RequestOptions
): Promise<Recording[]> {
  return getDefaultClient().searchRecordingsByTitleAndArtist(title, artist, options);
}

export function getTagsByTitleAndArtistAndAlbum(
  title: string,
  artist: string,
  album: string,
  options?: RequestOptions
): Promise<RecordingTags> {
  return getDefaultClient().getTagsByTitleAndArtistAndAlbum(title, artist, album, options);
}

export function getRecordingByIdWithTags(id: MBID, options?: RequestOptions): Promise<Recording> {
  return getDefaultClient().getRecordingByIdWithTags(id, options);
}
