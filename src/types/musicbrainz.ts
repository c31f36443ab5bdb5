/**
 * MusicBrainz entity types
 *
 * Read-only projections of the MusicBrainz API v2 JSON. Every property is
 * always present once decoded; fields the service omitted hold their zero
 * value ('' / 0 / false / []).
 *
 * @see https://musicbrainz.org/doc/MusicBrainz_API
 */

/** MusicBrainz identifier, treated as an opaque string */
export type MBID = string;

export interface Tag {
  name: string;
}

export interface Alias {
  name: string;
  type: string;
}

/**
 * Generic relationship record, shared by artists, releases and recordings
 */
export interface Relation {
  type: string;
  url: string;
  artist: Artist;
}

export interface Artist {
  id: MBID;
  name: string;
  sortName: string;
  type: string;
  country: string;
  area: string;
  beginDate: string;
  endDate: string;
  disambiguation: string;
  aliases: Alias[];
  relations: Relation[];
  tags: Tag[];
}

export interface TextRepresentation {
  language: string;
  script: string;
}

/** Artist credit as it appears on a release */
export interface ArtistCredit {
  name: string;
}

/** Artist credit as it appears on a recording */
export interface ArtistName {
  name: string;
}

export interface ReleaseGroup {
  id: MBID;
  type: string;
}

export interface GBImage {
  imageUrl: string;
  types: string[];
}

/** Cover Art Archive summary attached to a release */
export interface CoverArtURL {
  artwork: boolean;
  front: boolean;
  back: boolean;
  count: number;
  images: GBImage[];
}

export interface Release {
  id: MBID;
  title: string;
  status: string;
  textRepresentation: TextRepresentation;
  artistCredit: ArtistCredit[];
  releaseGroup: ReleaseGroup;
  relations: Relation[];
  tags: Tag[];
  coverArt: CoverArtURL[];
}

export interface Recording {
  id: MBID;
  title: string;
  /** Duration in milliseconds */
  length: number;
  firstReleaseDate: string;
  relations: Relation[];
  tags: Tag[];
  artistCredit: ArtistName[];
  releases: Release[];
}

/** Result of the strict title/artist/album tag lookup */
export interface RecordingTags {
  tags: Tag[];
  releaseDate: string;
}

export type EnvelopeKey = 'artists' | 'releases' | 'recordings';
