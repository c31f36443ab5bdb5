import { z } from 'zod';
import type {
  Alias,
  Artist,
  ArtistCredit,
  ArtistName,
  CoverArtURL,
  GBImage,
  Recording,
  Relation,
  Release,
  ReleaseGroup,
  Tag,
  TextRepresentation,
} from '../types/musicbrainz.js';

/**
 * MusicBrainz Decoding Schemas
 *
 * Zod schemas mapping MusicBrainz JSON onto the entity types. Each object
 * schema lists the wire keys it reads; `.transform` renames them to the
 * entity's property names. Missing or null fields decode to zero values,
 * fields of the wrong JSON type fail the parse.
 */

type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const text = z.string().nullish().transform((value) => value ?? '');
const integer = z.number().nullish().transform((value) => value ?? 0);
const flag = z.boolean().nullish().transform((value) => value ?? false);

function list<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value): z.output<T>[] => value ?? []);
}

// JSON null where an entity belongs decodes like {}: every field takes its zero value
function entity<T>(schema: Decoder<T>): Decoder<T> {
  return z.preprocess((value) => value ?? {}, schema);
}

function single<T>(schema: Decoder<T>, zero: () => T) {
  return schema.nullish().transform((value) => value ?? zero());
}

// The service sends `area` as { name } and relation `url` as { resource }
const areaField = z
  .union([z.string(), z.object({ name: text })])
  .nullish()
  .transform((value): string => {
    if (value === null || value === undefined) return '';
    return typeof value === 'string' ? value : value.name;
  });

const urlField = z
  .union([z.string(), z.object({ resource: text })])
  .nullish()
  .transform((value): string => {
    if (value === null || value === undefined) return '';
    return typeof value === 'string' ? value : value.resource;
  });

export function emptyArtist(): Artist {
  return {
    id: '',
    name: '',
    sortName: '',
    type: '',
    country: '',
    area: '',
    beginDate: '',
    endDate: '',
    disambiguation: '',
    aliases: [],
    relations: [],
    tags: [],
  };
}

// ============================================
// Shared records
// ============================================

export const tagSchema: Decoder<Tag> = entity(
  z.object({
    name: text,
  })
);

export const aliasSchema: Decoder<Alias> = entity(
  z.object({
    name: text,
    type: text,
  })
);

export const relationSchema: Decoder<Relation> = entity(
  z.lazy(() =>
    z.object({
      type: text,
      url: urlField,
      artist: single(artistSchema, emptyArtist),
    })
  )
);

// ============================================
// Artist
// ============================================

export const artistSchema: Decoder<Artist> = entity(
  z
    .object({
      id: text,
      name: text,
      'sort-name': text,
      type: text,
      country: text,
      area: areaField,
      begin_date: text,
      end_date: text,
      disambiguation: text,
      aliases: list(aliasSchema),
      relations: list(relationSchema),
      tags: list(tagSchema),
    })
    .transform((wire) => ({
      id: wire.id,
      name: wire.name,
      sortName: wire['sort-name'],
      type: wire.type,
      country: wire.country,
      area: wire.area,
      beginDate: wire.begin_date,
      endDate: wire.end_date,
      disambiguation: wire.disambiguation,
      aliases: wire.aliases,
      relations: wire.relations,
      tags: wire.tags,
    }))
);

// ============================================
// Release
// ============================================

export const textRepresentationSchema: Decoder<TextRepresentation> = entity(
  z.object({
    language: text,
    script: text,
  })
);

export const artistCreditSchema: Decoder<ArtistCredit> = entity(
  z.object({
    name: text,
  })
);

export const releaseGroupSchema: Decoder<ReleaseGroup> = entity(
  z.object({
    id: text,
    type: text,
  })
);

export const imageSchema: Decoder<GBImage> = entity(
  z
    .object({
      image: text,
      types: list(text),
    })
    .transform((wire) => ({
      imageUrl: wire.image,
      types: wire.types,
    }))
);

export const coverArtSchema: Decoder<CoverArtURL> = entity(
  z.object({
    artwork: flag,
    front: flag,
    back: flag,
    count: integer,
    images: list(imageSchema),
  })
);

// Lookups send a single summary object, older payloads a list of them
const coverArtList = z
  .union([z.array(coverArtSchema), coverArtSchema])
  .nullish()
  .transform((value): CoverArtURL[] => {
    if (value === null || value === undefined) return [];
    return Array.isArray(value) ? value : [value];
  });

export const releaseSchema: Decoder<Release> = entity(
  z
    .object({
      id: text,
      title: text,
      status: text,
      'text-representation': single(textRepresentationSchema, () => ({ language: '', script: '' })),
      'artist-credit': list(artistCreditSchema),
      'release-group': single(releaseGroupSchema, () => ({ id: '', type: '' })),
      relations: list(relationSchema),
      tags: list(tagSchema),
      'cover-art-archive': coverArtList,
    })
    .transform((wire) => ({
      id: wire.id,
      title: wire.title,
      status: wire.status,
      textRepresentation: wire['text-representation'],
      artistCredit: wire['artist-credit'],
      releaseGroup: wire['release-group'],
      relations: wire.relations,
      tags: wire.tags,
      coverArt: wire['cover-art-archive'],
    }))
);

// ============================================
// Recording
// ============================================

export const artistNameSchema: Decoder<ArtistName> = entity(
  z.object({
    name: text,
  })
);

export const recordingSchema: Decoder<Recording> = entity(
  z
    .object({
      id: text,
      title: text,
      length: integer,
      'first-release-date': text,
      relations: list(relationSchema),
      tags: list(tagSchema),
      'artist-credit': list(artistNameSchema),
      releases: list(releaseSchema),
    })
    .transform((wire) => ({
      id: wire.id,
      title: wire.title,
      length: wire.length,
      firstReleaseDate: wire['first-release-date'],
      relations: wire.relations,
      tags: wire.tags,
      artistCredit: wire['artist-credit'],
      releases: wire.releases,
    }))
);

// ============================================
// Search envelopes
// ============================================

export const artistsEnvelopeSchema: Decoder<Artist[]> = entity(
  z
    .object({ artists: list(artistSchema) })
    .transform((envelope) => envelope.artists)
);

export const releasesEnvelopeSchema: Decoder<Release[]> = entity(
  z
    .object({ releases: list(releaseSchema) })
    .transform((envelope) => envelope.releases)
);

export const recordingsEnvelopeSchema: Decoder<Recording[]> = entity(
  z
    .object({ recordings: list(recordingSchema) })
    .transform((envelope) => envelope.recordings)
);

export type { Decoder };
