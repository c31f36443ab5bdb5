/**
 * MusicBrainz decoding schema tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  artistSchema,
  emptyArtist,
  recordingSchema,
  recordingsEnvelopeSchema,
  releaseSchema,
} from '../../src/validation/musicbrainzSchemas.js';

describe('musicbrainzSchemas', () => {
  describe('artistSchema', () => {
    it('should decode an empty object to the zero artist', () => {
      expect(artistSchema.parse({})).toEqual(emptyArtist());
    });

    it('should treat null fields as absent', () => {
      const artist = artistSchema.parse({ id: 'a', name: null, aliases: null, tags: null });

      expect(artist).toEqual({ ...emptyArtist(), id: 'a' });
    });

    it('should flatten an area object to its name', () => {
      const artist = artistSchema.parse({ area: { id: 'area-1', name: 'Iceland', type: 'Country' } });

      expect(artist.area).toBe('Iceland');
    });

    it('should flatten a relation url object to its resource', () => {
      const artist = artistSchema.parse({
        relations: [{ type: 'official homepage', url: { id: 'url-1', resource: 'https://band.example.test/' } }],
      });

      expect(artist.relations).toEqual([
        { type: 'official homepage', url: 'https://band.example.test/', artist: emptyArtist() },
      ]);
    });

    it('should decode nested artists inside relations', () => {
      const artist = artistSchema.parse({
        relations: [
          {
            type: 'member of band',
            artist: { name: 'Jonny Greenwood', relations: [{ type: 'collaboration', artist: { name: 'Shye Ben Tzur' } }] },
          },
        ],
      });

      expect(artist.relations[0]?.artist.name).toBe('Jonny Greenwood');
      expect(artist.relations[0]?.artist.relations[0]?.artist.name).toBe('Shye Ben Tzur');
    });

    it('should ignore keys outside the mapping', () => {
      const artist = artistSchema.parse({ id: 'a', score: 100, 'life-span': { begin: '1985' } });

      expect(artist).toEqual({ ...emptyArtist(), id: 'a' });
    });

    it('should reject a field of the wrong type', () => {
      const result = artistSchema.safeParse({ aliases: 'On A Friday' });

      expect(result.success).toBe(false);
    });
  });

  describe('releaseSchema', () => {
    it('should decode missing nested objects to zero values', () => {
      expect(releaseSchema.parse({ id: 'r' })).toEqual({
        id: 'r',
        title: '',
        status: '',
        textRepresentation: { language: '', script: '' },
        artistCredit: [],
        releaseGroup: { id: '', type: '' },
        relations: [],
        tags: [],
        coverArt: [],
      });
    });

    it('should rename image to imageUrl', () => {
      const release = releaseSchema.parse({
        'cover-art-archive': [{ images: [{ image: 'https://coverart.example.test/1.jpg', types: ['Front', 'Booklet'] }] }],
      });

      expect(release.coverArt[0]?.images).toEqual([
        { imageUrl: 'https://coverart.example.test/1.jpg', types: ['Front', 'Booklet'] },
      ]);
    });
  });

  describe('recordingSchema', () => {
    it('should keep artist credits as ArtistName records', () => {
      const recording = recordingSchema.parse({
        'artist-credit': [{ name: 'Radiohead', joinphrase: '', artist: { id: 'a', name: 'Radiohead' } }],
      });

      expect(recording.artistCredit).toEqual([{ name: 'Radiohead' }]);
    });

    it('should treat a null length as zero', () => {
      expect(recordingSchema.parse({ length: null }).length).toBe(0);
    });
  });

  describe('null entities', () => {
    it('should decode a null artist body as the empty artist', () => {
      expect(artistSchema.parse(null)).toEqual(emptyArtist());
    });

    it('should decode null list elements inside an entity', () => {
      const artist = artistSchema.parse({ id: 'a', tags: [null, { name: 'rock' }] });

      expect(artist.tags).toEqual([{ name: '' }, { name: 'rock' }]);
    });
  });

  describe('recordingsEnvelopeSchema', () => {
    it('should unwrap the recordings array', () => {
      const recordings = recordingsEnvelopeSchema.parse({
        recordings: [{ id: 'one' }, { id: 'two' }],
      });

      expect(recordings.map((recording) => recording.id)).toEqual(['one', 'two']);
    });

    it('should reject a non-object envelope', () => {
      expect(recordingsEnvelopeSchema.safeParse(['one']).success).toBe(false);
      expect(recordingsEnvelopeSchema.safeParse('recordings').success).toBe(false);
    });

    it('should decode a null envelope as an empty list', () => {
      expect(recordingsEnvelopeSchema.parse(null)).toEqual([]);
    });

    it('should decode null elements as zero-valued recordings', () => {
      const recordings = recordingsEnvelopeSchema.parse({ recordings: [{ id: 'one' }, null] });

      expect(recordings).toHaveLength(2);
      expect(recordings[1]).toEqual({
        id: '',
        title: '',
        length: 0,
        firstReleaseDate: '',
        relations: [],
        tags: [],
        artistCredit: [],
        releases: [],
      });
    });
  });
});
