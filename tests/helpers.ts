/**
 * MusicBrainz test helpers
 */

import { MusicBrainzClient, type MusicBrainzClientOptions } from '../src/services/musicbrainz/MusicBrainzClient.js';

export const TEST_ORIGIN = 'https://mb.example.test';
export const TEST_BASE_URL = `${TEST_ORIGIN}/ws/2/`;

export function createTestClient(overrides: MusicBrainzClientOptions = {}): MusicBrainzClient {
  return new MusicBrainzClient({
    baseUrl: TEST_BASE_URL,
    appName: 'test-app',
    appVersion: '0.0.1',
    ...overrides,
  });
}

export const artistWire = {
  id: 'a74b1b7f-71a5-4011-9441-d0b5e4122711',
  name: 'Radiohead',
  'sort-name': 'Radiohead',
  type: 'Group',
  country: 'GB',
  area: 'United Kingdom',
  begin_date: '1985',
  end_date: '',
  disambiguation: 'UK rock band',
  aliases: [{ name: 'On A Friday', type: 'Artist name' }],
  relations: [
    {
      type: 'member of band',
      url: '',
      artist: { id: 'thom-mbid', name: 'Thom Yorke' },
    },
  ],
  tags: [{ name: 'rock' }, { name: 'art rock' }],
};

export const releaseWire = {
  id: 'release-mbid-1',
  title: 'OK Computer',
  status: 'Official',
  'text-representation': { language: 'eng', script: 'Latn' },
  'artist-credit': [{ name: 'Radiohead' }],
  'release-group': { id: 'rg-mbid-1', type: 'Album' },
  relations: [],
  tags: [{ name: 'alternative rock' }],
  'cover-art-archive': [
    {
      artwork: true,
      front: true,
      back: false,
      count: 1,
      images: [{ image: 'https://coverart.example.test/front.jpg', types: ['Front'] }],
    },
  ],
};

export const recordingWire = {
  id: 'recording-mbid-1',
  title: 'Paranoid Android',
  length: 383000,
  'first-release-date': '1997-05-26',
  relations: [],
  tags: [{ name: 'progressive rock' }],
  'artist-credit': [{ name: 'Radiohead' }],
  releases: [{ id: 'release-mbid-1', title: 'OK Computer' }],
};
