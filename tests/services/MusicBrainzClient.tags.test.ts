/**
 * Strict title/artist/album tag lookup
 */

import { describe, it, expect } from '@jest/globals';
import nock from 'nock';
import { MatchNotFoundError, TransportError } from '../../src/errors/index.js';
import { TEST_ORIGIN, createTestClient } from '../helpers.js';

const SEARCH_QUERY = {
  query: 'recording:Creep artist:Radiohead release:Pablo Honey',
  limit: '1',
  fmt: 'json',
};

describe('MusicBrainzClient.getTagsByTitleAndArtistAndAlbum', () => {
  it('should return tags and first release date of the single match', async () => {
    const scope = nock(TEST_ORIGIN)
      .get('/ws/2/recording/')
      .query(SEARCH_QUERY)
      .reply(200, { count: 1, recordings: [{ id: 'creep-mbid', title: 'Creep', score: 100 }] })
      .get('/ws/2/recording/creep-mbid')
      .query({ fmt: 'json' })
      .reply(200, {
        id: 'creep-mbid',
        title: 'Creep',
        'first-release-date': '1992-09-21',
        tags: [
          { name: 'alternative rock', count: 4 },
          { name: 'grunge', count: 1 },
        ],
      });

    const result = await createTestClient().getTagsByTitleAndArtistAndAlbum(
      'Creep',
      'Radiohead',
      'Pablo Honey'
    );

    expect(result).toEqual({
      tags: [{ name: 'alternative rock' }, { name: 'grunge' }],
      releaseDate: '1992-09-21',
    });
    expect(scope.isDone()).toBe(true);
  });

  it('should return empty tags when the recording has none', async () => {
    nock(TEST_ORIGIN)
      .get('/ws/2/recording/')
      .query(SEARCH_QUERY)
      .reply(200, { recordings: [{ id: 'creep-mbid' }] })
      .get('/ws/2/recording/creep-mbid')
      .query({ fmt: 'json' })
      .reply(200, { id: 'creep-mbid' });

    const result = await createTestClient().getTagsByTitleAndArtistAndAlbum(
      'Creep',
      'Radiohead',
      'Pablo Honey'
    );

    expect(result).toEqual({ tags: [], releaseDate: '' });
  });

  it('should throw MatchNotFoundError when nothing matches', async () => {
    const scope = nock(TEST_ORIGIN)
      .get('/ws/2/recording/')
      .query(SEARCH_QUERY)
      .reply(200, { count: 0, recordings: [] })
      .get('/ws/2/recording/creep-mbid')
      .query(true)
      .reply(200, { id: 'creep-mbid' });

    const error = await createTestClient()
      .getTagsByTitleAndArtistAndAlbum('Creep', 'Radiohead', 'Pablo Honey')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MatchNotFoundError);
    expect(error).toMatchObject({
      matchCount: 0,
      query: 'recording:Creep artist:Radiohead release:Pablo Honey',
      statusCode: 404,
    });
    // No lookup by id after a failed match
    expect(scope.pendingMocks()).toHaveLength(1);
  });

  it('should throw MatchNotFoundError when more than one recording matches', async () => {
    const scope = nock(TEST_ORIGIN)
      .get('/ws/2/recording/')
      .query(SEARCH_QUERY)
      .reply(200, {
        recordings: [
          { id: 'creep-mbid', title: 'Creep' },
          { id: 'creep-acoustic-mbid', title: 'Creep (acoustic)' },
        ],
      })
      .get('/ws/2/recording/creep-mbid')
      .query(true)
      .reply(200, { id: 'creep-mbid' });

    const error = await createTestClient()
      .getTagsByTitleAndArtistAndAlbum('Creep', 'Radiohead', 'Pablo Honey')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MatchNotFoundError);
    expect(error).toMatchObject({ matchCount: 2 });
    expect(scope.pendingMocks()).toHaveLength(1);
  });

  it('should propagate a failure of the lookup by id', async () => {
    nock(TEST_ORIGIN)
      .get('/ws/2/recording/')
      .query(SEARCH_QUERY)
      .reply(200, { recordings: [{ id: 'creep-mbid' }] })
      .get('/ws/2/recording/creep-mbid')
      .query({ fmt: 'json' })
      .replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });

    await expect(
      createTestClient().getTagsByTitleAndArtistAndAlbum('Creep', 'Radiohead', 'Pablo Honey')
    ).rejects.toBeInstanceOf(TransportError);
  });
});
