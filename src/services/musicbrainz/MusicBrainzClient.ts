/**
 * MusicBrainz API Client
 *
 * Thin client for the MusicBrainz web service v2. Every public method
 * performs a single GET (the strict tag lookup performs two in sequence)
 * and decodes the JSON body into entity types. Nothing is cached or retried.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { logger } from '../../utils/logging.js';
import { getErrorMessage, isDnsError, isTimeoutError, toError } from '../../utils/errorHandling.js';
import { ConfigManager } from '../../config/ConfigManager.js';
import {
  ApplicationError,
  DecodeError,
  ErrorCode,
  MatchNotFoundError,
  ProviderServerError,
  RateLimitError,
  RequestCancelledError,
  TimeoutError,
  TransportError,
  type ErrorContext,
} from '../../errors/index.js';
import {
  artistSchema,
  artistsEnvelopeSchema,
  recordingSchema,
  recordingsEnvelopeSchema,
  releaseSchema,
  releasesEnvelopeSchema,
  type Decoder,
} from '../../validation/musicbrainzSchemas.js';
import type {
  Artist,
  MBID,
  Recording,
  RecordingTags,
  Release,
} from '../../types/musicbrainz.js';
import { buildFieldQuery } from './query.js';

const PROVIDER_NAME = 'MusicBrainz';
const TITLE_ARTIST_SEARCH_LIMIT = 20;
const TAG_LOOKUP_LIMIT = 1;

export interface MusicBrainzClientOptions {
  /** Overrides MUSICBRAINZ_BASE_URL; point it at a stand-in server in tests */
  baseUrl?: string;
  timeoutMs?: number;
  appName?: string;
  appVersion?: string;
  contact?: string;
  /** Throw on non-2xx responses instead of decoding the body */
  strictStatus?: boolean;
}

/**
 * Per-call cancellation and deadline
 */
export interface RequestOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

type QueryParams = Record<string, string | number>;

export class MusicBrainzClient {
  private readonly client: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly strictStatus: boolean;

  constructor(options: MusicBrainzClientOptions = {}) {
    const config = ConfigManager.getInstance().getMusicBrainzConfig();

    this.baseUrl = options.baseUrl ?? config.baseUrl;
    this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
    this.strictStatus = options.strictStatus ?? config.strictStatus;

    const appName = options.appName ?? config.appName;
    const appVersion = options.appVersion ?? config.appVersion;
    const contact = options.contact ?? config.contact;
    const userAgent = contact
      ? `${appName}/${appVersion} ( ${contact} )`
      : `${appName}/${appVersion}`;

    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      headers: {
        'User-Agent': userAgent,
        Accept: 'application/json',
      },
      // Keep the raw body so decoding failures can report it
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: this.strictStatus
        ? (status: number) => status >= 200 && status < 300
        : () => true,
    });

    logger.debug('MusicBrainz client initialized', {
      baseUrl: this.baseUrl,
      userAgent,
      strictStatus: this.strictStatus,
    });
  }

  /**
   * Search for artists by name
   */
  async searchArtists(name: string, limit: number, options?: RequestOptions): Promise<Artist[]> {
    return this.get(
      'searchArtists',
      'artist/',
      { query: name, limit, fmt: 'json' },
      artistsEnvelopeSchema,
      options
    );
  }

  async getArtistById(id: MBID, options?: RequestOptions): Promise<Artist> {
    return this.get(
      'getArtistById',
      `artist/${encodeURIComponent(id)}`,
      { fmt: 'json' },
      artistSchema,
      options
    );
  }

  /**
   * Search for releases by title
   */
  async searchReleases(title: string, limit: number, options?: RequestOptions): Promise<Release[]> {
    return this.get(
      'searchReleases',
      'release/',
      { query: title, limit, fmt: 'json' },
      releasesEnvelopeSchema,
      options
    );
  }

  async getReleaseById(id: MBID, options?: RequestOptions): Promise<Release> {
    return this.get(
      'getReleaseById',
      `release/${encodeURIComponent(id)}`,
      { fmt: 'json' },
      releaseSchema,
      options
    );
  }

  /**
   * Search for recordings (tracks) by title
   */
  async searchRecordings(
    title: string,
    limit: number,
    options?: RequestOptions
  ): Promise<Recording[]> {
    return this.get(
      'searchRecordings',
      'recording/',
      { query: title, limit, fmt: 'json' },
      recordingsEnvelopeSchema,
      options
    );
  }

  async getRecordingById(id: MBID, options?: RequestOptions): Promise<Recording> {
    return this.lookupRecording('getRecordingById', id, options);
  }

  /**
   * Search for recordings matching both a song title and an artist name.
   * Returns up to 20 results in the order the service ranked them.
   */
  async searchRecordingsByTitleAndArtist(
    title: string,
    artist: string,
    options?: RequestOptions
  ): Promise<Recording[]> {
    const query = buildFieldQuery([
      ['recording', title],
      ['artist', artist],
    ]);
    return this.get(
      'searchRecordingsByTitleAndArtist',
      'recording/',
      { query, limit: TITLE_ARTIST_SEARCH_LIMIT, fmt: 'json' },
      recordingsEnvelopeSchema,
      options
    );
  }

  /**
   * Strict lookup of a recording's tags and first release date.
   *
   * The search must return exactly one recording; any other count throws
   * MatchNotFoundError. The match is then fetched by id, since search
   * results carry no tags.
   */
  async getTagsByTitleAndArtistAndAlbum(
    title: string,
    artist: string,
    album: string,
    options?: RequestOptions
  ): Promise<RecordingTags> {
    const operation = 'getTagsByTitleAndArtistAndAlbum';
    const query = buildFieldQuery([
      ['recording', title],
      ['artist', artist],
      ['release', album],
    ]);

    const matches = await this.get(
      operation,
      'recording/',
      { query, limit: TAG_LOOKUP_LIMIT, fmt: 'json' },
      recordingsEnvelopeSchema,
      options
    );

    const [match] = matches;
    if (matches.length !== 1 || match === undefined) {
      logger.debug('MusicBrainz strict match failed', { query, matchCount: matches.length });
      throw new MatchNotFoundError('recording', query, matches.length, {
        service: 'MusicBrainzClient',
        operation,
      });
    }

    const recording = await this.getRecordingByIdWithTags(match.id, options);
    return {
      tags: recording.tags,
      releaseDate: recording.firstReleaseDate,
    };
  }

  /**
   * Same request as getRecordingById; named for call sites that rely on tags
   */
  async getRecordingByIdWithTags(id: MBID, options?: RequestOptions): Promise<Recording> {
    return this.lookupRecording('getRecordingByIdWithTags', id, options);
  }

  private async lookupRecording(
    operation: string,
    id: MBID,
    options?: RequestOptions
  ): Promise<Recording> {
    return this.get(
      operation,
      `recording/${encodeURIComponent(id)}`,
      { fmt: 'json' },
      recordingSchema,
      options
    );
  }

  /**
   * GET `path`, then decode the body with `decoder`
   */
  private async get<T>(
    operation: string,
    path: string,
    params: QueryParams,
    decoder: Decoder<T>,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = this.client.getUri({ url: path, params });
    const context: ErrorContext = {
      service: 'MusicBrainzClient',
      operation,
      metadata: { url },
    };

    logger.debug('MusicBrainz request', { operation, url });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(path, {
        params,
        ...(options.signal && { signal: options.signal }),
        ...(options.timeoutMs !== undefined && { timeout: options.timeoutMs }),
      });
    } catch (error) {
      const converted = this.convertToApplicationError(
        error,
        url,
        options.timeoutMs ?? this.timeoutMs,
        context
      );
      logger.warn('MusicBrainz request failed', {
        operation,
        url,
        code: converted.code,
        error: converted.message,
      });
      throw converted;
    }

    return this.decode(response.data, decoder, context);
  }

  private decode<T>(data: unknown, decoder: Decoder<T>, context: ErrorContext): T {
    if (typeof data !== 'string') {
      throw new DecodeError(
        PROVIDER_NAME,
        { body: String(data) },
        'Response body is not text',
        context
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      const position = parsePosition(error);
      throw new DecodeError(
        PROVIDER_NAME,
        { body: data, ...(position !== undefined && { position }) },
        `Response body is not valid JSON: ${getErrorMessage(error)}`,
        context,
        toError(error)
      );
    }

    const result = decoder.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new DecodeError(
        PROVIDER_NAME,
        { body: data, issues },
        `Response body has an unexpected shape (${issues.length} issue(s))`,
        context
      );
    }

    return result.data;
  }

  /**
   * Convert Axios errors to ApplicationError types
   */
  private convertToApplicationError(
    error: unknown,
    url: string,
    timeoutMs: number,
    context: ErrorContext
  ): ApplicationError {
    if (axios.isCancel(error)) {
      return new RequestCancelledError(url, undefined, context, toError(error));
    }

    if (axios.isAxiosError(error)) {
      // Only reachable with strictStatus; otherwise every status resolves
      if (error.response) {
        const status = error.response.status;
        const statusContext = { ...context, metadata: { ...context.metadata, status } };

        if (status === 429) {
          const header: unknown = error.response.headers['retry-after'];
          const retryAfter = typeof header === 'string' ? parseInt(header, 10) : NaN;
          return new RateLimitError(
            PROVIDER_NAME,
            isNaN(retryAfter) ? undefined : retryAfter,
            `Rate limit exceeded: ${error.message}`,
            statusContext
          );
        }

        return new ProviderServerError(
          PROVIDER_NAME,
          status,
          `API error (${status}): ${error.message}`,
          statusContext,
          error
        );
      }

      if (isTimeoutError(error)) {
        return new TimeoutError(
          timeoutMs,
          url,
          `MusicBrainz request timeout: ${url}`,
          context,
          error
        );
      }

      if (isDnsError(error)) {
        return new TransportError(
          `MusicBrainz host lookup failed: ${error.message}`,
          ErrorCode.NETWORK_DNS_FAILED,
          url,
          context,
          error
        );
      }

      return new TransportError(
        `MusicBrainz network error: ${error.message}`,
        ErrorCode.NETWORK_CONNECTION_FAILED,
        url,
        context,
        error
      );
    }

    return new TransportError(
      `Unexpected error: ${getErrorMessage(error)}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      url,
      context,
      toError(error)
    );
  }
}

function parsePosition(error: unknown): number | undefined {
  const match = /at position (\d+)/.exec(getErrorMessage(error));
  return match?.[1] !== undefined ? parseInt(match[1], 10) : undefined;
}
