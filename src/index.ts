/**
 * mb-lookup
 *
 * Typed client for the MusicBrainz web service.
 */

export * from './services/musicbrainz/index.js';
export * from './types/musicbrainz.js';
export * from './errors/index.js';
export { ConfigManager } from './config/ConfigManager.js';
export { defaultConfig, MUSICBRAINZ_API_ENDPOINT } from './config/defaults.js';
export type { AppConfig, LogLevel, LoggingConfig, MusicBrainzConfig } from './config/types.js';
export { logger, initializeLogger } from './utils/logging.js';
