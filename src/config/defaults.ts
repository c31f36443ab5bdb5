import { AppConfig, LogLevel } from './types.js';

export const MUSICBRAINZ_API_ENDPOINT = 'https://musicbrainz.org/ws/2/';

export const LOG_LEVELS: readonly LogLevel[] = [
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly',
];

export const defaultConfig: AppConfig = {
  musicbrainz: {
    baseUrl: MUSICBRAINZ_API_ENDPOINT,
    timeoutMs: 30000,
    appName: 'mb-lookup',
    appVersion: '1.0.0',
    strictStatus: false,
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
