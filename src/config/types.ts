export interface MusicBrainzConfig {
  /** Base URL of the web service, ending in a slash */
  baseUrl: string;
  timeoutMs: number;
  /** Identification sent in the User-Agent header */
  appName: string;
  appVersion: string;
  contact?: string | undefined;
  /** Reject non-2xx responses instead of decoding their bodies */
  strictStatus: boolean;
}

/** winston's npm levels */
export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  musicbrainz: MusicBrainzConfig;
  logging: LoggingConfig;
}
