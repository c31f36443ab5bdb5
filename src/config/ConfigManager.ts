import dotenv from 'dotenv';
import { AppConfig, LogLevel, LoggingConfig, MusicBrainzConfig } from './types.js';
import { LOG_LEVELS, defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  // Each section is parsed on first use
  private musicbrainz: MusicBrainzConfig | undefined;
  private logging: LoggingConfig | undefined;
  private warnings: string[] = [];

  private constructor() {
    dotenv.config();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Drop the cached instance so the next getInstance() re-reads the environment
   */
  static resetInstance(): void {
    ConfigManager.instance = undefined;
  }

  private loadMusicBrainzConfig(): MusicBrainzConfig {
    const config = structuredClone(defaultConfig.musicbrainz);

    config.baseUrl = this.getUrl('MUSICBRAINZ_BASE_URL', config.baseUrl);
    config.timeoutMs = this.getNumber('MUSICBRAINZ_TIMEOUT_MS', config.timeoutMs);
    config.appName = this.getString('MUSICBRAINZ_APP_NAME', config.appName);
    config.appVersion = this.getString('MUSICBRAINZ_APP_VERSION', config.appVersion);
    config.contact = process.env.MUSICBRAINZ_CONTACT || config.contact;
    config.strictStatus = this.getBoolean('MUSICBRAINZ_STRICT_STATUS', config.strictStatus);

    return config;
  }

  private loadLoggingConfig(): LoggingConfig {
    const config = structuredClone(defaultConfig.logging);

    config.level = this.getLogLevel('LOG_LEVEL', config.level);
    config.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.file.enabled);
    config.file.path = this.getString('LOG_FILE_PATH', config.file.path);
    config.console.enabled = this.getBoolean('LOG_CONSOLE_ENABLED', config.console.enabled);

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed <= 0) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a positive number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  /**
   * Case-insensitive; an unknown level falls back to the default and is
   * reported through getWarnings()
   */
  private getLogLevel(key: string, defaultValue: LogLevel): LogLevel {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const normalized = value.trim().toLowerCase();
    const match = LOG_LEVELS.find((level) => level === normalized);
    if (match === undefined) {
      this.warnings.push(
        `Environment variable ${key}='${value}' is not one of: ${LOG_LEVELS.join(', ')}; using '${defaultValue}'`
      );
      return defaultValue;
    }
    return match;
  }

  private getUrl(key: string, defaultValue: string): string {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    let parsed: URL;
    try {
      parsed = new URL(value);
    } catch {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid URL`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ConfigurationError(key, `Environment variable ${key} must be an http(s) URL`);
    }
    // Relative endpoint paths resolve against the base, so it must end in a slash
    return value.endsWith('/') ? value : `${value}/`;
  }

  getConfig(): AppConfig {
    return {
      musicbrainz: this.getMusicBrainzConfig(),
      logging: this.getLoggingConfig(),
    };
  }

  getMusicBrainzConfig(): MusicBrainzConfig {
    if (!this.musicbrainz) {
      this.musicbrainz = this.loadMusicBrainzConfig();
    }
    return this.musicbrainz;
  }

  getLoggingConfig(): LoggingConfig {
    if (!this.logging) {
      this.logging = this.loadLoggingConfig();
    }
    return this.logging;
  }

  /**
   * Settings that were ignored while loading, for the logger to report
   */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  reload(): void {
    dotenv.config();
    this.musicbrainz = undefined;
    this.logging = undefined;
    this.warnings = [];
  }
}
