import type { LogLevelName } from '../utils/Logger.js';

export interface GoToImplementationConfig {
  streamingGoToImplementation: boolean;
  streamingGoToImplementationByLanguage: Record<string, boolean>;
  logLevel: LogLevelName;
}

const DEFAULT_CONFIG: GoToImplementationConfig = {
  streamingGoToImplementation: true,
  streamingGoToImplementationByLanguage: {},
  logLevel: 'info'
};

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

/**
 * Settings shape sent by the client, either as initializationOptions or under
 * the `goToImplementation` section of didChangeConfiguration.
 */
export interface IGoToImplementationSettings {
  streamingGoToImplementation?: unknown;
  streamingGoToImplementationByLanguage?: unknown;
  logLevel?: unknown;
}

function isLogLevelName(value: unknown): value is LogLevelName {
  return LOG_LEVELS.some(level => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigurationManager {
  private config: GoToImplementationConfig;

  constructor() {
    this.config = {
      ...DEFAULT_CONFIG,
      streamingGoToImplementationByLanguage: {}
    };
  }

  getConfig(): GoToImplementationConfig {
    return {
      ...this.config,
      streamingGoToImplementationByLanguage: { ...this.config.streamingGoToImplementationByLanguage }
    };
  }

  updateFromInitializationOptions(opts: IGoToImplementationSettings | null | undefined): void {
    this.apply(opts);
  }

  updateFromSettings(settings: IGoToImplementationSettings | null | undefined): void {
    this.apply(settings);
  }

  /**
   * Whether the streaming lookup is preferred for `languageId`. A per-language
   * entry wins over the global toggle.
   */
  isStreamingGoToImplementationEnabled(languageId: string): boolean {
    const override = this.config.streamingGoToImplementationByLanguage[languageId];
    return override ?? this.config.streamingGoToImplementation;
  }

  getLogLevel(): LogLevelName {
    return this.config.logLevel;
  }

  private apply(settings: IGoToImplementationSettings | null | undefined): void {
    if (!settings) {return;}

    if (typeof settings.streamingGoToImplementation === 'boolean') {
      this.config.streamingGoToImplementation = settings.streamingGoToImplementation;
    }
    if (isRecord(settings.streamingGoToImplementationByLanguage)) {
      const byLanguage: Record<string, boolean> = {};
      for (const [languageId, enabled] of Object.entries(settings.streamingGoToImplementationByLanguage)) {
        if (typeof enabled === 'boolean') {
          byLanguage[languageId] = enabled;
        }
      }
      this.config.streamingGoToImplementationByLanguage = byLanguage;
    }
    if (isLogLevelName(settings.logLevel)) {
      this.config.logLevel = settings.logLevel;
    }
  }
}
