import type {
  LanguageServiceProvider,
  LanguageServiceRegistration,
  LanguageServices
} from '../types.js';
import type { ILogger } from '../utils/Logger.js';

/**
 * LanguageServiceRegistry - lookup services keyed by language id.
 *
 * Embedders register the streaming and/or one-shot lookup a language offers.
 * Registering a language twice replaces the earlier entry; disposing a
 * registration only removes it while it is still the current one.
 */
export class LanguageServiceRegistry implements LanguageServiceProvider {
  private entries: Map<string, LanguageServices> = new Map();

  constructor(private readonly logger: ILogger) {}

  register(languageId: string, services: LanguageServices): LanguageServiceRegistration {
    if (this.entries.has(languageId)) {
      this.logger.warn(`[LanguageServiceRegistry] Services for "${languageId}" already registered, replacing...`);
    }

    const entry: LanguageServices = { ...services };
    this.entries.set(languageId, entry);
    this.logger.info(
      `[LanguageServiceRegistry] Registered "${languageId}" (streaming=${!!entry.streaming}, synchronous=${!!entry.synchronous})`
    );

    return {
      languageId,
      dispose: () => {
        if (this.entries.get(languageId) === entry) {
          this.entries.delete(languageId);
        }
      }
    };
  }

  getServices(languageId: string): LanguageServices | undefined {
    return this.entries.get(languageId);
  }

  getLanguageIds(): string[] {
    return Array.from(this.entries.keys());
  }
}
