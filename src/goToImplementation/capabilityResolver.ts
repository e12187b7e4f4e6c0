import type { TextDocument } from 'vscode-languageserver-textdocument';

import type {
  FindUsagesService,
  GoToImplementationService,
  LanguageServiceProvider
} from '../types.js';
import type { ILogger } from '../utils/Logger.js';

/**
 * Lookup services available for one document, derived fresh per request.
 */
export interface CapabilitySet {
  readonly streaming?: FindUsagesService;
  readonly synchronous?: GoToImplementationService;
}

export const NO_CAPABILITIES: CapabilitySet = Object.freeze({});

/**
 * Find the lookup services registered for the document's language.
 * A provider that throws is treated as offering nothing.
 */
export function resolveCapabilities(
  provider: LanguageServiceProvider,
  document: TextDocument | undefined,
  logger: ILogger
): CapabilitySet {
  if (!document) {
    return NO_CAPABILITIES;
  }

  try {
    const services = provider.getServices(document.languageId);
    if (!services) {
      return NO_CAPABILITIES;
    }
    return { streaming: services.streaming, synchronous: services.synchronous };
  } catch (error) {
    logger.warn(
      `[CapabilityResolver] Service lookup failed for "${document.languageId}": ${error instanceof Error ? error.message : String(error)}`
    );
    return NO_CAPABILITIES;
  }
}

/**
 * Cheap enough for every command-state query: looks at presence only.
 */
export function isAvailable(capabilities: CapabilitySet): boolean {
  return capabilities.streaming !== undefined || capabilities.synchronous !== undefined;
}
