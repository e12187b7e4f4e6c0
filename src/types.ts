import type { CancellationToken, Disposable, Location } from 'vscode-languageserver/node.js';
import type { TextDocument } from 'vscode-languageserver-textdocument';

/**
 * One discovered implementation site.
 *
 * Identity is the structural location (uri + range start). Lists of items keep
 * the order in which the search reported them.
 */
export interface DefinitionItem {
  location: Location;
  displayName: string;
  containerName?: string;
  kind?: string;
}

/**
 * Result of a one-shot lookup. When `handled` is true and no message is set the
 * service has already navigated on its own.
 */
export interface GoToImplementationResult {
  handled: boolean;
  message?: string;
}

/**
 * One-shot lookup: resolves once the search has finished, and may navigate
 * as part of doing so.
 */
export interface GoToImplementationService {
  tryGoToImplementation(
    document: TextDocument,
    caretOffset: number,
    token: CancellationToken
  ): Promise<GoToImplementationResult>;
}

/**
 * Sink a streaming search reports into. Reports may arrive from several
 * sources, in any order, until the search promise settles.
 */
export interface FindUsagesContext {
  readonly cancellationToken: CancellationToken;
  reportDefinition(item: DefinitionItem): void;
  reportMessage(message: string): void;
  setSearchTitle(title: string): void;
}

/**
 * Streaming lookup: reports definitions into `context` and settles when the
 * search is complete.
 */
export interface FindUsagesService {
  findImplementations(
    document: TextDocument,
    caretOffset: number,
    context: FindUsagesContext
  ): Promise<void>;
}

/**
 * Lookup services a language contributes. Either may be missing.
 */
export interface LanguageServices {
  streaming?: FindUsagesService;
  synchronous?: GoToImplementationService;
}

/**
 * Per-language source of lookup services.
 */
export interface LanguageServiceProvider {
  getServices(languageId: string): LanguageServices | undefined;
}

export interface LanguageServiceRegistration extends Disposable {
  readonly languageId: string;
}

/**
 * Everything a single command invocation needs. Never shared between
 * invocations.
 */
export interface GoToImplementationRequest {
  readonly document: TextDocument;
  readonly caretOffset: number;
  readonly cancellationToken: CancellationToken;
}
