/**
 * Handler Types - Shared interfaces for LSP request handlers.
 *
 * Handlers receive services via constructor injection to avoid circular
 * dependencies.
 */

import type { CancellationToken, Connection, TextDocuments } from 'vscode-languageserver/node.js';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import type { ConfigurationManager } from '../config/configurationManager.js';
import type { INavigationService } from '../services/navigationService.js';
import type { INotificationService } from '../services/notificationService.js';
import type { Lazy, StreamingFindUsagesPresenter } from '../services/streamingPresenter.js';
import type { WaitContext } from '../services/waitContext.js';
import type { LanguageServiceProvider } from '../types.js';
import type { ILogger } from '../utils/Logger.js';

/**
 * Creates the wait context of one command execution. The request token is
 * linked into the context's user cancellation token.
 */
export type WaitContextFactory = (requestToken: CancellationToken) => Promise<WaitContext>;

/**
 * Core services shared across all handlers.
 */
export interface CoreServices {
  /** LSP connection for sending messages/notifications */
  connection: Connection;
  /** Document manager for open text documents */
  documents: TextDocuments<TextDocument>;
  /** Configuration manager for user settings */
  configManager: ConfigurationManager;
  /** Unified logger service */
  logger: ILogger;
}

/**
 * Collaborators of the Go To Implementation command.
 */
export interface GoToImplementationServices {
  /** Per-language lookup services */
  languageServices: LanguageServiceProvider;
  notificationService: INotificationService;
  navigationService: INavigationService;
  /** Presenter candidates; the first one is used */
  presenters: readonly Lazy<StreamingFindUsagesPresenter>[];
  createWaitContext: WaitContextFactory;
}

/**
 * Complete services container for full handler access.
 */
export interface ServerServices extends CoreServices, GoToImplementationServices {}

/**
 * Mutable server state that can be updated by handlers.
 * Kept separate from services to make mutations explicit.
 */
export interface ServerState {
  /** Current workspace root (set during initialization) */
  workspaceRoot: string;
  /** Whether configuration capability is available */
  hasConfigurationCapability: boolean;
}

/**
 * Base interface for all LSP handlers.
 */
export interface IHandler {
  /** Handler name for logging/debugging */
  readonly name: string;

  /**
   * Register this handler's operations with the LSP connection.
   * Called once during server startup.
   */
  register(): void;

  /**
   * Dispose of resources held by this handler.
   * Called during server shutdown.
   */
  dispose?(): Promise<void>;
}

/**
 * Factory function type for creating handlers.
 */
export type HandlerFactory<T extends IHandler> = (
  services: ServerServices,
  state: ServerState
) => T;
