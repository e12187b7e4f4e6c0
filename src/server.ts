/**
 * Go To Implementation Language Server - composition root.
 *
 * Wires the connection, the document manager, configuration, logging and the
 * command collaborators together and registers the LSP handlers. Embedders
 * contribute lookups through `languageServices` before calling `listen()`.
 */

import {
  TextDocuments,
  type Connection
} from 'vscode-languageserver/node.js';
import { TextDocument } from 'vscode-languageserver-textdocument';

import { ConfigurationManager } from './config/configurationManager.js';
import { GO_TO_IMPLEMENTATION_TEXT } from './constants.js';
import {
  HandlerRegistry,
  createGoToImplementationHandler,
  createInitializationHandler,
  type GoToImplementationHandler,
  type ServerServices,
  type ServerState
} from './handlers/index.js';
import { LanguageServiceRegistry } from './services/languageServiceRegistry.js';
import { LspNavigationService } from './services/navigationService.js';
import { LspNotificationService } from './services/notificationService.js';
import {
  LspFindUsagesPresenter,
  createLazy,
  type Lazy,
  type StreamingFindUsagesPresenter
} from './services/streamingPresenter.js';
import { LspWaitContext } from './services/waitContext.js';
import { LoggerService, LogLevel } from './utils/Logger.js';

export interface GoToImplementationServer {
  readonly connection: Connection;
  readonly languageServices: LanguageServiceRegistry;
  readonly configManager: ConfigurationManager;
  readonly handler: GoToImplementationHandler;
  readonly state: ServerState;
  /** Start listening on the connection */
  listen(): void;
  dispose(): Promise<void>;
}

export interface CreateServerOptions {
  /**
   * Presenter candidates, first one wins. Defaults to the LSP presenter that
   * sends `goToImplementation/presentResults` to the client.
   */
  presenters?: Lazy<StreamingFindUsagesPresenter>[];
  logLevel?: LogLevel;
}

export function createServer(connection: Connection, options: CreateServerOptions = {}): GoToImplementationServer {
  const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);
  const logger = new LoggerService(connection, options.logLevel ?? LogLevel.INFO);
  const configManager = new ConfigurationManager();
  const languageServices = new LanguageServiceRegistry(logger);

  const notificationService = new LspNotificationService(connection, logger);
  const navigationService = new LspNavigationService(connection.window, logger);
  const presenters = options.presenters ?? [
    createLazy<StreamingFindUsagesPresenter>(
      () => new LspFindUsagesPresenter(connection, navigationService, notificationService, logger)
    )
  ];

  const state: ServerState = {
    workspaceRoot: '',
    hasConfigurationCapability: false
  };

  const services: ServerServices = {
    connection,
    documents,
    configManager,
    logger,
    languageServices,
    notificationService,
    navigationService,
    presenters,
    createWaitContext: requestToken =>
      LspWaitContext.create(connection.window, requestToken, GO_TO_IMPLEMENTATION_TEXT.TITLE)
  };

  const registry = new HandlerRegistry(services, state);
  registry.register(createInitializationHandler);
  const handler = registry.register(createGoToImplementationHandler);

  connection.onShutdown(() => registry.disposeAll());

  return {
    connection,
    languageServices,
    configManager,
    handler,
    state,
    listen: () => {
      documents.listen(connection);
      connection.listen();
    },
    dispose: () => registry.disposeAll()
  };
}
