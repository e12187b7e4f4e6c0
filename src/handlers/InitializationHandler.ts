/**
 * InitializationHandler - Handles LSP initialization lifecycle.
 *
 * Responsibilities:
 * - Process `initialize` request (capability negotiation, settings)
 * - Process `initialized` notification (configuration change registration)
 * - Apply `workspace/didChangeConfiguration` settings
 */

import {
  DidChangeConfigurationNotification,
  TextDocumentSyncKind,
  type DidChangeConfigurationParams,
  type InitializeParams,
  type InitializeResult
} from 'vscode-languageserver/node.js';
import { URI } from 'vscode-uri';

import { COMMANDS, SETTINGS_SECTION } from '../constants.js';
import type { IGoToImplementationSettings } from '../config/configurationManager.js';
import { parseLogLevel } from '../utils/Logger.js';
import type { IHandler, ServerServices, ServerState } from './types.js';

function toSettings(value: unknown): IGoToImplementationSettings | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  return {
    streamingGoToImplementation: Reflect.get(value, 'streamingGoToImplementation'),
    streamingGoToImplementationByLanguage: Reflect.get(value, 'streamingGoToImplementationByLanguage'),
    logLevel: Reflect.get(value, 'logLevel')
  };
}

/**
 * Pick the settings object out of what the client sent; clients may nest it
 * under the `goToImplementation` section or send it bare.
 */
export function extractSettings(raw: unknown): IGoToImplementationSettings | undefined {
  if (typeof raw === 'object' && raw !== null && SETTINGS_SECTION in raw) {
    return toSettings(raw[SETTINGS_SECTION]);
  }
  return toSettings(raw);
}

/**
 * Handler for LSP initialization events.
 */
export class InitializationHandler implements IHandler {
  readonly name = 'InitializationHandler';

  private services: ServerServices;
  private state: ServerState;

  constructor(services: ServerServices, state: ServerState) {
    this.services = services;
    this.state = state;
  }

  register(): void {
    const { connection } = this.services;

    connection.onInitialize(params => this.handleInitialize(params));
    connection.onInitialized(() => this.handleInitialized());
    connection.onDidChangeConfiguration(change => this.handleDidChangeConfiguration(change));
  }

  /**
   * Handle LSP initialize request.
   */
  handleInitialize(params: InitializeParams): InitializeResult {
    const { logger, configManager } = this.services;

    logger.info('[Server] ========== INITIALIZATION START ==========');
    logger.info(`[Server] Client: ${params.clientInfo?.name} ${params.clientInfo?.version}`);

    const capabilities = params.capabilities;
    this.state.hasConfigurationCapability = !!capabilities.workspace?.configuration;

    logger.info(`[Server] Configuration capability: ${this.state.hasConfigurationCapability}`);

    const settings = extractSettings(params.initializationOptions);
    if (settings) {
      configManager.updateFromInitializationOptions(settings);
      this.applyLogLevel();
    } else {
      logger.info('[Server] No initialization options provided, using defaults');
    }

    this.state.workspaceRoot = this.extractWorkspaceRoot(params);

    const result: InitializeResult = {
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Incremental,
        executeCommandProvider: {
          commands: [COMMANDS.GO_TO_IMPLEMENTATION]
        }
      }
    };

    logger.info('[Server] ========== INITIALIZATION COMPLETE ==========');
    return result;
  }

  /**
   * Handle LSP initialized notification.
   */
  async handleInitialized(): Promise<void> {
    const { connection, logger } = this.services;

    if (!this.state.hasConfigurationCapability) {
      return;
    }

    try {
      await connection.client.register(DidChangeConfigurationNotification.type, { section: SETTINGS_SECTION });
      logger.info('[Server] Registered for configuration changes');
    } catch (error) {
      logger.error('[Server] Failed to register for configuration changes', error);
    }
  }

  handleDidChangeConfiguration(change: DidChangeConfigurationParams): void {
    const { configManager, logger } = this.services;

    const settings = extractSettings(change.settings);
    if (!settings) {
      return;
    }

    configManager.updateFromSettings(settings);
    this.applyLogLevel();
    logger.info('[Server] Configuration updated and applied');
  }

  private applyLogLevel(): void {
    const { configManager, logger } = this.services;
    logger.setLevel(parseLogLevel(configManager.getLogLevel()));
  }

  /**
   * Extract workspace root from initialization params.
   */
  private extractWorkspaceRoot(params: InitializeParams): string {
    const { logger } = this.services;

    if (params.workspaceFolders && params.workspaceFolders.length > 0) {
      const root = URI.parse(params.workspaceFolders[0].uri).fsPath;
      logger.info(`[Server] Selected workspace root: ${root}`);
      return root;
    } else if (params.rootUri) {
      const root = URI.parse(params.rootUri).fsPath;
      logger.info(`[Server] Using rootUri: ${root}`);
      return root;
    } else if (params.rootPath) {
      logger.info(`[Server] Using rootPath: ${params.rootPath}`);
      return params.rootPath;
    }

    logger.warn('[Server] No workspace root found');
    return '';
  }
}

/**
 * Factory function for creating InitializationHandler.
 */
export function createInitializationHandler(
  services: ServerServices,
  state: ServerState
): InitializationHandler {
  return new InitializationHandler(services, state);
}
