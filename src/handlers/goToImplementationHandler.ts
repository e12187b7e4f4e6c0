import {
  CancellationToken,
  CancellationTokenSource,
  RequestType,
  type Disposable,
  type ExecuteCommandParams,
  type Position,
  type TextDocumentPositionParams
} from 'vscode-languageserver/node.js';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import { COMMANDS, GO_TO_IMPLEMENTATION_TEXT } from '../constants.js';
import { executeStrategy } from '../goToImplementation/boundedExecutor.js';
import {
  isAvailable,
  resolveCapabilities,
  type CapabilitySet
} from '../goToImplementation/capabilityResolver.js';
import { OutcomeDispatcher } from '../goToImplementation/outcomeDispatcher.js';
import { routeOutcome } from '../goToImplementation/resultRouter.js';
import { selectStrategy } from '../goToImplementation/strategySelector.js';
import { getStreamingPresenter } from '../services/streamingPresenter.js';
import type { WaitContext } from '../services/waitContext.js';
import { isCancellationError, linkCancellationTokens, throwIfCancelled } from '../utils/asyncUtils.js';
import type { IHandler, ServerServices, ServerState } from './types.js';

export interface CommandState {
  enabled: boolean;
}

export const CommandStateRequest = new RequestType<TextDocumentPositionParams, CommandState, void>(
  COMMANDS.COMMAND_STATE
);

function isPosition(value: unknown): value is Position {
  return typeof value === 'object' && value !== null &&
    'line' in value && 'character' in value &&
    Number.isInteger(value.line) && Number.isInteger(value.character);
}

/**
 * Narrow the first executeCommand argument to a document position.
 */
export function isTextDocumentPositionParams(value: unknown): value is TextDocumentPositionParams {
  if (typeof value !== 'object' || value === null || !('textDocument' in value) || !('position' in value)) {
    return false;
  }
  const { textDocument, position } = value;
  return typeof textDocument === 'object' && textDocument !== null &&
    'uri' in textDocument && typeof textDocument.uri === 'string' &&
    isPosition(position);
}

/**
 * Caret offset of `position`, or undefined when the position is not inside
 * the document.
 */
function getCaretOffset(document: TextDocument, position: Position): number | undefined {
  if (position.line < 0 || position.character < 0 || position.line >= document.lineCount) {
    return undefined;
  }
  return document.offsetAt(position);
}

/**
 * Handler for the Go To Implementation command.
 *
 * Exposes:
 * - `goToImplementation/commandState`: whether the command is offered for a
 *   document (presence of a lookup service, nothing is searched)
 * - `workspace/executeCommand` with `goToImplementation.execute`: picks the
 *   streaming or one-shot lookup, waits for it under a cancellable progress,
 *   then navigates, presents the results or shows the lookup's message
 */
export class GoToImplementationHandler implements IHandler {
  readonly name = 'GoToImplementationHandler';
  readonly displayName = GO_TO_IMPLEMENTATION_TEXT.HANDLER_NAME;

  private services: ServerServices;
  private state: ServerState;
  private dispatcher: OutcomeDispatcher;
  private registrations: Disposable[] = [];
  /** Cancelled on dispose; releases lookups still in flight */
  private shutdown = new CancellationTokenSource();

  constructor(services: ServerServices, state: ServerState) {
    this.services = services;
    this.state = state;
    this.dispatcher = new OutcomeDispatcher({
      notificationService: services.notificationService,
      navigationService: services.navigationService,
      logger: services.logger
    });
  }

  register(): void {
    const { connection } = this.services;
    this.registrations.push(
      connection.onRequest(CommandStateRequest, params => this.getCommandState(params)),
      connection.onExecuteCommand((params, token) => this.handleExecuteCommand(params, token))
    );
  }

  async dispose(): Promise<void> {
    for (const registration of this.registrations) {
      registration.dispose();
    }
    this.registrations = [];
    this.shutdown.cancel();
  }

  getCommandState(params: TextDocumentPositionParams): CommandState {
    const capabilities = this.getDocumentAndCapabilities(params.textDocument.uri).capabilities;
    return { enabled: isAvailable(capabilities) };
  }

  async handleExecuteCommand(params: ExecuteCommandParams, token: CancellationToken): Promise<boolean | null> {
    if (params.command !== COMMANDS.GO_TO_IMPLEMENTATION) {
      this.services.logger.warn(`[GoToImplementationHandler] Unknown command: ${params.command}`);
      return null;
    }

    const [target] = params.arguments ?? [];
    if (!isTextDocumentPositionParams(target)) {
      this.services.logger.warn('[GoToImplementationHandler] Invalid command arguments');
      return false;
    }

    return this.executeCommand(target, token);
  }

  /**
   * Run the command for a caret position.
   *
   * @returns false when the command is not offered for the document (or there
   *   is no caret in it); true once a lookup has run, whatever its result
   */
  async executeCommand(
    params: TextDocumentPositionParams,
    token: CancellationToken = CancellationToken.None
  ): Promise<boolean> {
    const { document, capabilities } = this.getDocumentAndCapabilities(params.textDocument.uri);
    if (!document || !isAvailable(capabilities)) {
      return false;
    }

    const caretOffset = getCaretOffset(document, params.position);
    if (caretOffset === undefined) {
      return false;
    }

    return this.execute(document, caretOffset, capabilities, token);
  }

  private getDocumentAndCapabilities(uri: string): {
    document: TextDocument | undefined;
    capabilities: CapabilitySet;
  } {
    const { documents, languageServices, logger } = this.services;
    const document = documents.get(uri);
    return { document, capabilities: resolveCapabilities(languageServices, document, logger) };
  }

  private async execute(
    document: TextDocument,
    caretOffset: number,
    capabilities: CapabilitySet,
    requestToken: CancellationToken
  ): Promise<boolean> {
    const { configManager, logger, presenters, createWaitContext } = this.services;

    // Without a presenter the streaming lookup is not offered.
    const presenter = getStreamingPresenter(presenters, logger);
    const usable: CapabilitySet = presenter ? capabilities : { synchronous: capabilities.synchronous };

    const streamingEnabled = configManager.isStreamingGoToImplementationEnabled(document.languageId);
    const strategy = selectStrategy(usable, streamingEnabled);
    if (strategy.kind === 'none') {
      logger.info(`[GoToImplementationHandler] No usable lookup for ${document.languageId}`);
      return false;
    }

    logger.info(`[GoToImplementationHandler] ${strategy.kind} lookup at ${document.uri}:${caretOffset}`);

    const cancellation = linkCancellationTokens(requestToken, this.shutdown.token);
    let waitContext: WaitContext | undefined;
    try {
      waitContext = await createWaitContext(cancellation.token);
      const cancellationToken = waitContext.userCancellationToken;
      const outcome = await executeStrategy(
        strategy,
        { document, caretOffset, cancellationToken },
        waitContext,
        logger
      );
      throwIfCancelled(cancellationToken);

      const action = routeOutcome(outcome);
      if (action) {
        await this.dispatcher.dispatch(action, waitContext, this.state.workspaceRoot, presenter);
      }
    } catch (error) {
      if (isCancellationError(error)) {
        logger.debug('[GoToImplementationHandler] Cancelled by user');
      } else {
        logger.error('[GoToImplementationHandler] Lookup failed', error);
      }
    } finally {
      waitContext?.dispose();
      cancellation.dispose();
    }

    return true;
  }
}

/**
 * Factory function for creating GoToImplementationHandler.
 */
export function createGoToImplementationHandler(
  services: ServerServices,
  state: ServerState
): GoToImplementationHandler {
  return new GoToImplementationHandler(services, state);
}
