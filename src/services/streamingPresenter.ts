import {
  NotificationType,
  type Connection,
  type Location
} from 'vscode-languageserver/node.js';

import { COMMANDS, GO_TO_IMPLEMENTATION_TEXT } from '../constants.js';
import type { DefinitionItem } from '../types.js';
import type { ILogger } from '../utils/Logger.js';
import type { INavigationService } from './navigationService.js';
import { NotificationSeverity, type INotificationService } from './notificationService.js';

/**
 * Hands a finished search to the user: jumps straight to a lone result, or
 * shows the full list.
 */
export interface StreamingFindUsagesPresenter {
  tryNavigateToOrPresentItems(
    workspaceRoot: string,
    title: string,
    definitions: readonly DefinitionItem[]
  ): Promise<boolean>;
}

/**
 * Value built on first access.
 */
export interface Lazy<T> {
  readonly value: T;
}

export function createLazy<T>(factory: () => T): Lazy<T> {
  let holder: { instance: T } | undefined;
  return {
    get value(): T {
      if (!holder) {
        holder = { instance: factory() };
      }
      return holder.instance;
    }
  };
}

/**
 * First available presenter, or undefined when there is none or building it
 * fails.
 */
export function getStreamingPresenter(
  presenters: readonly Lazy<StreamingFindUsagesPresenter>[],
  logger: ILogger
): StreamingFindUsagesPresenter | undefined {
  try {
    return presenters[0]?.value;
  } catch (error) {
    logger.warn(`[StreamingPresenter] Presenter unavailable: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

export interface PresentResultsParams {
  workspaceRoot: string;
  title: string;
  locations: Location[];
  items: DefinitionItem[];
}

export const PresentResultsNotification = new NotificationType<PresentResultsParams>(COMMANDS.PRESENT_RESULTS);

/**
 * Presenter for LSP clients.
 *
 * - no items: an information message, returns false
 * - one item: navigates to it
 * - several: a `goToImplementation/presentResults` notification carrying the
 *   items in reported order, for the client to show as a list
 */
export class LspFindUsagesPresenter implements StreamingFindUsagesPresenter {
  constructor(
    private readonly connection: Pick<Connection, 'sendNotification'>,
    private readonly navigationService: INavigationService,
    private readonly notificationService: INotificationService,
    private readonly logger: ILogger
  ) {}

  async tryNavigateToOrPresentItems(
    workspaceRoot: string,
    title: string,
    definitions: readonly DefinitionItem[]
  ): Promise<boolean> {
    if (definitions.length === 0) {
      this.notificationService.sendNotification(
        `No results found for "${title}".`,
        GO_TO_IMPLEMENTATION_TEXT.TITLE,
        NotificationSeverity.Information
      );
      return false;
    }

    if (definitions.length === 1) {
      return this.navigationService.navigateTo(definitions[0]);
    }

    this.logger.info(`[StreamingPresenter] Presenting ${definitions.length} results for "${title}"`);
    await this.connection.sendNotification(PresentResultsNotification, {
      workspaceRoot,
      title,
      locations: definitions.map(d => d.location),
      items: [...definitions]
    });
    return true;
  }
}
