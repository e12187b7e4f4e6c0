import { GO_TO_IMPLEMENTATION_TEXT } from '../constants.js';
import type { INavigationService } from '../services/navigationService.js';
import { NotificationSeverity, type INotificationService } from '../services/notificationService.js';
import type { StreamingFindUsagesPresenter } from '../services/streamingPresenter.js';
import type { WaitContext } from '../services/waitContext.js';
import type { ILogger } from '../utils/Logger.js';
import type { Action } from './resultRouter.js';

export interface OutcomeDispatcherDeps {
  notificationService: INotificationService;
  navigationService: INavigationService;
  logger: ILogger;
}

/**
 * Performs a routed action through exactly one collaborator.
 */
export class OutcomeDispatcher {
  constructor(private readonly deps: OutcomeDispatcherDeps) {}

  /**
   * @param presenter - required for `present` actions; the handler only runs
   *   the streaming lookup (the sole source of those) when one exists
   * @returns whether the action reached the user
   */
  async dispatch(
    action: Action,
    waitContext: WaitContext,
    workspaceRoot: string,
    presenter: StreamingFindUsagesPresenter | undefined
  ): Promise<boolean> {
    const { notificationService, navigationService, logger } = this.deps;

    switch (action.kind) {
      case 'showMessage':
        // The message replaces the progress UI; both must never be visible.
        waitContext.takeOwnership();
        notificationService.sendNotification(
          action.message,
          GO_TO_IMPLEMENTATION_TEXT.TITLE,
          NotificationSeverity.Information
        );
        return true;

      case 'navigate':
        logger.debug(`[OutcomeDispatcher] Navigating to ${action.definition.location.uri}`);
        return navigationService.navigateTo(action.definition);

      case 'present':
        if (!presenter) {
          logger.warn('[OutcomeDispatcher] No presenter available, dropping results');
          return false;
        }
        return presenter.tryNavigateToOrPresentItems(workspaceRoot, action.title, action.definitions);
    }
  }
}
