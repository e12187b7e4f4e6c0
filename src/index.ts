export { createServer } from './server.js';
export type { CreateServerOptions, GoToImplementationServer } from './server.js';

export { ConfigurationManager } from './config/configurationManager.js';
export type { GoToImplementationConfig, IGoToImplementationSettings } from './config/configurationManager.js';

export { COMMANDS, GO_TO_IMPLEMENTATION_TEXT, SETTINGS_SECTION } from './constants.js';

export { executeStrategy } from './goToImplementation/boundedExecutor.js';
export type { LookupOutcome, RunnableStrategy } from './goToImplementation/boundedExecutor.js';
export { isAvailable, resolveCapabilities, NO_CAPABILITIES } from './goToImplementation/capabilityResolver.js';
export type { CapabilitySet } from './goToImplementation/capabilityResolver.js';
export { FindUsagesCollector } from './goToImplementation/findUsagesCollector.js';
export { OutcomeDispatcher } from './goToImplementation/outcomeDispatcher.js';
export { routeOutcome } from './goToImplementation/resultRouter.js';
export type { Action } from './goToImplementation/resultRouter.js';
export { selectStrategy } from './goToImplementation/strategySelector.js';
export type { Strategy } from './goToImplementation/strategySelector.js';

export * from './handlers/index.js';

export { LanguageServiceRegistry } from './services/languageServiceRegistry.js';
export { LspNavigationService } from './services/navigationService.js';
export type { INavigationService } from './services/navigationService.js';
export { LspNotificationService, NotificationSeverity } from './services/notificationService.js';
export type { INotificationService } from './services/notificationService.js';
export {
  LspFindUsagesPresenter,
  PresentResultsNotification,
  createLazy,
  getStreamingPresenter
} from './services/streamingPresenter.js';
export type { Lazy, PresentResultsParams, StreamingFindUsagesPresenter } from './services/streamingPresenter.js';
export { LspWaitContext } from './services/waitContext.js';
export type { WaitContext, WaitScope, WaitScopeOptions } from './services/waitContext.js';

export type * from './types.js';

export { CancellationError, awaitOrCancel, isCancellationError, linkCancellationTokens } from './utils/asyncUtils.js';
export { LoggerService, LogLevel, NullLogger } from './utils/Logger.js';
export type { ILogger } from './utils/Logger.js';
