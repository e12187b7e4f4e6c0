import { GO_TO_IMPLEMENTATION_TEXT } from '../constants.js';
import type { WaitContext } from '../services/waitContext.js';
import type { DefinitionItem, GoToImplementationRequest } from '../types.js';
import { awaitOrCancel, throwIfCancelled } from '../utils/asyncUtils.js';
import type { ILogger } from '../utils/Logger.js';
import { FindUsagesCollector } from './findUsagesCollector.js';
import type { Strategy } from './strategySelector.js';

/**
 * What a lookup produced.
 *
 * - `message`: the search explains why there is nothing to show
 * - `definitions`: the found items (possibly none) and the search title
 * - `completed`: the one-shot lookup did its own navigation (or nothing)
 */
export type LookupOutcome =
  | { readonly kind: 'message'; readonly message: string }
  | { readonly kind: 'definitions'; readonly title: string; readonly definitions: readonly DefinitionItem[] }
  | { readonly kind: 'completed'; readonly handled: boolean };

export type RunnableStrategy = Exclude<Strategy, { kind: 'none' }>;

/**
 * Run `strategy` for `request` inside a cancellable wait scope.
 *
 * The scope is released on every exit path. If the request's token fires
 * before the lookup finishes this rejects with a CancellationError and the
 * partial results are discarded.
 */
export async function executeStrategy(
  strategy: RunnableStrategy,
  request: GoToImplementationRequest,
  waitContext: WaitContext,
  logger: ILogger
): Promise<LookupOutcome> {
  const scope = waitContext.addScope({
    allowCancellation: true,
    description: GO_TO_IMPLEMENTATION_TEXT.LOCATING
  });

  try {
    switch (strategy.kind) {
      case 'synchronous':
        return await runSynchronous(strategy, request, logger);
      case 'streaming':
        return await runStreaming(strategy, request, logger);
    }
  } finally {
    scope.dispose();
  }
}

async function runSynchronous(
  strategy: Extract<Strategy, { kind: 'synchronous' }>,
  request: GoToImplementationRequest,
  logger: ILogger
): Promise<LookupOutcome> {
  const { document, caretOffset, cancellationToken } = request;

  const result = await logger.measure(
    'BoundedExecutor',
    'synchronous lookup',
    () => awaitOrCancel(
      strategy.service.tryGoToImplementation(document, caretOffset, cancellationToken),
      cancellationToken
    ),
    { uri: document.uri }
  );
  throwIfCancelled(cancellationToken);

  if (result.message) {
    return { kind: 'message', message: result.message };
  }
  return { kind: 'completed', handled: result.handled };
}

async function runStreaming(
  strategy: Extract<Strategy, { kind: 'streaming' }>,
  request: GoToImplementationRequest,
  logger: ILogger
): Promise<LookupOutcome> {
  const { document, caretOffset, cancellationToken } = request;
  const collector = new FindUsagesCollector(cancellationToken);

  await logger.measure(
    'BoundedExecutor',
    'streaming lookup',
    () => awaitOrCancel(
      strategy.service.findImplementations(document, caretOffset, collector),
      cancellationToken
    ),
    { uri: document.uri }
  );
  throwIfCancelled(cancellationToken);

  const message = collector.getMessage();
  if (message !== undefined) {
    return { kind: 'message', message };
  }

  return {
    kind: 'definitions',
    title: collector.getSearchTitle(),
    definitions: collector.getDefinitions()
  };
}
