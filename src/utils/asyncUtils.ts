/**
 * Async utilities for cancellation-aware waiting.
 *
 * Cancellation tokens are the LSP ones, so a request token from the connection
 * can be passed straight through.
 */

import {
  CancellationToken,
  CancellationTokenSource,
  Disposable,
  LSPErrorCodes
} from 'vscode-languageserver/node.js';

/**
 * Error thrown when an operation is cancelled.
 */
export class CancellationError extends Error {
  readonly code = LSPErrorCodes.RequestCancelled;

  constructor(message: string = 'Operation cancelled') {
    super(message);
    this.name = 'CancellationError';
  }
}

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

/**
 * Check if cancellation is requested and throw if so.
 *
 * @throws CancellationError if cancellation is requested
 */
export function throwIfCancelled(token?: CancellationToken): void {
  if (token?.isCancellationRequested) {
    throw new CancellationError();
  }
}

/**
 * Wait for `work` to settle, or reject with a CancellationError as soon as
 * `token` fires, whichever comes first.
 *
 * This is the single join point between a caller that needs a final answer and
 * work that may still be running. The cancellation listener is removed on
 * every exit path. A rejection of `work` that arrives after cancellation is
 * observed and dropped.
 *
 * @example
 * const collector = new FindUsagesCollector(token);
 * await awaitOrCancel(service.findImplementations(document, offset, collector), token);
 */
export function awaitOrCancel<T>(work: Promise<T>, token: CancellationToken): Promise<T> {
  if (token.isCancellationRequested) {
    work.catch(() => undefined);
    return Promise.reject(new CancellationError());
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let listener: Disposable | undefined;

    const finish = (): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      listener?.dispose();
      return true;
    };

    listener = token.onCancellationRequested(() => {
      if (finish()) {
        reject(new CancellationError());
      }
    });

    work.then(
      value => {
        if (finish()) {
          resolve(value);
        }
      },
      (error: unknown) => {
        if (finish()) {
          reject(error);
        }
      }
    );
  });
}

/**
 * Cancellation source linked to one or more parent tokens.
 */
export interface LinkedCancellationSource extends Disposable {
  readonly token: CancellationToken;
  cancel(): void;
}

/**
 * Create a token source that is cancelled when any of `tokens` is cancelled.
 * Dispose the returned source to detach it from its parents.
 */
export function linkCancellationTokens(...tokens: CancellationToken[]): LinkedCancellationSource {
  const source = new CancellationTokenSource();
  const listeners: Disposable[] = [];

  for (const token of tokens) {
    if (token.isCancellationRequested) {
      source.cancel();
      break;
    }
    listeners.push(token.onCancellationRequested(() => source.cancel()));
  }

  return {
    token: source.token,
    cancel: () => source.cancel(),
    dispose: () => {
      for (const listener of listeners) {
        listener.dispose();
      }
      source.dispose();
    }
  };
}
