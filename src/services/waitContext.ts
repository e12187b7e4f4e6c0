/**
 * Wait context - the cancellable "please wait" affordance of one command.
 *
 * A command opens scopes while it works; the user can cancel through the
 * progress UI. Before a modal message is shown the handler takes ownership,
 * which ends any progress still on screen.
 */

import type {
  CancellationToken,
  Disposable,
  RemoteWindow,
  WorkDoneProgressServerReporter
} from 'vscode-languageserver/node.js';

import { linkCancellationTokens, type LinkedCancellationSource } from '../utils/asyncUtils.js';

export interface WaitScopeOptions {
  allowCancellation: boolean;
  description: string;
}

export interface WaitScope extends Disposable {
  readonly description: string;
}

export interface WaitContext extends Disposable {
  /** Fires when the user (or the client) gives up on the command */
  readonly userCancellationToken: CancellationToken;
  addScope(options: WaitScopeOptions): WaitScope;
  takeOwnership(): void;
}

/**
 * WaitContext backed by an LSP work-done progress.
 *
 * The progress begins with the first scope and ends when the last open scope
 * is disposed. A progress can only run once, so scopes opened after it ended
 * (or after takeOwnership) show nothing.
 */
export class LspWaitContext implements WaitContext {
  private readonly cancellation: LinkedCancellationSource;
  private openScopes = 0;
  private progressState: 'idle' | 'active' | 'finished' = 'idle';
  private owned = false;

  static async create(
    window: Pick<RemoteWindow, 'createWorkDoneProgress'>,
    requestToken: CancellationToken,
    title: string
  ): Promise<LspWaitContext> {
    const progress = await window.createWorkDoneProgress();
    return new LspWaitContext(progress, requestToken, title);
  }

  constructor(
    private readonly progress: WorkDoneProgressServerReporter,
    requestToken: CancellationToken,
    private readonly title: string
  ) {
    this.cancellation = linkCancellationTokens(requestToken, progress.token);
  }

  get userCancellationToken(): CancellationToken {
    return this.cancellation.token;
  }

  get isOwned(): boolean {
    return this.owned;
  }

  addScope(options: WaitScopeOptions): WaitScope {
    this.openScopes++;

    if (!this.owned) {
      if (this.progressState === 'idle') {
        this.progress.begin(this.title, undefined, options.description, options.allowCancellation);
        this.progressState = 'active';
      } else if (this.progressState === 'active') {
        this.progress.report(options.description);
      }
    }

    let disposed = false;
    return {
      description: options.description,
      dispose: () => {
        if (disposed) {
          return;
        }
        disposed = true;
        this.openScopes--;
        if (this.openScopes === 0) {
          this.endProgress();
        }
      }
    };
  }

  takeOwnership(): void {
    this.owned = true;
    this.endProgress();
  }

  dispose(): void {
    this.endProgress();
    this.cancellation.dispose();
  }

  private endProgress(): void {
    if (this.progressState === 'active') {
      this.progress.done();
    }
    this.progressState = 'finished';
  }
}
