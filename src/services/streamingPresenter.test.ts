import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Connection } from 'vscode-languageserver/node.js';

import { createMockCollaborators, createTestDefinition, type MockCollaborators } from '../test/mocks/MockServices.js';
import { NullLogger } from '../utils/Logger.js';
import { NotificationSeverity } from './notificationService.js';
import {
  LspFindUsagesPresenter,
  PresentResultsNotification,
  createLazy,
  getStreamingPresenter,
  type Lazy,
  type StreamingFindUsagesPresenter
} from './streamingPresenter.js';

describe('LspFindUsagesPresenter', () => {
  const d1 = createTestDefinition('file:///test/a.ts', 3, 6, 'Circle');
  const d2 = createTestDefinition('file:///test/b.ts', 8, 6, 'Square');
  let mocks: MockCollaborators;
  let sent: Array<{ type: unknown; params: unknown }>;
  let presenter: LspFindUsagesPresenter;

  beforeEach(() => {
    mocks = createMockCollaborators();
    sent = [];
    const connection: Pick<Connection, 'sendNotification'> = {
      sendNotification: async (type: unknown, params?: unknown) => {
        sent.push({ type, params });
      }
    };
    presenter = new LspFindUsagesPresenter(
      connection,
      mocks.navigationService,
      mocks.notificationService,
      new NullLogger()
    );
  });

  it('should tell the user when there are no results', async () => {
    const presented = await presenter.tryNavigateToOrPresentItems('/test/workspace', "'IShape' implementations", []);

    expect(presented).toBe(false);
    expect(mocks.notificationService.sendNotification).toHaveBeenCalledWith(
      `No results found for "'IShape' implementations".`,
      'Go To Implementation',
      NotificationSeverity.Information
    );
    expect(sent).toEqual([]);
    expect(mocks.navigationService.navigateTo).not.toHaveBeenCalled();
  });

  it('should navigate to a lone result', async () => {
    const presented = await presenter.tryNavigateToOrPresentItems('/test/workspace', 'Implementations', [d1]);

    expect(presented).toBe(true);
    expect(mocks.navigationService.navigateTo).toHaveBeenCalledWith(d1);
    expect(sent).toEqual([]);
  });

  it('should send several results to the client in reported order', async () => {
    const presented = await presenter.tryNavigateToOrPresentItems('/test/workspace', 'Implementations', [d2, d1]);

    expect(presented).toBe(true);
    expect(sent).toEqual([{
      type: PresentResultsNotification,
      params: {
        workspaceRoot: '/test/workspace',
        title: 'Implementations',
        locations: [d2.location, d1.location],
        items: [d2, d1]
      }
    }]);
    expect(mocks.navigationService.navigateTo).not.toHaveBeenCalled();
  });

  it('should use the presentResults method name', () => {
    expect(PresentResultsNotification.method).toBe('goToImplementation/presentResults');
  });
});

describe('getStreamingPresenter', () => {
  const logger = new NullLogger();
  const presenter: StreamingFindUsagesPresenter = {
    tryNavigateToOrPresentItems: async () => true
  };

  it('should return the first presenter', () => {
    const second: StreamingFindUsagesPresenter = { tryNavigateToOrPresentItems: async () => false };

    expect(getStreamingPresenter([createLazy(() => presenter), createLazy(() => second)], logger)).toBe(presenter);
  });

  it('should return undefined when there is none', () => {
    expect(getStreamingPresenter([], logger)).toBeUndefined();
  });

  it('should return undefined when building the presenter fails', () => {
    const broken: Lazy<StreamingFindUsagesPresenter> = createLazy(() => {
      throw new Error('presenter package missing');
    });

    expect(getStreamingPresenter([broken], logger)).toBeUndefined();
  });
});

describe('createLazy', () => {
  it('should build the value once, on first access', () => {
    const factory = vi.fn(() => ({ id: 1 }));
    const lazy = createLazy(factory);

    expect(factory).not.toHaveBeenCalled();
    const first = lazy.value;
    const second = lazy.value;

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
  });
});
