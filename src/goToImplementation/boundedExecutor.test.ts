/**
 * Bounded executor tests: both lookups run inside a cancellable wait scope
 * and the scope is released on every exit path.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TextDocument } from 'vscode-languageserver-textdocument';

import {
  DeferredStreamingService,
  DeferredSynchronousService,
  RecordingWaitContext,
  createStreamingService,
  createSynchronousService,
  createTestDefinition
} from '../test/mocks/MockServices.js';
import type { GoToImplementationRequest } from '../types.js';
import { CancellationError } from '../utils/asyncUtils.js';
import { NullLogger } from '../utils/Logger.js';
import { executeStrategy } from './boundedExecutor.js';

const SCOPE_OPENED = 'scope:Locating implementations...:true';

describe('executeStrategy', () => {
  const logger = new NullLogger();
  const uri = 'file:///test/shapes.ts';
  const document = TextDocument.create(uri, 'typescript', 1, 'interface IShape {}\nclass Circle implements IShape {}');
  let waitContext: RecordingWaitContext;
  let request: GoToImplementationRequest;

  beforeEach(() => {
    waitContext = new RecordingWaitContext();
    request = { document, caretOffset: 12, cancellationToken: waitContext.userCancellationToken };
  });

  describe('synchronous lookup', () => {
    it('should report a completed lookup that navigated on its own', async () => {
      const service = createSynchronousService({ handled: true });

      const outcome = await executeStrategy({ kind: 'synchronous', service }, request, waitContext, logger);

      expect(outcome).toEqual({ kind: 'completed', handled: true });
      expect(service.tryGoToImplementation).toHaveBeenCalledTimes(1);
      expect(service.tryGoToImplementation).toHaveBeenCalledWith(document, 12, waitContext.userCancellationToken);
      expect(waitContext.events).toEqual([SCOPE_OPENED, 'scope-end']);
    });

    it('should turn a returned message into a message outcome', async () => {
      const service = createSynchronousService({ handled: true, message: 'Symbol has no implementations.' });

      const outcome = await executeStrategy({ kind: 'synchronous', service }, request, waitContext, logger);

      expect(outcome).toEqual({ kind: 'message', message: 'Symbol has no implementations.' });
    });

    it('should unwind with CancellationError when cancelled, even if the lookup ignores its token', async () => {
      const service = new DeferredSynchronousService();

      const pending = executeStrategy({ kind: 'synchronous', service }, request, waitContext, logger);
      waitContext.cancel();

      await expect(pending).rejects.toBeInstanceOf(CancellationError);
      expect(waitContext.events).toEqual([SCOPE_OPENED, 'scope-end']);

      service.lastLookup.resolve({ handled: false, message: 'Symbol has no implementations.' });
      expect(service.lastLookup.caretOffset).toBe(12);
    });

    it('should release the scope when the lookup throws', async () => {
      const service = createSynchronousService({ handled: false });
      service.tryGoToImplementation.mockRejectedValueOnce(new Error('compiler crashed'));

      await expect(
        executeStrategy({ kind: 'synchronous', service }, request, waitContext, logger)
      ).rejects.toThrow('compiler crashed');
      expect(waitContext.events).toEqual([SCOPE_OPENED, 'scope-end']);
    });
  });

  describe('streaming lookup', () => {
    it('should return the reported definitions in order with the search title', async () => {
      const d1 = createTestDefinition(uri, 1, 6, 'Circle');
      const d2 = createTestDefinition('file:///test/square.ts', 0, 6, 'Square');
      const service = createStreamingService([d1, d2], { title: "'IShape' implementations" });

      const outcome = await executeStrategy({ kind: 'streaming', service }, request, waitContext, logger);

      expect(outcome).toEqual({
        kind: 'definitions',
        title: "'IShape' implementations",
        definitions: [d1, d2]
      });
      expect(waitContext.events).toEqual([SCOPE_OPENED, 'scope-end']);
    });

    it('should use the default title when the search sets none', async () => {
      const service = createStreamingService([]);

      const outcome = await executeStrategy({ kind: 'streaming', service }, request, waitContext, logger);

      expect(outcome).toEqual({ kind: 'definitions', title: 'Implementations', definitions: [] });
    });

    it('should let a message replace any reported definitions', async () => {
      const service = createStreamingService([createTestDefinition(uri, 1, 6)], {
        message: 'No implementations found.'
      });

      const outcome = await executeStrategy({ kind: 'streaming', service }, request, waitContext, logger);

      expect(outcome).toEqual({ kind: 'message', message: 'No implementations found.' });
    });

    it('should hold incremental reports until the search completes', async () => {
      const service = new DeferredStreamingService();
      const d1 = createTestDefinition(uri, 1, 6, 'Circle');
      let settled = false;

      const pending = executeStrategy({ kind: 'streaming', service }, request, waitContext, logger).then(outcome => {
        settled = true;
        return outcome;
      });

      service.lastSearch.context.reportDefinition(d1);
      await Promise.resolve();
      expect(settled).toBe(false);

      service.lastSearch.resolve();
      await expect(pending).resolves.toEqual({ kind: 'definitions', title: 'Implementations', definitions: [d1] });
      expect(service.lastSearch.caretOffset).toBe(12);
    });

    it('should unwind with CancellationError when cancelled mid-search', async () => {
      const service = new DeferredStreamingService();

      const pending = executeStrategy({ kind: 'streaming', service }, request, waitContext, logger);
      service.lastSearch.context.reportDefinition(createTestDefinition(uri, 1, 6));
      waitContext.cancel();

      await expect(pending).rejects.toBeInstanceOf(CancellationError);
      expect(service.lastSearch.context.cancellationToken.isCancellationRequested).toBe(true);
      expect(waitContext.events).toEqual([SCOPE_OPENED, 'scope-end']);
    });

    it('should release the scope when the search fails', async () => {
      const service = new DeferredStreamingService();

      const pending = executeStrategy({ kind: 'streaming', service }, request, waitContext, logger);
      service.lastSearch.reject(new Error('index unavailable'));

      await expect(pending).rejects.toThrow('index unavailable');
      expect(waitContext.events).toEqual([SCOPE_OPENED, 'scope-end']);
    });
  });
});
