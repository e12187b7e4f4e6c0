import { describe, it, expect } from 'vitest';

import { createTestDefinition } from '../test/mocks/MockServices.js';
import { routeOutcome } from './resultRouter.js';

describe('routeOutcome', () => {
  const d1 = createTestDefinition('file:///test/a.ts', 3, 6, 'Circle');
  const d2 = createTestDefinition('file:///test/b.ts', 8, 6, 'Square');

  it('should show a message and ignore everything else', () => {
    expect(routeOutcome({ kind: 'message', message: 'No implementations found.' })).toEqual({
      kind: 'showMessage',
      message: 'No implementations found.'
    });
  });

  it('should navigate straight to a single definition', () => {
    expect(routeOutcome({ kind: 'definitions', title: 'Implementations', definitions: [d1] })).toEqual({
      kind: 'navigate',
      definition: d1
    });
  });

  it('should present several definitions in their original order', () => {
    const action = routeOutcome({ kind: 'definitions', title: "'IShape' implementations", definitions: [d2, d1] });

    expect(action).toEqual({ kind: 'present', title: "'IShape' implementations", definitions: [d2, d1] });
  });

  it('should present an empty result so the presenter decides what to show', () => {
    expect(routeOutcome({ kind: 'definitions', title: 'Implementations', definitions: [] })).toEqual({
      kind: 'present',
      title: 'Implementations',
      definitions: []
    });
  });

  it.each([true, false])('should route nothing for a completed one-shot lookup (handled=%s)', handled => {
    expect(routeOutcome({ kind: 'completed', handled })).toBeUndefined();
  });

  it('should route the same outcome the same way every time', () => {
    const outcome = { kind: 'definitions', title: 'Implementations', definitions: [d1, d2] } as const;

    expect(routeOutcome(outcome)).toEqual(routeOutcome(outcome));
  });
});
