import type { DefinitionItem } from '../types.js';
import type { LookupOutcome } from './boundedExecutor.js';

export type Action =
  | { readonly kind: 'showMessage'; readonly message: string }
  | { readonly kind: 'navigate'; readonly definition: DefinitionItem }
  | { readonly kind: 'present'; readonly title: string; readonly definitions: readonly DefinitionItem[] };

/**
 * Decide what the user sees for a finished lookup.
 *
 * A message always wins. A single definition is jumped to directly; none or
 * several go to the presenter. A one-shot lookup that already ran to
 * completion needs nothing further, so it routes to `undefined`.
 */
export function routeOutcome(outcome: LookupOutcome): Action | undefined {
  switch (outcome.kind) {
    case 'message':
      return { kind: 'showMessage', message: outcome.message };
    case 'completed':
      return undefined;
    case 'definitions':
      if (outcome.definitions.length === 1) {
        return { kind: 'navigate', definition: outcome.definitions[0] };
      }
      return { kind: 'present', title: outcome.title, definitions: outcome.definitions };
  }
}
