import type { FindUsagesService, GoToImplementationService } from '../types.js';
import type { CapabilitySet } from './capabilityResolver.js';

export type Strategy =
  | { readonly kind: 'streaming'; readonly service: FindUsagesService }
  | { readonly kind: 'synchronous'; readonly service: GoToImplementationService }
  | { readonly kind: 'none' };

/**
 * Pick the lookup to run. With both services present the streaming toggle
 * decides; with one present that one runs whatever the toggle says.
 */
export function selectStrategy(capabilities: CapabilitySet, streamingEnabled: boolean): Strategy {
  const { streaming, synchronous } = capabilities;

  if (streaming && (streamingEnabled || !synchronous)) {
    return { kind: 'streaming', service: streaming };
  }
  if (synchronous) {
    return { kind: 'synchronous', service: synchronous };
  }
  return { kind: 'none' };
}
