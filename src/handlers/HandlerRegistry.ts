/**
 * HandlerRegistry - Centralized management of LSP request handlers.
 *
 * Usage:
 * ```typescript
 * const registry = new HandlerRegistry(services, state);
 * registry.register(createInitializationHandler);
 * registry.register(createGoToImplementationHandler);
 *
 * // During shutdown:
 * await registry.disposeAll();
 * ```
 */

import type {
  IHandler,
  HandlerFactory,
  ServerServices,
  ServerState
} from './types.js';

/**
 * Registry for managing LSP request handlers.
 * Provides dependency injection and lifecycle management.
 */
export class HandlerRegistry {
  private handlers: Map<string, IHandler> = new Map();
  private services: ServerServices;
  private state: ServerState;

  constructor(services: ServerServices, state: ServerState) {
    this.services = services;
    this.state = state;
  }

  /**
   * Create a handler through `factory` and register it with the connection.
   */
  register<T extends IHandler>(factory: HandlerFactory<T>): T {
    const handler = factory(this.services, this.state);

    if (this.handlers.has(handler.name)) {
      this.services.logger.warn(
        `[HandlerRegistry] Handler "${handler.name}" already registered, replacing...`
      );
    }

    this.handlers.set(handler.name, handler);
    handler.register();

    this.services.logger.info(`[HandlerRegistry] Registered handler: ${handler.name}`);

    return handler;
  }

  /**
   * Dispose of all handlers.
   * Should be called during server shutdown.
   */
  async disposeAll(): Promise<void> {
    this.services.logger.info(`[HandlerRegistry] Disposing ${this.handlers.size} handlers...`);

    const disposePromises: Promise<void>[] = [];

    for (const [name, handler] of this.handlers) {
      if (handler.dispose) {
        disposePromises.push(
          handler.dispose().catch((error: unknown) => {
            this.services.logger.error(`[HandlerRegistry] Error disposing handler "${name}"`, error);
          })
        );
      }
    }

    await Promise.all(disposePromises);
    this.handlers.clear();

    this.services.logger.info('[HandlerRegistry] All handlers disposed');
  }
}
