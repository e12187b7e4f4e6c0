/**
 * Handlers Module - LSP Request Handlers
 *
 * Architecture:
 * - Each handler is a self-contained class implementing IHandler
 * - Dependencies are injected via constructor (ServerServices, ServerState)
 * - HandlerRegistry manages handler lifecycle (registration, disposal)
 */

// Types and interfaces
export * from './types.js';

// Registry
export { HandlerRegistry } from './HandlerRegistry.js';

// Handlers
export {
  InitializationHandler,
  createInitializationHandler,
  extractSettings
} from './InitializationHandler.js';

export {
  GoToImplementationHandler,
  createGoToImplementationHandler,
  CommandStateRequest,
  isTextDocumentPositionParams
} from './goToImplementationHandler.js';
export type { CommandState } from './goToImplementationHandler.js';
