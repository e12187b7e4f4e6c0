/**
 * Application-wide constants.
 */

/**
 * Command and custom LSP method names
 */
export const COMMANDS = {
  GO_TO_IMPLEMENTATION: 'goToImplementation.execute',
  COMMAND_STATE: 'goToImplementation/commandState',
  PRESENT_RESULTS: 'goToImplementation/presentResults'
} as const;

/**
 * User-facing strings
 */
export const GO_TO_IMPLEMENTATION_TEXT = {
  HANDLER_NAME: 'Go To Implementation Command Handler',
  TITLE: 'Go To Implementation',
  LOCATING: 'Locating implementations...',
  DEFAULT_SEARCH_TITLE: 'Implementations'
} as const;

/**
 * Settings section read from initializationOptions and didChangeConfiguration
 */
export const SETTINGS_SECTION = 'goToImplementation';
