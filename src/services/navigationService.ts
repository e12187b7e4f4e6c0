import type { RemoteWindow } from 'vscode-languageserver/node.js';

import type { DefinitionItem } from '../types.js';
import type { ILogger } from '../utils/Logger.js';

export interface INavigationService {
  navigateTo(definition: DefinitionItem): Promise<boolean>;
}

/**
 * Navigates by asking the client to open the item's document with the
 * item's range selected (`window/showDocument`).
 */
export class LspNavigationService implements INavigationService {
  constructor(
    private readonly window: Pick<RemoteWindow, 'showDocument'>,
    private readonly logger: ILogger
  ) {}

  async navigateTo(definition: DefinitionItem): Promise<boolean> {
    const { uri, range } = definition.location;

    const result = await this.window.showDocument({
      uri,
      takeFocus: true,
      selection: range
    });

    if (!result.success) {
      this.logger.warn(`[NavigationService] Client could not open ${uri} for ${definition.displayName}`);
    }

    return result.success;
  }
}
