import type { CancellationToken } from 'vscode-languageserver/node.js';

import { GO_TO_IMPLEMENTATION_TEXT } from '../constants.js';
import type { DefinitionItem, FindUsagesContext } from '../types.js';

function definitionKey(item: DefinitionItem): string {
  const { uri, range } = item.location;
  return `${uri}:${range.start.line}:${range.start.character}`;
}

/**
 * Collects what a streaming search reports for one request.
 *
 * Definitions keep their reporting order; a second report of the same location
 * is dropped. Once the token is cancelled nothing more is accepted.
 */
export class FindUsagesCollector implements FindUsagesContext {
  private readonly definitions: DefinitionItem[] = [];
  private readonly seen = new Set<string>();
  private message: string | undefined;
  private searchTitle: string = GO_TO_IMPLEMENTATION_TEXT.DEFAULT_SEARCH_TITLE;

  constructor(readonly cancellationToken: CancellationToken) {}

  reportDefinition(item: DefinitionItem): void {
    if (this.cancellationToken.isCancellationRequested) {
      return;
    }

    const key = definitionKey(item);
    if (this.seen.has(key)) {
      return;
    }
    this.seen.add(key);
    this.definitions.push(item);
  }

  reportMessage(message: string): void {
    if (this.cancellationToken.isCancellationRequested || message.length === 0) {
      return;
    }
    this.message = message;
  }

  setSearchTitle(title: string): void {
    this.searchTitle = title;
  }

  getMessage(): string | undefined {
    return this.message;
  }

  getSearchTitle(): string {
    return this.searchTitle;
  }

  getDefinitions(): readonly DefinitionItem[] {
    return [...this.definitions];
  }
}
