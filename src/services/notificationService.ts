import {
  MessageType,
  ShowMessageNotification,
  type Connection
} from 'vscode-languageserver/node.js';

import type { ILogger } from '../utils/Logger.js';

export enum NotificationSeverity {
  Information = 'information',
  Warning = 'warning',
  Error = 'error'
}

export interface INotificationService {
  sendNotification(message: string, title: string, severity: NotificationSeverity): void;
}

function toMessageType(severity: NotificationSeverity): MessageType {
  switch (severity) {
    case NotificationSeverity.Error:
      return MessageType.Error;
    case NotificationSeverity.Warning:
      return MessageType.Warning;
    default:
      return MessageType.Info;
  }
}

/**
 * Sends notifications as `window/showMessage`. LSP messages carry no title,
 * so the title only goes to the log.
 */
export class LspNotificationService implements INotificationService {
  constructor(
    private readonly connection: Pick<Connection, 'sendNotification'>,
    private readonly logger: ILogger
  ) {}

  sendNotification(message: string, title: string, severity: NotificationSeverity): void {
    this.logger.debug(`[NotificationService] ${title} (${severity}): ${message}`);

    this.connection
      .sendNotification(ShowMessageNotification.type, { type: toMessageType(severity), message })
      .catch((error: unknown) => {
        this.logger.error(`[NotificationService] Failed to show "${message}"`, error);
      });
  }
}
