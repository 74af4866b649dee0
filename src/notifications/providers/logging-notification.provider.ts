import { Injectable, Logger } from '@nestjs/common';
import type { NotificationProvider } from './notification-provider.interface';

/**
 * Writes notifications to the log instead of delivering them.
 */
@Injectable()
export class LoggingNotificationProvider implements NotificationProvider {
  private readonly logger = new Logger(LoggingNotificationProvider.name);

  async send(recipient: string, subject: string, body: string): Promise<boolean> {
    this.logger.log(`NOTIFICATION [${recipient}]: ${subject} - ${body}`);
    return true;
  }
}
