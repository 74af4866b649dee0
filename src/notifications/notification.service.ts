import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Pickup } from '../pickups/entities/pickup.entity';
import {
  NOTIFICATION_PROVIDER,
  type NotificationProvider,
} from './providers/notification-provider.interface';

export type NotificationStatus = 'sent' | 'skipped' | 'failed';

export type NotificationChannel = 'email';

export interface NotificationResult {
  status: NotificationStatus;
  channel: NotificationChannel | null;
  message: string;
  error?: string;
}

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(@Inject(NOTIFICATION_PROVIDER) private readonly provider: NotificationProvider) {}

  async sendPickupReminder(pickup: Pickup): Promise<NotificationResult> {
    const recipient = pickup.contactDetails.email;
    if (!recipient) {
      this.logger.warn(`No email found for pickup ${pickup.pickupId}`);
      return { status: 'skipped', channel: null, message: 'No recipient email configured' };
    }

    const subject = `Pickup Reminder: ${pickup.pickupId}`;
    const body = [
      `Hello ${pickup.contactDetails.name || 'Customer'},`,
      '',
      `This is a reminder that your pickup (${pickup.pickupId}) is scheduled to start at ${pickup.pickupWindow.startAt.toISOString()}.`,
      '',
      'Please ensure your packages are ready for collection.',
      '',
      'Thank you!',
    ].join('\n');

    try {
      const delivered = await this.provider.send(recipient, subject, body);
      if (!delivered) {
        this.logger.error(`Notification provider rejected reminder for pickup ${pickup.pickupId}`);
        return {
          status: 'failed',
          channel: 'email',
          message: 'Provider returned failure',
          error: 'send() returned false',
        };
      }

      this.logger.log(`Notification sent for pickup ${pickup.pickupId} to ${recipient}`);
      return { status: 'sent', channel: 'email', message: `Notification sent to ${recipient}` };
    } catch (error) {
      this.logger.error(
        `Failed to send notification for pickup ${pickup.pickupId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return {
        status: 'failed',
        channel: 'email',
        message: 'Exception during send',
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
