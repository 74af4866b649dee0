import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { PickupsService } from '../pickups/pickups.service';
import { PICKUP_CANCELLED, PickupCancelledEvent } from '../pickups/events/pickup.events';
import type { Job } from '../queue/job.entity';
import { QueueService } from '../queue/queue.service';
import {
  PickupNotificationPayloadSchema,
  SchedulingService,
  SEND_PICKUP_NOTIFICATION,
} from '../queue/scheduling.service';
import { NotificationService } from './notification.service';

@Injectable()
export class PickupNotificationWorker implements OnModuleInit {
  private readonly logger = new Logger(PickupNotificationWorker.name);

  constructor(
    private readonly queueService: QueueService,
    private readonly schedulingService: SchedulingService,
    private readonly pickupsService: PickupsService,
    private readonly notificationService: NotificationService,
  ) {}

  onModuleInit() {
    this.queueService.registerHandler(SEND_PICKUP_NOTIFICATION, (payload, job) =>
      this.sendPickupNotification(payload, job),
    );
  }

  /**
   * Job body for `send_pickup_notification`. Never modifies the pickup.
   *
   * A sent reminder is recorded on the job before the queue completes it. A job
   * requeued after a crash in between sees the record and does not send again.
   */
  async sendPickupNotification(
    payload: unknown,
    job: Job | null = null,
    now: Date = new Date(),
  ): Promise<string> {
    const { pickupId } = PickupNotificationPayloadSchema.parse(payload);

    if (job?.deliveredAt) {
      this.logger.warn(
        `Notification for pickup ${pickupId} already sent at ${job.deliveredAt.toISOString()}; not sending again`,
      );
      return `Notification already sent for pickup ${pickupId}`;
    }

    const eligibility = this.pickupsService.validateForNotification(pickupId, now);
    if (!eligibility.eligible) {
      this.logger.log(`Skipping notification for pickup ${pickupId}: ${eligibility.reason}`);
      return `Notification skipped for pickup ${pickupId}: ${eligibility.reason}`;
    }

    const result = await this.notificationService.sendPickupReminder(eligibility.pickup);
    switch (result.status) {
      case 'sent':
        if (job) {
          this.queueService.markDelivered(job.id, now);
        }
        return `Notification sent for pickup ${pickupId}`;
      case 'skipped':
        this.logger.warn(`Notification skipped for pickup ${pickupId}: ${result.message}`);
        return `Notification skipped for pickup ${pickupId}: ${result.message}`;
      case 'failed':
        this.logger.error(
          `Notification failed for pickup ${pickupId}: ${result.error ?? result.message}`,
        );
        return `Notification failed for pickup ${pickupId}: ${result.message}`;
    }
  }

  @OnEvent(PICKUP_CANCELLED)
  handlePickupCancelled(event: PickupCancelledEvent) {
    if (!event.notificationJobId) return;

    if (this.schedulingService.cancelPickupNotification(event.notificationJobId)) {
      this.logger.log(`Withdrew notification ${event.notificationJobId} for pickup ${event.pickupId}`);
    }
  }
}
