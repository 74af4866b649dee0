import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { QueueService } from './queue.service';

export const SEND_PICKUP_NOTIFICATION = 'send_pickup_notification';

/** Reminders go out this long before the pickup window opens. */
export const PICKUP_NOTIFICATION_LEAD_MS = 60 * 60 * 1000;

export const PickupNotificationPayloadSchema = z.object({
  pickupId: z.string().min(1),
});

export type PickupNotificationPayload = z.infer<typeof PickupNotificationPayloadSchema>;

export interface JobHandle {
  jobId: string;
  runAt: Date;
  /** True when the fire time had already passed and the job runs on the next poll. */
  immediate: boolean;
}

@Injectable()
export class SchedulingService {
  private readonly logger = new Logger(SchedulingService.name);

  constructor(private readonly queueService: QueueService) {}

  schedulePickupNotification(pickupId: string, pickupTime: Date, now: Date = new Date()): JobHandle {
    const fireAt = new Date(pickupTime.getTime() - PICKUP_NOTIFICATION_LEAD_MS);
    const immediate = fireAt.getTime() <= now.getTime();
    const runAt = immediate ? now : fireAt;

    if (immediate) {
      this.logger.warn(
        `Notification time for pickup ${pickupId} (${fireAt.toISOString()}) has passed; sending immediately`,
      );
    }

    const payload: PickupNotificationPayload = { pickupId };
    const job = this.queueService.enqueue(SEND_PICKUP_NOTIFICATION, payload, runAt);
    return { jobId: job.id, runAt, immediate };
  }

  cancelPickupNotification(jobId: string): boolean {
    return this.queueService.cancel(jobId);
  }
}
