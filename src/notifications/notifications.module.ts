import { Module } from '@nestjs/common';
import { PickupsModule } from '../pickups/pickups.module';
import { QueueModule } from '../queue/queue.module';
import { NotificationService } from './notification.service';
import { PickupNotificationWorker } from './pickup-notification.worker';
import { LoggingNotificationProvider } from './providers/logging-notification.provider';
import { NOTIFICATION_PROVIDER } from './providers/notification-provider.interface';

@Module({
  imports: [QueueModule, PickupsModule],
  providers: [
    { provide: NOTIFICATION_PROVIDER, useClass: LoggingNotificationProvider },
    NotificationService,
    PickupNotificationWorker,
  ],
  exports: [NotificationService],
})
export class NotificationsModule {}
