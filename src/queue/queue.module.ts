import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { QueueService } from './queue.service';
import { SchedulingService } from './scheduling.service';

@Module({
  imports: [DatabaseModule],
  providers: [QueueService, SchedulingService],
  exports: [QueueService, SchedulingService],
})
export class QueueModule {}
