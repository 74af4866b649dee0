import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { QueueModule } from '../queue/queue.module';
import { PickupsController } from './pickups.controller';
import { PickupsService } from './pickups.service';

@Module({
  imports: [DatabaseModule, QueueModule],
  controllers: [PickupsController],
  providers: [PickupsService],
  exports: [PickupsService],
})
export class PickupsModule {}
