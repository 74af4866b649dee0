import { Body, Controller, Delete, Get, Param, Post, Query } from '@nestjs/common';
import {
  CreatePickupDto,
  PickupListQueryDto,
  type PaginatedPickupsDto,
  type PickupReadDto,
} from './dto/pickup.dto';
import { PickupsService, toPaginatedRead, toPickupRead } from './pickups.service';

@Controller('pickups')
export class PickupsController {
  constructor(private readonly pickupsService: PickupsService) {}

  @Post()
  create(@Body() dto: CreatePickupDto): PickupReadDto {
    return toPickupRead(this.pickupsService.create(dto));
  }

  @Get()
  findAll(@Query() query: PickupListQueryDto): PaginatedPickupsDto {
    return toPaginatedRead(this.pickupsService.findAll(query.page, query.items_per_page));
  }

  @Get(':pickupId')
  findOne(@Param('pickupId') pickupId: string): PickupReadDto {
    return toPickupRead(this.pickupsService.getActive(pickupId));
  }

  @Delete(':pickupId')
  cancel(@Param('pickupId') pickupId: string) {
    this.pickupsService.cancel(pickupId);
    return { message: 'Pickup cancelled successfully' };
  }
}
