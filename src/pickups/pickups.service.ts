import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { ValidationError } from '../common/errors';
import { parseIsoDatetime } from '../common/utils/datetime';
import {
  DatabaseService,
  type PickupAddressRow,
  type PickupRow,
} from '../database/database.service';
import { SchedulingService } from '../queue/scheduling.service';
import type {
  CreatePickupDto,
  PaginatedPickupsDto,
  PickupAddressReadDto,
  PickupReadDto,
} from './dto/pickup.dto';
import type { Pickup, PickupAddress } from './entities/pickup.entity';
import { PICKUP_CANCELLED, PickupCancelledEvent } from './events/pickup.events';

export const PICKUP_ID_PREFIX = 'pik_';
export const PICKUP_ID_SUFFIX_LENGTH = 22;

export function generatePickupId(): string {
  // 16 random bytes encode to exactly 22 base64url characters
  return PICKUP_ID_PREFIX + randomBytes(16).toString('base64url').slice(0, PICKUP_ID_SUFFIX_LENGTH);
}

export interface PaginatedPickups {
  pickups: Pickup[];
  totalCount: number;
  page: number;
  itemsPerPage: number;
  hasMore: boolean;
}

export type NotificationSkipReason = 'pickup_not_found_or_cancelled' | 'pickup_window_passed';

export type NotificationEligibility =
  | { eligible: true; pickup: Pickup }
  | { eligible: false; reason: NotificationSkipReason; pickup: Pickup | null };

const StoredContactDetailsSchema = z.object({
  name: z.string(),
  email: z.string().nullish(),
  phone: z.string(),
});

const StoredLabelIdsSchema = z.array(z.string());

@Injectable()
export class PickupsService {
  private readonly logger = new Logger(PickupsService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly schedulingService: SchedulingService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Stores the pickup with its address and schedules the reminder job.
   */
  create(dto: CreatePickupDto, now: Date = new Date()): Pickup {
    const startAt = parseIsoDatetime(dto.pickup_window.start_at);
    const endAt = parseIsoDatetime(dto.pickup_window.end_at);
    if (!startAt || !endAt) {
      throw new ValidationError('pickup_window must contain ISO 8601 datetimes');
    }
    if (endAt.getTime() < startAt.getTime()) {
      throw new ValidationError('pickup_window.end_at must not be before start_at');
    }

    const pickupId = generatePickupId();
    const address = dto.pickup_address;

    // Pickup and reminder job commit together or not at all
    const handle = this.databaseService.transaction(() => {
      this.databaseService.createPickupWithAddress(
        {
          pickupId,
          labelIds: dto.label_ids,
          contactDetails: {
            name: dto.contact_details.name,
            email: dto.contact_details.email,
            phone: dto.contact_details.phone,
          },
          pickupWindowStart: startAt.toISOString(),
          pickupWindowEnd: endAt.toISOString(),
          pickupNotes: dto.pickup_notes ?? null,
        },
        {
          name: address.name,
          phone: address.phone,
          email: address.email ?? null,
          company_name: address.company_name ?? null,
          address_line1: address.address_line1,
          address_line2: address.address_line2 ?? null,
          address_line3: address.address_line3 ?? null,
          city_locality: address.city_locality,
          state_province: address.state_province,
          postal_code: address.postal_code,
          country_code: address.country_code,
          address_residential_indicator: address.address_residential_indicator ?? 'no',
        },
      );

      const scheduled = this.schedulingService.schedulePickupNotification(pickupId, startAt, now);
      this.databaseService.setPickupNotificationJob(pickupId, scheduled.jobId);
      return scheduled;
    });

    this.logger.log(
      `Created pickup ${pickupId} (notification ${handle.jobId} at ${handle.runAt.toISOString()}${handle.immediate ? ', immediate' : ''})`,
    );

    return this.getActive(pickupId);
  }

  findAll(page: number, itemsPerPage: number): PaginatedPickups {
    const offset = (page - 1) * itemsPerPage;
    const rows = this.databaseService.findActivePickups(offset, itemsPerPage);
    const totalCount = this.databaseService.countActivePickups();

    return {
      pickups: rows.map((row) => this.rowToPickup(row)),
      totalCount,
      page,
      itemsPerPage,
      hasMore: offset + rows.length < totalCount,
    };
  }

  findActive(pickupId: string): Pickup | null {
    const row = this.databaseService.findActivePickupByPickupId(pickupId);
    return row ? this.rowToPickup(row) : null;
  }

  getActive(pickupId: string): Pickup {
    const pickup = this.findActive(pickupId);
    if (!pickup) {
      throw new NotFoundException('Pickup not found');
    }
    return pickup;
  }

  /**
   * Soft delete. Announces the cancellation so the pending reminder is withdrawn.
   */
  cancel(pickupId: string, now: Date = new Date()): Pickup {
    const pickup = this.getActive(pickupId);

    if (!this.databaseService.cancelPickup(pickupId, now)) {
      throw new NotFoundException('Pickup not found');
    }

    this.eventEmitter.emit(
      PICKUP_CANCELLED,
      new PickupCancelledEvent(pickupId, pickup.notificationJobId),
    );
    this.logger.log(`Cancelled pickup ${pickupId}`);

    return { ...pickup, status: 'cancelled', cancelledAt: now, updatedAt: now };
  }

  validateForNotification(pickupId: string, now: Date = new Date()): NotificationEligibility {
    const pickup = this.findActive(pickupId);
    if (!pickup) {
      this.logger.log(`Pickup ${pickupId} not found or was cancelled`);
      return { eligible: false, reason: 'pickup_not_found_or_cancelled', pickup: null };
    }

    if (pickup.pickupWindow.startAt.getTime() < now.getTime()) {
      this.logger.log(`Pickup window already passed for pickup ${pickupId}`);
      return { eligible: false, reason: 'pickup_window_passed', pickup };
    }

    return { eligible: true, pickup };
  }

  private rowToPickup(row: PickupRow): Pickup {
    const addressRow = this.databaseService.findPickupAddressById(row.pickup_address_id);
    if (!addressRow) {
      throw new Error(`Pickup ${row.pickup_id} references missing address ${row.pickup_address_id}`);
    }

    const contact = StoredContactDetailsSchema.parse(JSON.parse(row.contact_details));

    return {
      id: row.id,
      pickupId: row.pickup_id,
      pickupAddress: rowToAddress(addressRow),
      labelIds: StoredLabelIdsSchema.parse(JSON.parse(row.label_ids)),
      contactDetails: {
        name: contact.name,
        email: contact.email ?? null,
        phone: contact.phone,
      },
      pickupWindow: {
        startAt: new Date(row.pickup_window_start),
        endAt: new Date(row.pickup_window_end),
      },
      pickupNotes: row.pickup_notes,
      carrierId: row.carrier_id,
      confirmationNumber: row.confirmation_number,
      warehouseId: row.warehouse_id,
      notificationJobId: row.notification_job_id,
      status: row.status === 'cancelled' ? 'cancelled' : 'scheduled',
      createdAt: new Date(row.created_at),
      updatedAt: row.updated_at ? new Date(row.updated_at) : null,
      cancelledAt: row.cancelled_at ? new Date(row.cancelled_at) : null,
    };
  }
}

function rowToAddress(row: PickupAddressRow): PickupAddress {
  return {
    id: row.id,
    name: row.name,
    phone: row.phone,
    email: row.email,
    companyName: row.company_name,
    addressLine1: row.address_line1,
    addressLine2: row.address_line2,
    addressLine3: row.address_line3,
    cityLocality: row.city_locality,
    stateProvince: row.state_province,
    postalCode: row.postal_code,
    countryCode: row.country_code,
    addressResidentialIndicator: row.address_residential_indicator,
    createdAt: new Date(row.created_at),
    updatedAt: row.updated_at ? new Date(row.updated_at) : null,
  };
}

function toAddressRead(address: PickupAddress): PickupAddressReadDto {
  return {
    id: address.id,
    name: address.name,
    phone: address.phone,
    email: address.email,
    company_name: address.companyName,
    address_line1: address.addressLine1,
    address_line2: address.addressLine2,
    address_line3: address.addressLine3,
    city_locality: address.cityLocality,
    state_province: address.stateProvince,
    postal_code: address.postalCode,
    country_code: address.countryCode,
    address_residential_indicator: address.addressResidentialIndicator,
    created_at: address.createdAt.toISOString(),
    updated_at: address.updatedAt ? address.updatedAt.toISOString() : null,
  };
}

export function toPickupRead(pickup: Pickup): PickupReadDto {
  return {
    pickup_id: pickup.pickupId,
    label_ids: pickup.labelIds,
    created_at: pickup.createdAt.toISOString(),
    cancelled_at: pickup.cancelledAt ? pickup.cancelledAt.toISOString() : null,
    carrier_id: pickup.carrierId,
    confirmation_number: pickup.confirmationNumber,
    warehouse_id: pickup.warehouseId,
    pickup_address: toAddressRead(pickup.pickupAddress),
    contact_details: { ...pickup.contactDetails },
    pickup_notes: pickup.pickupNotes,
    pickup_window: {
      start_at: pickup.pickupWindow.startAt.toISOString(),
      end_at: pickup.pickupWindow.endAt.toISOString(),
    },
  };
}

export function toPaginatedRead(result: PaginatedPickups): PaginatedPickupsDto {
  return {
    data: result.pickups.map(toPickupRead),
    total_count: result.totalCount,
    has_more: result.hasMore,
    page: result.page,
    items_per_page: result.itemsPerPage,
  };
}
