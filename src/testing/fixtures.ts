import type { AppConfig } from '../config/configuration';
import { DatabaseService } from '../database/database.service';
import type { CreatePickupDto } from '../pickups/dto/pickup.dto';

/**
 * A connected DatabaseService on a fresh in-memory database.
 */
export function createTestDatabase(config: AppConfig): DatabaseService {
  const databaseService = new DatabaseService(config);
  databaseService.onModuleInit();
  return databaseService;
}

export function buildCreatePickupDto(startAt: Date, overrides: Partial<CreatePickupDto> = {}): CreatePickupDto {
  return {
    label_ids: ['se-1001', 'se-1002'],
    contact_details: {
      name: 'Pat Jones',
      email: 'pat@example.com',
      phone: '+1 555 0100',
    },
    pickup_notes: 'Ring the side door',
    pickup_window: {
      start_at: startAt.toISOString(),
      end_at: new Date(startAt.getTime() + 2 * 60 * 60 * 1000).toISOString(),
    },
    pickup_address: {
      name: 'Warehouse 7',
      phone: '+1 555 0101',
      company_name: 'Example Goods',
      address_line1: '1 Dock Road',
      city_locality: 'Springfield',
      state_province: 'IL',
      postal_code: '62701',
      country_code: 'US',
    },
    ...overrides,
  };
}
