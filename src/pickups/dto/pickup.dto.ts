import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsEmail,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';

export class PickupAddressDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  phone!: string;

  @IsOptional()
  @IsEmail()
  email?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  company_name?: string | null;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  address_line1!: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  address_line2?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  address_line3?: string | null;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  city_locality!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  state_province!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  postal_code!: string;

  @IsString()
  @Length(2, 2)
  country_code!: string;

  @IsOptional()
  @IsString()
  @MaxLength(10)
  address_residential_indicator?: string | null;
}

export class ContactDetailsDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsEmail()
  email!: string;

  @IsString()
  @IsNotEmpty()
  phone!: string;
}

export class PickupWindowDto {
  @IsISO8601({ strict: true })
  start_at!: string;

  @IsISO8601({ strict: true })
  end_at!: string;
}

export class CreatePickupDto {
  @IsArray()
  @ArrayMinSize(1)
  @IsString({ each: true })
  label_ids!: string[];

  @ValidateNested()
  @Type(() => ContactDetailsDto)
  contact_details!: ContactDetailsDto;

  @IsOptional()
  @IsString()
  pickup_notes?: string | null;

  @ValidateNested()
  @Type(() => PickupWindowDto)
  pickup_window!: PickupWindowDto;

  @ValidateNested()
  @Type(() => PickupAddressDto)
  pickup_address!: PickupAddressDto;
}

export class PickupListQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page: number = 1;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  items_per_page: number = 10;
}

export interface PickupAddressReadDto {
  id: number;
  name: string;
  phone: string;
  email: string | null;
  company_name: string | null;
  address_line1: string;
  address_line2: string | null;
  address_line3: string | null;
  city_locality: string;
  state_province: string;
  postal_code: string;
  country_code: string;
  address_residential_indicator: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface PickupReadDto {
  pickup_id: string;
  label_ids: string[];
  created_at: string;
  cancelled_at: string | null;
  carrier_id: string | null;
  confirmation_number: string | null;
  warehouse_id: string | null;
  pickup_address: PickupAddressReadDto;
  contact_details: { name: string; email: string | null; phone: string };
  pickup_notes: string | null;
  pickup_window: { start_at: string; end_at: string };
}

export interface PaginatedPickupsDto {
  data: PickupReadDto[];
  total_count: number;
  has_more: boolean;
  page: number;
  items_per_page: number;
}
