export type PickupStatus = 'scheduled' | 'cancelled';

export interface PickupAddress {
  id: number;
  name: string;
  phone: string;
  email: string | null;
  companyName: string | null;
  addressLine1: string;
  addressLine2: string | null;
  addressLine3: string | null;
  cityLocality: string;
  stateProvince: string;
  postalCode: string;
  countryCode: string;
  addressResidentialIndicator: string | null;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface ContactDetails {
  name: string;
  email: string | null;
  phone: string;
}

export interface PickupWindow {
  startAt: Date;
  endAt: Date;
}

export interface Pickup {
  id: number;
  pickupId: string;
  pickupAddress: PickupAddress;
  labelIds: string[];
  contactDetails: ContactDetails;
  pickupWindow: PickupWindow;
  pickupNotes: string | null;
  carrierId: string | null;
  confirmationNumber: string | null;
  warehouseId: string | null;
  notificationJobId: string | null;
  status: PickupStatus;
  createdAt: Date;
  updatedAt: Date | null;
  cancelledAt: Date | null;
}
