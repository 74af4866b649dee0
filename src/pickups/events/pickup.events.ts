export const PICKUP_CANCELLED = 'pickup.cancelled';

export class PickupCancelledEvent {
  constructor(
    public readonly pickupId: string,
    public readonly notificationJobId: string | null,
  ) {}
}
