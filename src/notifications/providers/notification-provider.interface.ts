export const NOTIFICATION_PROVIDER = 'NotificationProvider';

export interface NotificationProvider {
  /** Resolves true once the message was handed off for delivery. */
  send(recipient: string, subject: string, body: string): Promise<boolean>;
}
