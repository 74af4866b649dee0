import { UsernameValidationError } from '../common/errors';

export const USERNAME_PATTERN = /^[a-z0-9._+-]+$/;

/**
 * Maps an email address to its canonical username: the lower-cased local part.
 * Local parts with characters outside [a-z0-9._+-] are rejected, never stripped.
 */
export function deriveUsername(email: string): string {
  const at = email.indexOf('@');
  const localPart = (at === -1 ? email : email.slice(0, at)).toLowerCase();

  if (!USERNAME_PATTERN.test(localPart)) {
    const unsupported = [...new Set([...localPart].filter((char) => !/[a-z0-9._+-]/.test(char)))];
    throw new UsernameValidationError(unsupported);
  }

  return localPart;
}
