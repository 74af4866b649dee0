import { BadRequestException, UnauthorizedException } from '@nestjs/common';

/**
 * Raised while reading provider credentials at startup.
 * Disables the affected provider only; the process keeps starting.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly subject: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends BadRequestException {}

export class UsernameValidationError extends ValidationError {
  constructor(public readonly unsupportedCharacters: string[]) {
    super(
      unsupportedCharacters.length > 0
        ? `Email local part contains unsupported characters: ${unsupportedCharacters.join(' ')}`
        : 'Email local part is empty',
    );
  }
}

export class AuthenticationError extends UnauthorizedException {}

/**
 * A SQLite UNIQUE constraint rejected an insert or update.
 */
export class UniqueConstraintError extends Error {
  constructor(
    public readonly table: string,
    public readonly column: string,
  ) {
    super(`Unique constraint failed: ${table}.${column}`);
    this.name = 'UniqueConstraintError';
  }
}
