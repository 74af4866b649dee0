import { UsernameValidationError, ValidationError } from '../common/errors';
import { deriveUsername } from './username';

describe('deriveUsername', () => {
  it.each([
    ['jane_smith@example.com', 'jane_smith'],
    ['user+tag@example.com', 'user+tag'],
    ['Test.User-123@example.com', 'test.user-123'],
    ['TestUser@example.com', 'testuser'],
    ['john.doe@gmail.com', 'john.doe'],
  ])('maps %s to %s', (email, expected) => {
    expect(deriveUsername(email)).toBe(expected);
  });

  it('only looks at the text before the first @', () => {
    expect(deriveUsername('first@second@example.com')).toBe('first');
  });

  it('is idempotent', () => {
    for (const email of ['Mixed.Case@example.com', 'a+b-c_d@example.org']) {
      const username = deriveUsername(email);
      expect(deriveUsername(`${username}@x`)).toBe(username);
    }
  });

  it('rejects local parts with unsupported characters instead of stripping them', () => {
    expect(() => deriveUsername('jöhn doe@example.com')).toThrow(UsernameValidationError);

    try {
      deriveUsername('jöhn doe!@example.com');
      throw new Error('expected deriveUsername to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toBeInstanceOf(UsernameValidationError);
      if (error instanceof UsernameValidationError) {
        expect(error.unsupportedCharacters).toEqual(['ö', ' ', '!']);
        expect(error.message).toBe('Email local part contains unsupported characters: ö   !');
        expect(error.getStatus()).toBe(400);
      }
    }
  });

  it('rejects an empty local part', () => {
    expect(() => deriveUsername('@example.com')).toThrow('Email local part is empty');
  });
});
