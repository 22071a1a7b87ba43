import { describe, it, expect } from 'vitest';
import { findPasswordProblem, PASSWORD_MESSAGES } from '../../../src/modules/credentials';

describe('findPasswordProblem', () => {
  it('accepts a password with every character class', () => {
    expect(findPasswordProblem('Str0ng!Pass')).toBeNull();
  });

  it('reports short passwords before composition', () => {
    expect(findPasswordProblem('S0!a')).toBe(PASSWORD_MESSAGES.tooShort);
    expect(PASSWORD_MESSAGES.tooShort).toBe('Password must be at least 8 characters long');
  });

  it.each([
    ['no uppercase', 'str0ng!pass'],
    ['no lowercase', 'STR0NG!PASS'],
    ['no digit', 'Strong!Pass'],
    ['no special', 'Str0ngPass1'],
    ['special outside the accepted set', 'Str0ng#Pass'],
  ])('rejects a password with %s', (_label, password) => {
    expect(findPasswordProblem(password)).toBe(PASSWORD_MESSAGES.weak);
  });
});
