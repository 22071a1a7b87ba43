import { describe, it, expect } from 'vitest';
import bcrypt from 'bcrypt';
import { BcryptPasswordHasher } from '../../../src/modules/credentials';

describe('BcryptPasswordHasher', () => {
  it('stores a bcrypt hash at the configured cost that the login side can check', async () => {
    const hash = await new BcryptPasswordHasher(4).hash('Str0ng!Pass');

    expect(hash.startsWith('$2b$04$')).toBe(true);
    expect(await bcrypt.compare('Str0ng!Pass', hash)).toBe(true);
    expect(await bcrypt.compare('Str0ng!Pas', hash)).toBe(false);
  });
});
