import { describe, it, expect } from 'vitest';
import { deriveUsernameFromEmail } from '../../../src/modules/registration/helpers/derive-username';

describe('deriveUsernameFromEmail', () => {
  it('uses the lowercased local part without disallowed characters', () => {
    expect(deriveUsernameFromEmail('John.Doe+crm@acme.io')).toBe('john.doecrm');
  });

  it('pads short local parts', () => {
    expect(deriveUsernameFromEmail('a@b.com')).toBe('a123');
    expect(deriveUsernameFromEmail('ab@x.io')).toBe('ab123');
  });

  it('prefixes a local part that does not start alphanumeric', () => {
    expect(deriveUsernameFromEmail('_ops@acme.io')).toBe('user_ops');
  });

  it('cuts long local parts to 50 characters', () => {
    expect(deriveUsernameFromEmail(`${'x'.repeat(60)}@acme.io`)).toBe('x'.repeat(50));
  });
});
