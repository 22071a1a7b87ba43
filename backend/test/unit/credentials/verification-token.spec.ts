import { describe, it, expect } from 'vitest';
import { issueVerificationToken } from '../../../src/modules/credentials/secrets/verification-token';
import { Sha256TokenHasher } from '../../../src/shared/security/token-hasher';

describe('issueVerificationToken', () => {
  const hasher = new Sha256TokenHasher();

  it('returns a URL-safe token and the SHA-256 hex of it', () => {
    const issued = issueVerificationToken(hasher);

    expect(issued.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(issued.tokenHash).toBe(hasher.hash(issued.token));
    expect(issued.tokenHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('never issues the same token twice in a row', () => {
    expect(issueVerificationToken(hasher).token).not.toBe(issueVerificationToken(hasher).token);
  });
});
