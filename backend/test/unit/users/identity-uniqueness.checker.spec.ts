import { describe, it, expect } from 'vitest';
import { IdentityUniquenessChecker } from '../../../src/modules/users/identity/identity-uniqueness.checker';
import { logger } from '../../../src/shared/logger/logger';
import { FakeUserDirectory } from '../../helpers/fakes';

describe('IdentityUniquenessChecker', () => {
  it('is available when the lookup finds nothing and taken when it finds a user', async () => {
    const directory = new FakeUserDirectory();
    directory.seed({ username: 'abee', email: 'a@b.com' });
    const checker = new IdentityUniquenessChecker({ directory, logger, onLookupError: 'fail-open' });

    expect(await checker.usernameAvailable('abee')).toBe(false);
    expect(await checker.usernameAvailable('other')).toBe(true);
    expect(await checker.emailAvailable('a@b.com')).toBe(false);
    expect(await checker.emailAvailable('c@d.com')).toBe(true);
  });

  it('treats a lookup error as available under fail-open', async () => {
    const directory = new FakeUserDirectory();
    directory.lookupError = new Error('users service timeout');
    const checker = new IdentityUniquenessChecker({ directory, logger, onLookupError: 'fail-open' });

    expect(await checker.usernameAvailable('abee')).toBe(true);
    expect(await checker.emailAvailable('a@b.com')).toBe(true);
  });

  it('treats a lookup error as taken under fail-closed', async () => {
    const directory = new FakeUserDirectory();
    directory.lookupError = new Error('users service timeout');
    const checker = new IdentityUniquenessChecker({
      directory,
      logger,
      onLookupError: 'fail-closed',
    });

    expect(await checker.usernameAvailable('abee')).toBe(false);
    expect(await checker.emailAvailable('a@b.com')).toBe(false);
  });
});
