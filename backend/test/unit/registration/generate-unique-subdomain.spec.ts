import { describe, it, expect } from 'vitest';
import { generateUniqueSubdomain } from '../../../src/modules/registration/helpers/generate-unique-subdomain';
import { logger } from '../../../src/shared/logger/logger';

function checkerFor(taken: Set<string>) {
  const checked: string[] = [];
  return {
    checked,
    checker: {
      isAvailable: async (candidate: string) => {
        checked.push(candidate);
        return !taken.has(candidate);
      },
    },
  };
}

describe('generateUniqueSubdomain', () => {
  it('returns the base when it is free', async () => {
    const { checker } = checkerFor(new Set());

    expect(
      await generateUniqueSubdomain({ base: 'acme', checker, nowMs: () => 0, logger, requestId: 'r' }),
    ).toEqual({ subdomain: 'acme', attempts: 0, fallback: false });
  });

  it('returns the first free numbered candidate', async () => {
    const { checker, checked } = checkerFor(new Set(['acme', 'acme-1', 'acme-2']));

    const result = await generateUniqueSubdomain({
      base: 'acme',
      checker,
      nowMs: () => 0,
      logger,
      requestId: 'r',
    });

    expect(result).toEqual({ subdomain: 'acme-3', attempts: 3, fallback: false });
    expect(checked).toEqual(['acme', 'acme-1', 'acme-2', 'acme-3']);
  });

  it('falls back to the clock-based candidate after 99 taken variants, without checking it', async () => {
    const taken = new Set(['acme', ...Array.from({ length: 99 }, (_, i) => `acme-${i + 1}`)]);
    const { checker, checked } = checkerFor(taken);

    const result = await generateUniqueSubdomain({
      base: 'acme',
      checker,
      nowMs: () => 1_700_000_004_321,
      logger,
      requestId: 'r',
    });

    expect(result).toEqual({ subdomain: 'company-4321', attempts: 100, fallback: true });
    expect(checked).toHaveLength(100);
    expect(checked).not.toContain('company-4321');
  });
});
