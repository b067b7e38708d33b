import { describe, it, expect } from 'vitest';
import { performance } from 'node:perf_hooks';
import { BcryptPasswordHasher } from '../../src/shared/security/bcrypt-password-hasher';
import { buildTestKernel } from '../helpers/build-test-kernel';

// High enough that the bcrypt compare dominates each call.
const TIMING_COST = 8;
const SAMPLES = 15;

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

async function timed(fn: () => Promise<unknown>): Promise<number> {
  const start = performance.now();
  await fn();
  return performance.now() - start;
}

describe('authenticate timing', () => {
  it('takes about as long for an unknown user as for a wrong password', async () => {
    const { service } = buildTestKernel({
      passwordHasher: new BcryptPasswordHasher({ cost: TIMING_COST }),
    });
    await service.register('alice', 'correcthorse');
    await service.prepare();

    const unknownUser: number[] = [];
    const wrongPassword: number[] = [];

    // Interleaved so drift in machine load hits both series alike.
    for (let i = 0; i < SAMPLES; i++) {
      unknownUser.push(await timed(() => service.authenticate('ghost', `guess-${i}`)));
      wrongPassword.push(await timed(() => service.authenticate('alice', `guess-${i}`)));
    }

    const ratio = median(unknownUser) / median(wrongPassword);
    expect(ratio).toBeGreaterThan(0.5);
    expect(ratio).toBeLessThan(2);
  }, 30_000);
});
