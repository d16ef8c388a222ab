import { describe, it, expect } from 'vitest';
import { computeBackoffDelay, sleep } from './backoff.js';

const options = { base: 2, max: 30 };

describe('computeBackoffDelay', () => {
  it('starts at one second for the first retry', () => {
    expect(computeBackoffDelay(0, options, () => 0)).toBe(1000);
  });

  it('grows exponentially with the attempt number', () => {
    expect(computeBackoffDelay(1, options, () => 0)).toBe(2000);
    expect(computeBackoffDelay(2, options, () => 0)).toBe(4000);
    expect(computeBackoffDelay(3, options, () => 0)).toBe(8000);
  });

  it('adds up to one second of jitter', () => {
    expect(computeBackoffDelay(1, options, () => 0.5)).toBe(2500);
    expect(computeBackoffDelay(2, options, () => 0.999)).toBe(4999);
  });

  it('caps the delay at the maximum', () => {
    expect(computeBackoffDelay(5, options, () => 0)).toBe(30_000);
    expect(computeBackoffDelay(10, options, () => 0.9)).toBe(30_000);
  });

  it('honors a custom jitter range', () => {
    expect(computeBackoffDelay(0, { base: 3, max: 60, jitter: 2 }, () => 0.25)).toBe(1500);
  });
});

describe('sleep', () => {
  it('resolves immediately for a zero delay', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });
});
