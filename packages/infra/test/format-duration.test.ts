import { describe, it, expect } from 'vitest';
import { formatDuration } from '../src/format-duration.js';

describe('formatDuration', () => {
  it('keeps sub-second values in milliseconds', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(999)).toBe('999ms');
  });

  it('drops the sub-second remainder above one second', () => {
    expect(formatDuration(1500)).toBe('1s');
  });

  it('formats reconnect delays', () => {
    expect(formatDuration(30_000)).toBe('30s');
    expect(formatDuration(90_000)).toBe('1m 30s');
  });

  it('skips empty units', () => {
    expect(formatDuration(3_661_000)).toBe('1h 1m 1s');
    expect(formatDuration(3_600_000)).toBe('1h');
    expect(formatDuration(90_000_000)).toBe('1d 1h');
  });

  it('clamps negatives', () => {
    expect(formatDuration(-100)).toBe('0ms');
  });
});
