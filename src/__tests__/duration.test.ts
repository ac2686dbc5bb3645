import { describe, it, expect } from 'vitest';
import { formatDuration, formatSeconds, parseDuration } from '../utils/duration.js';

describe('parseDuration', () => {
  it('parses single units', () => {
    expect(parseDuration('20s')).toBe(20_000);
    expect(parseDuration('24h')).toBe(86_400_000);
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('86400s')).toBe(86_400_000);
  });

  it('parses compound and fractional durations', () => {
    expect(parseDuration('1h30m')).toBe(5_400_000);
    expect(parseDuration('24h0m0s')).toBe(86_400_000);
    expect(parseDuration('1.5s')).toBe(1_500);
  });

  it('accepts a bare zero', () => {
    expect(parseDuration('0')).toBe(0);
  });

  it('rejects text that is not a duration', () => {
    expect(parseDuration('')).toBeUndefined();
    expect(parseDuration('10')).toBeUndefined();
    expect(parseDuration('1d')).toBeUndefined();
    expect(parseDuration('20s garbage')).toBeUndefined();
  });
});

describe('formatDuration', () => {
  it('prints compound durations with every unit down to seconds', () => {
    expect(formatDuration(86_400_000)).toBe('24h0m0s');
    expect(formatDuration(20_000)).toBe('20s');
    expect(formatDuration(90_000)).toBe('1m30s');
    expect(formatDuration(1_500)).toBe('1.5s');
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(0)).toBe('0s');
  });
});

describe('formatSeconds', () => {
  it('prints whole seconds with an s suffix', () => {
    expect(formatSeconds(86_400_000)).toBe('86400s');
    expect(formatSeconds(20_000)).toBe('20s');
  });
});
