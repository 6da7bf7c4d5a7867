import { describe, it, expect } from 'vitest';
import { formatCount, formatElapsed } from '../formatting';

describe('formatElapsed', () => {
  it('shows milliseconds below one second', () => {
    expect(formatElapsed(850)).toBe('850ms');
  });

  it('shows seconds with one decimal', () => {
    expect(formatElapsed(12_345)).toBe('12.3s');
  });
});

describe('formatCount', () => {
  it('groups thousands', () => {
    expect(formatCount(3_000_000_000)).toBe('3,000,000,000');
  });

  it('leaves small numbers alone', () => {
    expect(formatCount(42)).toBe('42');
  });
});
