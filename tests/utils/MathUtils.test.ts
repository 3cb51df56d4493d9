import { describe, it, expect } from 'vitest';
import { MathUtils } from '@/engine/utils/MathUtils';

describe('MathUtils', () => {
  it('clamp', () => {
    expect(MathUtils.clamp(5, 0, 3)).toBe(3);
    expect(MathUtils.clamp(-1, 0, 3)).toBe(0);
  });

  it('round1', () => {
    expect(MathUtils.round1(88.666)).toBe(88.7);
    expect(MathUtils.round1(3.04)).toBe(3);
  });

  it('mean of an empty list is 0', () => {
    expect(MathUtils.mean([])).toBe(0);
    expect(MathUtils.mean([1, 2, 3])).toBe(2);
  });

  it('bucket rounds up and keeps any HP above 0', () => {
    expect(MathUtils.bucket(100, 5)).toBe(100);
    expect(MathUtils.bucket(96, 5)).toBe(100);
    expect(MathUtils.bucket(95, 5)).toBe(95);
    expect(MathUtils.bucket(0.1, 5)).toBe(5);
    expect(MathUtils.bucket(0, 5)).toBe(0);
  });
});
