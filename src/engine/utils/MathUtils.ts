export const MathUtils = {
  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },

  /** Round to one decimal place */
  round1(v: number): number {
    return Math.round(v * 10) / 10;
  },

  /** Arithmetic mean; 0 for an empty list */
  mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
  },

  /** Bucket a 0..100 percentage into `size`-wide steps (rounded up, so any HP > 0 stays > 0) */
  bucket(percent: number, size: number): number {
    if (percent <= 0) return 0;
    return Math.ceil(percent / size) * size;
  },
};
