/**
 * Half-open arithmetic progression [start, stop) with ceil((stop - start) / step) values.
 */
export function arange(start: number, stop: number, step: number): number[] {
  if (!(step > 0)) {
    throw new RangeError(`arange step must be positive, got ${step}`);
  }
  const length = Math.max(0, Math.ceil((stop - start) / step));
  return Array.from({ length }, (_, i) => start + i * step);
}
