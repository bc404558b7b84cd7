import { InvalidSizeError } from '../errors.js';

const UNIT_MULTIPLIERS: Record<string, number> = {
  '': 1,
  m: 1,
  mib: 1,
  g: 1024,
  gib: 1024,
  t: 1024 * 1024,
  tib: 1024 * 1024,
};

/**
 * Parse a container size into capacity units (MiB).
 * A bare number is MiB; `M`, `G` and `T` (or `MiB`, `GiB`, `TiB`) are accepted.
 */
export const parseSize = (value: string): number => {
  const match = /^\s*(\d+)\s*([A-Za-z]*)\s*$/.exec(value);
  if (!match) {
    throw new InvalidSizeError(value);
  }

  const [, digits, unit] = match;
  const multiplier = UNIT_MULTIPLIERS[unit.toLowerCase()];
  const size = Number(digits) * (multiplier ?? 0);
  if (!Number.isSafeInteger(size) || size <= 0) {
    throw new InvalidSizeError(value);
  }
  return size;
};
