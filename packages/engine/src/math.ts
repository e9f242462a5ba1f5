/** Round to a number of decimals (half away from zero on the exact binary value). */
export function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

/** Round to an integer, ties to the even neighbour. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
