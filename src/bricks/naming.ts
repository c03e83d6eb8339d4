// Brick name encoding: RRRR[p|m]DDD from the brick center

/** Round to the nearest integer, ties to even (matches a "%.0f" format). */
export function roundHalfEven(x: number): number {
  if (Math.abs(x % 1) === 0.5) {
    return 2 * Math.round(x / 2);
  }
  return Math.round(x);
}

/** Zero-padded integer rendering of `x`, like "%0{width}.0f". */
export function formatFixed(x: number, width: number): string {
  return String(roundHalfEven(x)).padStart(width, "0");
}

/**
 * Name of the brick centered on (`ra`, `dec`) in degrees.
 *
 * The first 4 characters of RA×10000 padded to 7 digits, `p` or `m` for the
 * sign of Dec, then the first 3 characters of |Dec|×10000 padded to 6 digits.
 * The brick at RA 0.125, Dec 0 is `0001p000`.
 */
export function brickName(ra: number, dec: number): string {
  const pm = dec >= 0 ? "p" : "m";
  const raDigits = formatFixed(ra * 10000, 7);
  const decDigits = formatFixed(Math.abs(dec) * 10000, 6);
  return raDigits.slice(0, 4) + pm + decDigits.slice(0, 3);
}
