// Process-wide default brick index
// Built lazily and swapped wholesale when a different brick size is requested;
// an index is never mutated after construction.

import { BrickIndex } from "./brick-index";
import { DEFAULT_BRICKSIZE } from "./grid";

let shared: BrickIndex | null = null;

/** The shared index for `bricksize`, rebuilding it if the size changed. */
export function sharedBricks(bricksize: number = DEFAULT_BRICKSIZE): BrickIndex {
  if (shared === null || shared.bricksize !== bricksize) {
    shared = new BrickIndex(bricksize);
  }
  return shared;
}

/** Drop the shared index (useful for testing). */
export function clearSharedBricks(): void {
  shared = null;
}

/** Name of the brick covering (`ra`, `dec`), using the shared index. */
export function brickname(ra: number, dec: number, bricksize?: number): string;
/** Names of the bricks covering each (`ras[i]`, `decs[i]`), using the shared index. */
export function brickname(
  ras: ArrayLike<number>,
  decs: ArrayLike<number>,
  bricksize?: number,
): string[];
export function brickname(
  ra: number | ArrayLike<number>,
  dec: number | ArrayLike<number>,
  bricksize: number = DEFAULT_BRICKSIZE,
): string | string[] {
  const index = sharedBricks(bricksize);
  if (typeof ra === "number") {
    if (typeof dec !== "number") {
      throw new TypeError("brickname: RA is a number but Dec is an array");
    }
    return index.brickName(ra, dec);
  }
  if (typeof dec === "number") {
    throw new TypeError("brickname: RA is an array but Dec is a number");
  }
  return index.brickNames(ra, dec);
}
