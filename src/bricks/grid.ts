// Brick tiling construction
// Bricks form Dec rows like a brick wall with constant-RA / constant-Dec edges,
// an even number of bricks per row, and a circular cap at each pole.

import { ConfigurationError } from "./errors";
import { brickName } from "./naming";

// ---------- Types ----------

export const DEFAULT_BRICKSIZE = 0.25;
export const MAX_BRICKSIZE = 90;

/** One brick within a row. Angles in degrees, area in square degrees. */
export interface BrickCell {
  readonly col: number;
  readonly name: string;
  readonly ra: number;
  readonly raMin: number;
  readonly raMax: number;
  readonly area: number;
}

/** One band of constant Dec, owning its bricks in order of increasing RA. */
export interface BrickRow {
  readonly row: number;
  readonly decCenter: number;
  readonly decMin: number;
  readonly decMax: number;
  readonly raEdges: readonly number[]; // length bricks.length + 1
  readonly bricks: readonly BrickCell[];
}

export interface Grid {
  readonly bricksize: number;
  readonly rows: readonly BrickRow[];
  readonly decEdges: readonly number[]; // length rows.length + 1
  readonly offsets: readonly number[]; // bricks in all rows before each row
  readonly total: number;
}

// ---------- Internal helpers ----------

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

function assertBricksize(bricksize: number): void {
  if (!Number.isFinite(bricksize) || bricksize <= 0 || bricksize > MAX_BRICKSIZE) {
    throw new ConfigurationError(
      `Invalid bricksize: ${bricksize} (expected a number in (0, ${MAX_BRICKSIZE}] degrees)`,
      bricksize,
    );
  }
}

/**
 * Number of Dec rows: centers from -90 at `bricksize` steps up to the first
 * one within half a brick of +90. When 180/bricksize has a fractional part
 * above 0.5 that last center lies beyond the pole (90.09 for 0.27); the
 * northern cap is still clamped at 90 and its brick keeps that center.
 */
export function rowCountFor(bricksize: number): number {
  return Math.ceil(180 / bricksize + 0.5);
}

/**
 * Columns in a row centered on `decCenter`: an even count sized so the
 * brick's width along its equatorward edge is no more than `bricksize`.
 */
export function columnCountFor(decCenter: number, bricksize: number): number {
  const declo = Math.abs(decCenter) - bricksize / 2;
  const n = (360 / bricksize) * Math.cos((declo * Math.PI) / 180);
  return Math.ceil(n / 2) * 2;
}

/**
 * `count` values from `start` at `step` intervals. The stride is measured as
 * `(start + step) - start` so rows land on the same doubles as catalogs built
 * with `numpy.arange`; for sizes like 0.1 the equatorial center is then just
 * below zero and its bricks are named `m000`.
 */
function uniformSteps(start: number, step: number, count: number): number[] {
  const stride = start + step - start;
  return Array.from({ length: count }, (_, i) => (i === 0 ? start : start + i * stride));
}

/** Uniform RA edges over [0, 360], last edge exactly 360. */
function raEdgesFor(ncol: number): number[] {
  const step = 360 / ncol;
  const edges = Array.from({ length: ncol + 1 }, (_, i) => i * step);
  edges[ncol] = 360;
  return edges;
}

/** Area in square degrees of the region between two Dec and two RA edges. */
export function sphericalRectArea(
  decMin: number,
  decMax: number,
  raMin: number,
  raMax: number,
): number {
  const decfac =
    Math.sin(decMax * DEG_TO_RAD) * RAD_TO_DEG -
    Math.sin(decMin * DEG_TO_RAD) * RAD_TO_DEG;
  return (raMax - raMin) * decfac;
}

// ---------- Quadrants ----------

/**
 * Which polar rows report quadrant 1. `"legacy"` overrides only the southern
 * cap (row 0) and leaves the northern cap to the general formula, matching
 * catalogs already keyed on BRICKQ; `"both"` overrides both caps.
 */
export type PoleQuadrant = "legacy" | "both";

/** BRICKQ: position of a brick within a 2×2 stitching pattern. */
export function brickQuadrant(
  row: number,
  col: number,
  rowCount: number,
  poleQuadrant: PoleQuadrant = "legacy",
): number {
  if (row === 0) return 1;
  if (poleQuadrant === "both" && row === rowCount - 1) return 1;
  return (col % 2) + (row % 2) * 2;
}

// ---------- Construction ----------

/** Build the complete, frozen brick grid for `bricksize` degrees. */
export function buildGrid(bricksize: number = DEFAULT_BRICKSIZE): Grid {
  assertBricksize(bricksize);

  const nrow = rowCountFor(bricksize);
  const decCenters = uniformSteps(-90, bricksize, nrow);
  const decEdges = uniformSteps(-90 - bricksize / 2, bricksize, nrow + 1);
  decEdges[0] = -90;
  decEdges[nrow] = 90;

  const rows: BrickRow[] = [];
  const offsets: number[] = [];
  let total = 0;

  for (let i = 0; i < nrow; i++) {
    const polar = i === 0 || i === nrow - 1;
    const ncol = polar ? 1 : columnCountFor(decCenters[i], bricksize);
    const raEdges = polar ? [0, 360] : raEdgesFor(ncol);
    const decCenter = decCenters[i];
    const decMin = decEdges[i];
    const decMax = decEdges[i + 1];

    const bricks: BrickCell[] = [];
    for (let j = 0; j < ncol; j++) {
      const raMin = raEdges[j];
      const raMax = raEdges[j + 1];
      const ra = polar ? 180 : 0.5 * (raMin + raMax);
      bricks.push(
        Object.freeze({
          col: j,
          name: brickName(ra, decCenter),
          ra,
          raMin,
          raMax,
          area: sphericalRectArea(decMin, decMax, raMin, raMax),
        }),
      );
    }

    rows.push(
      Object.freeze({
        row: i,
        decCenter,
        decMin,
        decMax,
        raEdges: Object.freeze(raEdges),
        bricks: Object.freeze(bricks),
      }),
    );
    offsets.push(total);
    total += ncol;
  }

  return Object.freeze({
    bricksize,
    rows: Object.freeze(rows),
    decEdges: Object.freeze(decEdges),
    offsets: Object.freeze(offsets),
    total,
  });
}
