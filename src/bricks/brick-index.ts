// Read-only query surface over a brick grid
// Maps sky coordinates to the brick that contains them in O(1) per point:
// Dec rows are uniform, and so are RA columns within a row.

import type { BrickCell, BrickRow, Grid, PoleQuadrant } from "./grid";
import { DEFAULT_BRICKSIZE, brickQuadrant, buildGrid } from "./grid";
import { OutOfRangeError } from "./errors";
import { buildTable } from "./table";
import type { BrickTable } from "./table";

// ---------- Types ----------

export interface BrickIndexOptions {
  poleQuadrant?: PoleQuadrant;
}

export interface BrickLocation {
  row: number;
  col: number;
}

/** RA/Dec in degrees */
export type RaDec = { ra: number; dec: number };

/** [ra, dec] in degrees */
export type Vertex = [number, number];

/** Brick corners counter-clockwise from (raMin, decMin). */
export type Vertices = [Vertex, Vertex, Vertex, Vertex];

// ---------- Coordinate cleanup ----------

/** Wrap RA into [0, 360). */
export function normalizeRa(ra: number): number {
  const r = ra % 360;
  if (r === 0) return 0; // also folds -0
  if (r > 0) return r;
  // r + 360 can round up to exactly 360 for tiny negative r
  const wrapped = r + 360;
  return wrapped === 360 ? 0 : wrapped;
}

function checkedRa(ra: number, index?: number): number {
  if (!Number.isFinite(ra)) throw new OutOfRangeError("ra", ra, index);
  return normalizeRa(ra);
}

function checkedDec(dec: number, index?: number): number {
  if (!Number.isFinite(dec) || dec < -90 || dec > 90) {
    throw new OutOfRangeError("dec", dec, index);
  }
  return dec;
}

function assertSameLength(ras: ArrayLike<number>, decs: ArrayLike<number>): void {
  if (ras.length !== decs.length) {
    throw new RangeError(
      `RA and Dec arrays differ in length (${ras.length} vs ${decs.length})`,
    );
  }
}

// ---------- BrickIndex ----------

export class BrickIndex {
  readonly grid: Grid;
  readonly poleQuadrant: PoleQuadrant;
  private table: BrickTable | null = null;

  constructor(bricksize: number = DEFAULT_BRICKSIZE, options: BrickIndexOptions = {}) {
    this.grid = buildGrid(bricksize);
    this.poleQuadrant = options.poleQuadrant ?? "legacy";
  }

  get bricksize(): number {
    return this.grid.bricksize;
  }

  get rowCount(): number {
    return this.grid.rows.length;
  }

  get brickCount(): number {
    return this.grid.total;
  }

  toString(): string {
    return `Bricks(bricksize=${this.bricksize.toFixed(2)})`;
  }

  // ---------- Grid access ----------

  row(row: number): BrickRow {
    const r = this.grid.rows[row];
    if (r === undefined) {
      throw new RangeError(`Row ${row} out of range (0..${this.rowCount - 1})`);
    }
    return r;
  }

  columnCount(row: number): number {
    return this.row(row).bricks.length;
  }

  brickAt(row: number, col: number): BrickCell {
    const r = this.row(row);
    const brick = r.bricks[col];
    if (brick === undefined) {
      throw new RangeError(
        `Column ${col} out of range for row ${row} (0..${r.bricks.length - 1})`,
      );
    }
    return brick;
  }

  // ---------- Location ----------

  /** Row/column of a clean coordinate (RA in [0, 360), Dec in [-90, 90]). */
  private cell(ra: number, dec: number): BrickLocation {
    const { bricksize, rows } = this.grid;
    // dec = +90 lands one past the last row for some brick sizes
    const row = Math.min(
      Math.floor((dec + 90 + bricksize / 2) / bricksize),
      rows.length - 1,
    );
    const ncol = rows[row].bricks.length;
    const col = Math.min(Math.floor((ra / 360) * ncol), ncol - 1);
    return { row, col };
  }

  locate(ra: number, dec: number): BrickLocation {
    return this.cell(checkedRa(ra), checkedDec(dec));
  }

  /** Rows and columns for parallel RA/Dec arrays, in input order. */
  locateMany(
    ras: ArrayLike<number>,
    decs: ArrayLike<number>,
  ): { rows: Int32Array; cols: Int32Array } {
    assertSameLength(ras, decs);
    const n = ras.length;
    const rows = new Int32Array(n);
    const cols = new Int32Array(n);
    for (let i = 0; i < n; i++) {
      const { row, col } = this.cell(checkedRa(ras[i], i), checkedDec(decs[i], i));
      rows[i] = row;
      cols[i] = col;
    }
    return { rows, cols };
  }

  // ---------- Per-brick attributes ----------

  private idOf(row: number, col: number): number {
    return this.grid.offsets[row] + col + 1;
  }

  private quadrantOf(row: number, col: number): number {
    return brickQuadrant(row, col, this.rowCount, this.poleQuadrant);
  }

  private verticesOf(row: number, col: number): Vertices {
    const r = this.grid.rows[row];
    const { raMin, raMax } = r.bricks[col];
    return [
      [raMin, r.decMin],
      [raMax, r.decMin],
      [raMax, r.decMax],
      [raMin, r.decMax],
    ];
  }

  brickName(ra: number, dec: number): string {
    const { row, col } = this.locate(ra, dec);
    return this.grid.rows[row].bricks[col].name;
  }

  brickNames(ras: ArrayLike<number>, decs: ArrayLike<number>): string[] {
    const { rows, cols } = this.locateMany(ras, decs);
    return Array.from(rows, (row, i) => this.grid.rows[row].bricks[cols[i]].name);
  }

  /** 1-based row-major brick ID. */
  brickId(ra: number, dec: number): number {
    const { row, col } = this.locate(ra, dec);
    return this.idOf(row, col);
  }

  brickIds(ras: ArrayLike<number>, decs: ArrayLike<number>): Int32Array {
    const { rows, cols } = this.locateMany(ras, decs);
    return rows.map((row, i) => this.idOf(row, cols[i]));
  }

  /** BRICKQ of the containing brick; see {@link PoleQuadrant} for the caps. */
  brickQ(ra: number, dec: number): number {
    const { row, col } = this.locate(ra, dec);
    return this.quadrantOf(row, col);
  }

  brickQs(ras: ArrayLike<number>, decs: ArrayLike<number>): Int16Array {
    const { rows, cols } = this.locateMany(ras, decs);
    return Int16Array.from(rows, (row, i) => this.quadrantOf(row, cols[i]));
  }

  /** Area of the containing brick in square degrees. */
  brickArea(ra: number, dec: number): number {
    const { row, col } = this.locate(ra, dec);
    return this.grid.rows[row].bricks[col].area;
  }

  brickAreas(ras: ArrayLike<number>, decs: ArrayLike<number>): Float64Array {
    const { rows, cols } = this.locateMany(ras, decs);
    return Float64Array.from(rows, (row, i) => this.grid.rows[row].bricks[cols[i]].area);
  }

  brickVertices(ra: number, dec: number): Vertices {
    const { row, col } = this.locate(ra, dec);
    return this.verticesOf(row, col);
  }

  brickVerticesMany(ras: ArrayLike<number>, decs: ArrayLike<number>): Vertices[] {
    const { rows, cols } = this.locateMany(ras, decs);
    return Array.from(rows, (row, i) => this.verticesOf(row, cols[i]));
  }

  /** Center of the brick containing (`ra`, `dec`), not the input point. */
  brickCenter(ra: number, dec: number): RaDec {
    const { row, col } = this.locate(ra, dec);
    const r = this.grid.rows[row];
    return { ra: r.bricks[col].ra, dec: r.decCenter };
  }

  brickCenters(
    ras: ArrayLike<number>,
    decs: ArrayLike<number>,
  ): { ras: Float64Array; decs: Float64Array } {
    const { rows, cols } = this.locateMany(ras, decs);
    return {
      ras: Float64Array.from(rows, (row, i) => this.grid.rows[row].bricks[cols[i]].ra),
      decs: Float64Array.from(rows, (row) => this.grid.rows[row].decCenter),
    };
  }

  // ---------- Table ----------

  /** Every brick, row-major. Built on first call and reused afterwards. */
  toTable(): BrickTable {
    if (this.table === null) {
      this.table = buildTable(this.grid, this.poleQuadrant);
    }
    return this.table;
  }
}
