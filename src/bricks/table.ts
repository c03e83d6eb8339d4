// Tabular form of a brick grid: one entry per brick, row-major
// Also the JSON and compact binary interchange formats for that table

import type { Grid, PoleQuadrant } from "./grid";
import { brickQuadrant } from "./grid";

// ---------- Types ----------

export type ColumnType = "U8" | "i2" | "i4" | "f8";

/** Interchange schema: column name and storage type, in file order. */
export const BRICK_COLUMNS = [
  ["BRICKNAME", "U8"],
  ["BRICKID", "i4"],
  ["BRICKQ", "i2"],
  ["BRICKROW", "i4"],
  ["BRICKCOL", "i4"],
  ["RA", "f8"],
  ["DEC", "f8"],
  ["RA1", "f8"],
  ["RA2", "f8"],
  ["DEC1", "f8"],
  ["DEC2", "f8"],
  ["AREA", "f8"],
] as const satisfies readonly (readonly [string, ColumnType])[];

export type ColumnName = (typeof BRICK_COLUMNS)[number][0];

const FLOAT_COLUMNS = ["RA", "DEC", "RA1", "RA2", "DEC1", "DEC2", "AREA"] as const;
const INT_COLUMNS = ["BRICKID", "BRICKROW", "BRICKCOL"] as const;

type FloatColumn = (typeof FLOAT_COLUMNS)[number];
type IntColumn = (typeof INT_COLUMNS)[number];

export const COLUMN_UNITS: Partial<Record<ColumnName, string>> = {
  RA: "deg",
  DEC: "deg",
  RA1: "deg",
  RA2: "deg",
  DEC1: "deg",
  DEC2: "deg",
  AREA: "deg2",
};

export interface BrickColumns extends Record<FloatColumn, Float64Array>, Record<IntColumn, Int32Array> {
  BRICKNAME: string[];
  BRICKQ: Int16Array;
}

export interface BrickTable {
  meta: { bricksize: number };
  length: number;
  columns: BrickColumns;
}

/** One brick as a plain object, e.g. for logging or JSON lines. */
export type BrickRecord = { BRICKNAME: string } & Record<Exclude<ColumnName, "BRICKNAME">, number>;

/** JSON document holding a brick table. */
export interface BrickTableFile {
  version: 1;
  bricksize: number;
  generated: string;
  count: number;
  units: Partial<Record<ColumnName, string>>;
  columns: { BRICKNAME: string[] } & Record<Exclude<ColumnName, "BRICKNAME">, number[]>;
}

const NAME_LENGTH = 8;

function allocateColumns(n: number): BrickColumns {
  return {
    BRICKNAME: new Array<string>(n),
    BRICKID: new Int32Array(n),
    BRICKQ: new Int16Array(n),
    BRICKROW: new Int32Array(n),
    BRICKCOL: new Int32Array(n),
    RA: new Float64Array(n),
    DEC: new Float64Array(n),
    RA1: new Float64Array(n),
    RA2: new Float64Array(n),
    DEC1: new Float64Array(n),
    DEC2: new Float64Array(n),
    AREA: new Float64Array(n),
  };
}

// ---------- Build ----------

/** Flatten `grid` into a table, row 0 column 0 first. */
export function buildTable(
  grid: Grid,
  poleQuadrant: PoleQuadrant = "legacy",
): BrickTable {
  const n = grid.total;
  const c = allocateColumns(n);
  const rowCount = grid.rows.length;

  let k = 0;
  for (const row of grid.rows) {
    for (const brick of row.bricks) {
      c.BRICKNAME[k] = brick.name;
      c.BRICKID[k] = k + 1;
      c.BRICKQ[k] = brickQuadrant(row.row, brick.col, rowCount, poleQuadrant);
      c.BRICKROW[k] = row.row;
      c.BRICKCOL[k] = brick.col;
      c.RA[k] = brick.ra;
      c.DEC[k] = row.decCenter;
      c.RA1[k] = brick.raMin;
      c.RA2[k] = brick.raMax;
      c.DEC1[k] = row.decMin;
      c.DEC2[k] = row.decMax;
      c.AREA[k] = brick.area;
      k++;
    }
  }

  return { meta: { bricksize: grid.bricksize }, length: n, columns: c };
}

/** The `i`-th table entry as a record. */
export function tableRecord(table: BrickTable, i: number): BrickRecord {
  const c = table.columns;
  return {
    BRICKNAME: c.BRICKNAME[i],
    BRICKID: c.BRICKID[i],
    BRICKQ: c.BRICKQ[i],
    BRICKROW: c.BRICKROW[i],
    BRICKCOL: c.BRICKCOL[i],
    RA: c.RA[i],
    DEC: c.DEC[i],
    RA1: c.RA1[i],
    RA2: c.RA2[i],
    DEC1: c.DEC1[i],
    DEC2: c.DEC2[i],
    AREA: c.AREA[i],
  };
}

export function tableRecords(table: BrickTable): BrickRecord[] {
  return Array.from({ length: table.length }, (_, i) => tableRecord(table, i));
}

// ---------- JSON ----------

export function serializeTable(
  table: BrickTable,
  generated: string = new Date().toISOString(),
): BrickTableFile {
  const c = table.columns;
  return {
    version: 1,
    bricksize: table.meta.bricksize,
    generated,
    count: table.length,
    units: COLUMN_UNITS,
    columns: {
      BRICKNAME: [...c.BRICKNAME],
      BRICKID: Array.from(c.BRICKID),
      BRICKQ: Array.from(c.BRICKQ),
      BRICKROW: Array.from(c.BRICKROW),
      BRICKCOL: Array.from(c.BRICKCOL),
      RA: Array.from(c.RA),
      DEC: Array.from(c.DEC),
      RA1: Array.from(c.RA1),
      RA2: Array.from(c.RA2),
      DEC1: Array.from(c.DEC1),
      DEC2: Array.from(c.DEC2),
      AREA: Array.from(c.AREA),
    },
  };
}

export function deserializeTable(data: BrickTableFile): BrickTable {
  if (data.version !== 1) {
    throw new Error(`Unsupported brick table version: ${String(data.version)}`);
  }
  const n = data.count;
  for (const [name] of BRICK_COLUMNS) {
    const column: ArrayLike<unknown> | undefined = data.columns[name];
    if (column === undefined) {
      throw new Error(`Column ${name} is missing (expected ${n} entries)`);
    }
    if (column.length !== n) {
      throw new Error(
        `Column ${name} has ${column.length} entries (expected ${n})`,
      );
    }
  }

  const d = data.columns;
  return {
    meta: { bricksize: data.bricksize },
    length: n,
    columns: {
      BRICKNAME: [...d.BRICKNAME],
      BRICKID: Int32Array.from(d.BRICKID),
      BRICKQ: Int16Array.from(d.BRICKQ),
      BRICKROW: Int32Array.from(d.BRICKROW),
      BRICKCOL: Int32Array.from(d.BRICKCOL),
      RA: Float64Array.from(d.RA),
      DEC: Float64Array.from(d.DEC),
      RA1: Float64Array.from(d.RA1),
      RA2: Float64Array.from(d.RA2),
      DEC1: Float64Array.from(d.DEC1),
      DEC2: Float64Array.from(d.DEC2),
      AREA: Float64Array.from(d.AREA),
    },
  };
}

// ---------- Binary format ----------
//
// Header (24 bytes):
//   [0..3]   brickCount   uint32
//   [4..7]   version      uint32 (1)
//   [8..15]  bricksize    float64
//   [16..23] reserved     (zero-filled)
//
// Column data, in this order (offsets stay 8/4/2-byte aligned):
//   RA, DEC, RA1, RA2, DEC1, DEC2, AREA   Float64[N] each
//   BRICKID, BRICKROW, BRICKCOL           Int32[N] each
//   BRICKQ                                Int16[N]
//   BRICKNAME                             ASCII, 8 bytes per brick

const HEADER_SIZE = 24;
const BINARY_VERSION = 1;

function binarySize(n: number): number {
  return HEADER_SIZE + FLOAT_COLUMNS.length * n * 8 + INT_COLUMNS.length * n * 4 + n * 2 + n * NAME_LENGTH;
}

export function serializeTableBinary(table: BrickTable): ArrayBuffer {
  const n = table.length;
  const c = table.columns;
  const buf = new ArrayBuffer(binarySize(n));
  const view = new DataView(buf);

  view.setUint32(0, n, true);
  view.setUint32(4, BINARY_VERSION, true);
  view.setFloat64(8, table.meta.bricksize, true);

  let offset = HEADER_SIZE;
  for (const name of FLOAT_COLUMNS) {
    new Float64Array(buf, offset, n).set(c[name]);
    offset += n * 8;
  }
  for (const name of INT_COLUMNS) {
    new Int32Array(buf, offset, n).set(c[name]);
    offset += n * 4;
  }
  new Int16Array(buf, offset, n).set(c.BRICKQ);
  offset += n * 2;

  const names = new Uint8Array(buf, offset, n * NAME_LENGTH);
  const encoder = new TextEncoder();
  for (let i = 0; i < n; i++) {
    const bytes = encoder.encode(c.BRICKNAME[i]);
    if (bytes.byteLength !== NAME_LENGTH) {
      throw new Error(`Brick name "${c.BRICKNAME[i]}" is not ${NAME_LENGTH} ASCII characters`);
    }
    names.set(bytes, i * NAME_LENGTH);
  }

  return buf;
}

export function deserializeTableBinary(buf: ArrayBuffer): BrickTable {
  if (buf.byteLength < HEADER_SIZE) {
    throw new Error(`Binary brick table too small: ${buf.byteLength} bytes (need at least ${HEADER_SIZE})`);
  }

  const view = new DataView(buf);
  const n = view.getUint32(0, true);
  const version = view.getUint32(4, true);
  const bricksize = view.getFloat64(8, true);

  if (version !== BINARY_VERSION) {
    throw new Error(`Unsupported binary brick table version: ${version}`);
  }
  const expected = binarySize(n);
  if (buf.byteLength < expected) {
    throw new Error(`Invalid binary: ${n} bricks need ${expected} bytes, got ${buf.byteLength}`);
  }

  const c = allocateColumns(n);
  let offset = HEADER_SIZE;
  for (const name of FLOAT_COLUMNS) {
    c[name].set(new Float64Array(buf, offset, n));
    offset += n * 8;
  }
  for (const name of INT_COLUMNS) {
    c[name].set(new Int32Array(buf, offset, n));
    offset += n * 4;
  }
  c.BRICKQ.set(new Int16Array(buf, offset, n));
  offset += n * 2;

  const decoder = new TextDecoder();
  for (let i = 0; i < n; i++) {
    const start = offset + i * NAME_LENGTH;
    c.BRICKNAME[i] = decoder.decode(new Uint8Array(buf, start, NAME_LENGTH));
  }

  return { meta: { bricksize }, length: n, columns: c };
}
