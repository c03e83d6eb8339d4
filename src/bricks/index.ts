// Sky brick tiling — public API
// Bricks tile the celestial sphere in Dec rows of even RA column counts,
// with a circular cap of diameter `bricksize` at each pole.

export { BrickError, ConfigurationError, OutOfRangeError } from "./errors";
export type { Coordinate } from "./errors";

export { brickName, formatFixed, roundHalfEven } from "./naming";

export {
  DEFAULT_BRICKSIZE,
  MAX_BRICKSIZE,
  brickQuadrant,
  buildGrid,
  columnCountFor,
  rowCountFor,
  sphericalRectArea,
} from "./grid";
export type { BrickCell, BrickRow, Grid, PoleQuadrant } from "./grid";

export { BrickIndex, normalizeRa } from "./brick-index";
export type {
  BrickIndexOptions,
  BrickLocation,
  RaDec,
  Vertex,
  Vertices,
} from "./brick-index";

export {
  BRICK_COLUMNS,
  COLUMN_UNITS,
  buildTable,
  deserializeTable,
  deserializeTableBinary,
  serializeTable,
  serializeTableBinary,
  tableRecord,
  tableRecords,
} from "./table";
export type {
  BrickColumns,
  BrickRecord,
  BrickTable,
  BrickTableFile,
  ColumnName,
  ColumnType,
} from "./table";

export { brickname, clearSharedBricks, sharedBricks } from "./shared";
