import { parseArgs, parseLookup, formatLookup, writeTableBinary, writeTableJson } from "./bricks.js";
import { BrickIndex, deserializeTable, deserializeTableBinary } from "../bricks/index.js";
import type { BrickTableFile } from "../bricks/index.js";
import { tmpdir } from "node:os";
import { mkdtempSync, readFileSync } from "node:fs";
import { join } from "node:path";

// ---------- parseArgs ----------

describe("parseArgs", () => {
  it("defaults to 0.25° bricks and no output", () => {
    expect(parseArgs([])).toEqual({
      bricksize: 0.25,
      out: null,
      json: false,
      lookup: [],
      poleQuadrant: "legacy",
    });
  });

  it("reads every flag", () => {
    expect(
      parseArgs([
        "--bricksize=0.5",
        "--out=data/bricks.json",
        "--json",
        "--lookup=10,20;30.5,-40",
        "--pole-quadrant=both",
      ]),
    ).toEqual({
      bricksize: 0.5,
      out: "data/bricks.json",
      json: true,
      lookup: [
        { ra: 10, dec: 20 },
        { ra: 30.5, dec: -40 },
      ],
      poleQuadrant: "both",
    });
  });

  it("accumulates repeated --lookup flags", () => {
    expect(parseArgs(["--lookup=1,2", "--lookup=3,4"]).lookup).toEqual([
      { ra: 1, dec: 2 },
      { ra: 3, dec: 4 },
    ]);
  });

  it("rejects a non-numeric brick size", () => {
    expect(() => parseArgs(["--bricksize=big"])).toThrow(
      "Invalid --bricksize value: --bricksize=big",
    );
    expect(() => parseArgs(["--bricksize="])).toThrow("Invalid --bricksize value");
  });

  it("rejects an unknown pole quadrant", () => {
    expect(() => parseArgs(["--pole-quadrant=north"])).toThrow(
      'Unsupported pole quadrant "north". Supported: legacy, both',
    );
  });

  it("rejects unknown arguments", () => {
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown argument: --verbose");
  });
});

// ---------- parseLookup ----------

describe("parseLookup", () => {
  it("splits pairs on semicolons", () => {
    expect(parseLookup("0,0; 180,0.1")).toEqual([
      { ra: 0, dec: 0 },
      { ra: 180, dec: 0.1 },
    ]);
  });

  it("ignores a trailing semicolon", () => {
    expect(parseLookup("1,2;")).toEqual([{ ra: 1, dec: 2 }]);
  });

  it("rejects malformed pairs", () => {
    expect(() => parseLookup("1,2,3")).toThrow("Invalid coordinate: 1,2,3 (expected: ra,dec)");
    expect(() => parseLookup("1")).toThrow("Invalid coordinate: 1");
    expect(() => parseLookup("a,b")).toThrow("Invalid coordinate: a,b");
  });
});

// ---------- formatLookup ----------

describe("formatLookup", () => {
  it("describes the containing brick of each coordinate", () => {
    const index = new BrickIndex(90);
    expect(
      formatLookup(index, [
        { ra: 10, dec: 0 },
        { ra: 5, dec: -90 },
      ]),
    ).toEqual([
      "10,0 → 0450p000 id=2 q=2 area=7292.562161 center=45.000000,0.000000",
      `5,-90 → 1800m900 id=1 q=1 area=${index.brickArea(5, -90).toFixed(6)} center=180.000000,-90.000000`,
    ]);
  });
});

// ---------- Output ----------

describe("table output", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes a binary table that reads back", () => {
    const dir = mkdtempSync(join(tmpdir(), "bricks-"));
    const path = join(dir, "nested", "bricks.bin");
    const table = new BrickIndex(90).toTable();

    writeTableBinary(table, path);

    const bytes = readFileSync(path);
    const buf = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buf).set(bytes);
    expect(deserializeTableBinary(buf)).toEqual(table);
    expect(console.log).toHaveBeenCalledWith(`  → 0.0 MB binary written to ${path}`);
  });

  it("writes a JSON table that reads back", () => {
    const dir = mkdtempSync(join(tmpdir(), "bricks-"));
    const path = join(dir, "bricks.json");
    const table = new BrickIndex(90).toTable();

    writeTableJson(table, path);

    const parsed = JSON.parse(readFileSync(path, "utf-8")) as BrickTableFile;
    expect(parsed.count).toBe(6);
    expect(deserializeTable(parsed)).toEqual(table);
  });
});
