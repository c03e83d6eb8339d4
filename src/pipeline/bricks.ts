// Brick table export and lookup
// Builds the tiling for a brick size, writes its table, and/or looks up coordinates
// Run with: npm run bricks -- [--bricksize=0.25] [--out=PATH] [--json] [--lookup=ra,dec;ra,dec]

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  BrickIndex,
  DEFAULT_BRICKSIZE,
  serializeTable,
  serializeTableBinary,
} from "../bricks/index.js";
import type { BrickTable, PoleQuadrant, RaDec } from "../bricks/index.js";

// ---------- CLI arg parsing ----------

export interface BricksArgs {
  bricksize: number;
  out: string | null;
  json: boolean;
  lookup: RaDec[];
  poleQuadrant: PoleQuadrant;
}

/** Parse "ra,dec;ra,dec" into coordinate pairs. */
export function parseLookup(str: string): RaDec[] {
  return str
    .split(";")
    .filter((pair) => pair.trim() !== "")
    .map((pair) => {
      const parts = pair.split(",").map((s) => s.trim());
      const [ra, dec] = parts.map(Number);
      if (parts.length !== 2 || parts.some((s) => s === "") || Number.isNaN(ra) || Number.isNaN(dec)) {
        throw new Error(`Invalid coordinate: ${pair} (expected: ra,dec)`);
      }
      return { ra, dec };
    });
}

export function parseArgs(argv: string[] = process.argv.slice(2)): BricksArgs {
  let bricksize = DEFAULT_BRICKSIZE;
  let out: string | null = null;
  let json = false;
  let lookup: RaDec[] = [];
  let poleQuadrant: PoleQuadrant = "legacy";

  for (const arg of argv) {
    if (arg.startsWith("--bricksize=")) {
      const val = arg.slice("--bricksize=".length);
      bricksize = Number(val);
      if (val.trim() === "" || Number.isNaN(bricksize)) {
        throw new Error(`Invalid --bricksize value: ${arg}`);
      }
    } else if (arg.startsWith("--out=")) {
      out = arg.slice("--out=".length);
      if (!out) throw new Error(`Invalid --out value: ${arg}`);
    } else if (arg === "--json") {
      json = true;
    } else if (arg.startsWith("--lookup=")) {
      lookup = lookup.concat(parseLookup(arg.slice("--lookup=".length)));
    } else if (arg.startsWith("--pole-quadrant=")) {
      const val = arg.slice("--pole-quadrant=".length);
      if (val !== "legacy" && val !== "both") {
        throw new Error(
          `Unsupported pole quadrant "${val}". Supported: legacy, both`,
        );
      }
      poleQuadrant = val;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return { bricksize, out, json, lookup, poleQuadrant };
}

// ---------- Output ----------

export function writeTableBinary(table: BrickTable, outputPath: string): void {
  const buf = serializeTableBinary(table);
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, Buffer.from(buf));
  const sizeMB = (buf.byteLength / 1024 / 1024).toFixed(1);
  console.log(`  → ${sizeMB} MB binary written to ${outputPath}`);
}

export function writeTableJson(table: BrickTable, outputPath: string): void {
  const json = JSON.stringify(serializeTable(table));
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, json, "utf-8");
  const sizeMB = (Buffer.byteLength(json) / 1024 / 1024).toFixed(1);
  console.log(`  → ${sizeMB} MB JSON written to ${outputPath}`);
}

/** One line per coordinate: input, brick name, ID, quadrant, area and center. */
export function formatLookup(index: BrickIndex, coords: RaDec[]): string[] {
  const ras = coords.map((c) => c.ra);
  const decs = coords.map((c) => c.dec);
  const names = index.brickNames(ras, decs);
  const ids = index.brickIds(ras, decs);
  const qs = index.brickQs(ras, decs);
  const areas = index.brickAreas(ras, decs);
  const centers = index.brickCenters(ras, decs);

  return coords.map(
    (c, i) =>
      `${c.ra},${c.dec} → ${names[i]} id=${ids[i]} q=${qs[i]} ` +
      `area=${areas[i].toFixed(6)} center=${centers.ras[i].toFixed(6)},${centers.decs[i].toFixed(6)}`,
  );
}

// ---------- Main ----------

async function main() {
  const { bricksize, out, json, lookup, poleQuadrant } = parseArgs();

  console.log("sky-bricks\n");
  console.log(`  --bricksize=${bricksize}`);
  if (poleQuadrant !== "legacy") console.log(`  --pole-quadrant=${poleQuadrant}`);
  if (out) console.log(`  --out=${out}${json ? " (JSON output)" : ""}`);

  console.log("\nStep 1: Building brick grid...");
  const t0 = performance.now();
  const index = new BrickIndex(bricksize, { poleQuadrant });
  const t1 = performance.now();
  console.log(
    `  → ${index.rowCount} rows, ${index.brickCount} bricks in ${((t1 - t0) / 1000).toFixed(1)}s`,
  );

  if (lookup.length > 0) {
    console.log(`\nStep 2: Looking up ${lookup.length} coordinate(s)...`);
    for (const line of formatLookup(index, lookup)) {
      console.log(`  ${line}`);
    }
  }

  if (out) {
    console.log("\nStep 3: Writing brick table...");
    const table = index.toTable();
    const outputPath = resolve(out);
    if (json) {
      writeTableJson(table, outputPath);
    } else {
      writeTableBinary(table, outputPath);
    }
  }

  const totalTime = ((performance.now() - t0) / 1000).toFixed(1);
  console.log(`\nDone in ${totalTime}s`);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    console.error("Bricks failed:", err);
    process.exit(1);
  });
}
