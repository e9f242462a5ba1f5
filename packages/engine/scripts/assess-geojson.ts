/**
 * Assess every LineString of a GeoJSON file and write the scored features.
 *
 * Usage: npx tsx scripts/assess-geojson.ts <input.geojson> [output.geojson] [--split] [--profile=<name>]
 *
 * Options:
 *   --split            Derive cycleway/sidewalk sub-segments from road centerlines
 *   --profile=<name>   Use a config profile from configs/quality/profiles
 *
 * Default output: <input>.assessed.geojson next to the input file.
 */

import { readFileSync, writeFileSync } from "fs";
import { basename, dirname, extname, resolve } from "path";
import { assessFeatureCollection, InputValidationError, loadConfig } from "../src/index.js";

const args = process.argv.slice(2);
const flags = args.filter((a) => a.startsWith("--"));
const positional = args.filter((a) => !a.startsWith("--"));

const inputArg = positional[0];
if (!inputArg) {
  console.error("Usage: npx tsx scripts/assess-geojson.ts <input.geojson> [output.geojson] [--split] [--profile=<name>]");
  process.exit(1);
}

const inputPath = resolve(inputArg);
const outputPath =
  positional[1] !== undefined
    ? resolve(positional[1])
    : resolve(dirname(inputPath), `${basename(inputPath, extname(inputPath))}.assessed.geojson`);
const profile = flags.find((f) => f.startsWith("--profile="))?.slice("--profile=".length);

function main() {
  const config = loadConfig(profile);
  console.log(`[assess] Config: ${config.name} v${config.version}${profile ? ` (profile ${profile})` : ""}`);

  console.log(`[assess] Reading ${inputPath}`);
  const input: unknown = JSON.parse(readFileSync(inputPath, "utf-8"));

  const start = performance.now();
  const { collection, dropped } = assessFeatureCollection(input, config, { split: flags.includes("--split") });
  const elapsed = (performance.now() - start).toFixed(0);

  console.log(`[assess] Assessed ${collection.features.length.toLocaleString()} segments in ${elapsed}ms`);
  if (dropped.length > 0) {
    const reasons = new Map<string, number>();
    for (const d of dropped) reasons.set(d.reason, (reasons.get(d.reason) ?? 0) + 1);
    for (const [reason, count] of reasons) {
      console.log(`[assess] Dropped ${count.toLocaleString()} (${reason})`);
    }
  }

  const json = JSON.stringify(collection);
  writeFileSync(outputPath, json);

  const sizeMb = (Buffer.byteLength(json) / 1024 / 1024).toFixed(1);
  console.log(`[assess] Written to: ${outputPath} (${sizeMb} MB)`);
}

try {
  main();
} catch (err) {
  if (err instanceof InputValidationError) {
    console.error(`[validation] ${err.message}`);
    for (const issue of err.issues) console.error(`  ${issue}`);
  } else {
    console.error(err);
  }
  process.exit(1);
}
