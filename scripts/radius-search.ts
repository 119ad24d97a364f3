/**
 * Run a parcel search from the command line and print a summary.
 *
 * Usage:
 *   npx tsx scripts/radius-search.ts --lat 18.4655 --lon -66.1057 --radius 1 [--grid 3]
 *   npx tsx scripts/radius-search.ts --catastro 115-062-282-14 --radius 0.5
 *   npx tsx scripts/radius-search.ts --municipio "SAN JUAN" --min-price 50000
 *   npx tsx scripts/radius-search.ts --catastro 115-062-282-14 --lookup
 *
 * Filters: --min-price --max-price --min-date --max-date --min-cabida --max-cabida
 * Other:   --rate-limit <calls/min> --output results.json
 *
 * Needs PARCEL_SESSION_COOKIE (copied from a browser session) in .env.
 */

import dotenv from "dotenv";
dotenv.config();

import { writeFileSync } from "node:fs";
import { loadConfig } from "../jobs/src/config";
import { generateSessionId, getParcelClient } from "../jobs/src/utils/clients";
import { createRateLimiter } from "../jobs/src/utils/rate-limiter";
import { filtersFromRecord, type FilterRecord } from "../jobs/src/search/query-builder";
import {
  catastroSearch,
  DEFAULT_GRID_SIZE,
  gridRadiusSearch,
  municipioSearch,
  type GridSearchResult,
} from "../jobs/src/search/grid-search";

function option(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index === -1 ? undefined : args[index + 1];
}

function numberOption(args: string[], name: string): number | undefined {
  const raw = option(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.error(`${name} expects a number, got "${raw}"`);
    process.exit(1);
  }
  return value;
}

function printResult(result: GridSearchResult) {
  console.log(`\nReturned ${result.records.length} parcels`);
  console.log(
    `  cells: ${result.stats.cells} (failed ${result.stats.cellsFailed}, at cap ${result.stats.cellsAtCap})`
  );
  console.log(
    `  fetched: ${result.stats.fetched}, unique: ${result.stats.unique}, within radius: ${result.stats.withinRadius}`
  );

  for (const advisory of result.advisories) {
    switch (advisory.kind) {
      case "completeness_warning":
        console.log(
          `  WARNING cell ${advisory.cellIndex ?? "-"} returned ${advisory.records} records (cap ${advisory.cap})` +
            (advisory.suggestedGridSize ? `; try --grid ${advisory.suggestedGridSize}` : "")
        );
        break;
      case "fetch_failure":
        console.log(`  FAILED cell ${advisory.cellIndex ?? "-"} page ${advisory.page ?? "-"}: ${advisory.message}`);
        break;
      case "lookup_failure":
        console.log(`  LOOKUP FAILED ${advisory.catastro}: ${advisory.message}`);
        break;
    }
  }

  for (const record of result.records.slice(0, 10)) {
    console.log(
      `  ${String(record.CATASTRO ?? record.OBJECTID)}  ${record.DISTANCE_MILES ?? "-"} mi  ${record.SALESDTTM_FORMATTED ?? "-"}`
    );
  }
  if (result.records.length > 10) {
    console.log(`  ... ${result.records.length - 10} more`);
  }
}

async function main() {
  const args = process.argv.slice(2);
  const config = loadConfig();

  const rateLimit = numberOption(args, "--rate-limit") ?? config.PARCEL_RATE_LIMIT_PER_MINUTE;
  const limiter = createRateLimiter({ callsPerMinute: rateLimit });
  const client = getParcelClient(config, generateSessionId());

  const filterInput: FilterRecord = {
    SALESAMT_MIN: numberOption(args, "--min-price"),
    SALESAMT_MAX: numberOption(args, "--max-price"),
    SALESDTTM_MIN: option(args, "--min-date"),
    SALESDTTM_MAX: option(args, "--max-date"),
    CABIDA_MIN: numberOption(args, "--min-cabida"),
    CABIDA_MAX: numberOption(args, "--max-cabida"),
  };
  const filters = filtersFromRecord(filterInput);

  const lat = numberOption(args, "--lat");
  const lon = numberOption(args, "--lon");
  const catastro = option(args, "--catastro");
  const municipio = option(args, "--municipio");
  const searchOptions = {
    pageSize: config.PARCEL_PAGE_SIZE,
    maxPages: config.PARCEL_MAX_PAGES,
    pageDelayMs: config.PARCEL_PAGE_DELAY_MS,
    cellJitterMs: {
      min: config.PARCEL_CELL_JITTER_MIN_MS,
      max: config.PARCEL_CELL_JITTER_MAX_MS,
    },
    limiter,
  };

  let result: GridSearchResult;
  if (catastro && args.includes("--lookup")) {
    console.log(`Looking up catastro ${catastro}...`);
    result = await catastroSearch(client, catastro, { limiter });
  } else if (municipio && lat === undefined && !catastro) {
    console.log(`Searching municipio ${municipio}...`);
    result = await municipioSearch(client, { municipio, filters }, searchOptions);
  } else {
    const radiusMiles = numberOption(args, "--radius");
    const gridSize = numberOption(args, "--grid") ?? DEFAULT_GRID_SIZE;
    const center =
      lat !== undefined && lon !== undefined ? { lat, lon } : catastro ? { catastro } : null;
    if (!center || radiusMiles === undefined) {
      console.error("Need --lat/--lon or --catastro, and --radius");
      process.exit(1);
    }

    const allFilters = municipio
      ? [...filters, { kind: "exact" as const, field: "MUNICIPIO", value: municipio }]
      : filters;

    console.log(`Searching ${radiusMiles} mi around ${JSON.stringify(center)} with a ${gridSize}x${gridSize} grid...`);
    result = await gridRadiusSearch(
      client,
      { center, radiusMiles, gridSize, filters: allFilters },
      {
        ...searchOptions,
        onCell: ({ cellIndex, cells, received }) =>
          console.log(`  [${cellIndex + 1}/${cells}] ${received} records`),
      }
    );
  }

  printResult(result);

  const output = option(args, "--output");
  if (output) {
    writeFileSync(output, JSON.stringify(result, null, 2));
    console.log(`\nSaved to ${output}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
