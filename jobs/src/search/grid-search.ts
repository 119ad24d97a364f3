import { logger } from "@trigger.dev/sdk";
import type {
  ParcelQueryClient,
  PropertyRecord,
  QueryDescriptor,
} from "@parcel-radius/clients";
import { WEB_MERCATOR_WKID } from "@parcel-radius/clients";
import type { Coordinate } from "../utils/geo";
import { InvalidArgumentError, extractError } from "../utils/errors";
import { systemClock, type Clock, type RateLimiter } from "../utils/rate-limiter";
import { assertCenter, assertSearchArea, buildGrid, type GridCell } from "./grid";
import {
  buildCellQuery,
  buildWhereClause,
  splitFilters,
  type AttributeFilter,
} from "./query-builder";
import {
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_SIZE,
  assertPaging,
  fetchAllPages,
  type FetchAllPagesResult,
  type PageProgress,
} from "./paginate";
import { coordinateOf, mergeAndFilter } from "./radius-filter";
import { enrichRecords, filterBySaleDate, type EnrichedRecord } from "./enrich";

// ── Types ───────────────────────────────────────────────────────

export type CenterSpec = Coordinate | { catastro: string };

export interface GridSearchRequest {
  center: CenterSpec;
  radiusMiles: number;
  /** Cells per side; defaults to 3 */
  gridSize?: number;
  filters?: readonly AttributeFilter[];
}

export interface MunicipioSearchRequest {
  municipio: string;
  filters?: readonly AttributeFilter[];
}

export type SearchAdvisory =
  | { kind: "lookup_failure"; catastro: string; message: string }
  | {
      kind: "fetch_failure";
      /** Null for attribute-only searches */
      cellIndex: number | null;
      page: number | null;
      status: number | null;
      backendMessage: string | null;
      message: string;
    }
  | {
      kind: "completeness_warning";
      cellIndex: number | null;
      records: number;
      cap: number;
      /** Null when there is no grid to refine */
      suggestedGridSize: number | null;
    };

export interface SearchStats {
  cells: number;
  cellsFailed: number;
  cellsAtCap: number;
  fetched: number;
  unique: number;
  withinRadius: number;
  returned: number;
}

export interface GridSearchResult {
  center: Coordinate | null;
  records: EnrichedRecord[];
  advisories: SearchAdvisory[];
  stats: SearchStats;
}

export interface CellProgress {
  cellIndex: number;
  cells: number;
  received: number;
}

export interface SearchOptions {
  pageSize?: number;
  maxPages?: number;
  pageDelayMs?: number;
  /** Random pause between cells, drawn uniformly from [min, max] ms */
  cellJitterMs?: { min: number; max: number };
  limiter?: RateLimiter;
  clock?: Clock;
  random?: () => number;
  onPage?: (progress: PageProgress & { cellIndex: number | null }) => void;
  onCell?: (progress: CellProgress) => void;
}

export const DEFAULT_GRID_SIZE = 3;

const DEFAULT_CELL_JITTER_MS = { min: 500, max: 1500 };

const emptyStats = (): SearchStats => ({
  cells: 0,
  cellsFailed: 0,
  cellsAtCap: 0,
  fetched: 0,
  unique: 0,
  withinRadius: 0,
  returned: 0,
});

// ── Helpers ─────────────────────────────────────────────────────

type CenterResolution =
  | { ok: true; center: Coordinate }
  | { ok: false; advisory: SearchAdvisory };

async function resolveCenter(
  client: Pick<ParcelQueryClient, "lookupParcel">,
  spec: CenterSpec,
  limiter?: RateLimiter
): Promise<CenterResolution> {
  if (!("catastro" in spec)) return { ok: true, center: spec };

  const catastro = spec.catastro;
  try {
    await limiter?.waitForSlot();
    const record = await client.lookupParcel(catastro);
    if (!record) {
      return {
        ok: false,
        advisory: {
          kind: "lookup_failure",
          catastro,
          message: `No parcel found for catastro ${catastro}`,
        },
      };
    }
    const center = coordinateOf(record);
    if (!center) {
      return {
        ok: false,
        advisory: {
          kind: "lookup_failure",
          catastro,
          message: `Parcel ${catastro} has no interior point`,
        },
      };
    }
    return { ok: true, center };
  } catch (err) {
    const { fullMessage } = extractError(err);
    return {
      ok: false,
      advisory: { kind: "lookup_failure", catastro, message: fullMessage },
    };
  }
}

function fetchAdvisories(
  result: FetchAllPagesResult,
  cellIndex: number | null,
  cap: number,
  suggestedGridSize: number | null
): SearchAdvisory[] {
  const advisories: SearchAdvisory[] = [];
  if (result.failure) {
    advisories.push({
      kind: "fetch_failure",
      cellIndex,
      page: result.failure.page,
      status: result.failure.status,
      backendMessage: result.failure.backendMessage,
      message: result.failure.message,
    });
  }
  if (result.hitCap) {
    advisories.push({
      kind: "completeness_warning",
      cellIndex,
      records: result.records.length,
      cap,
      suggestedGridSize,
    });
  }
  return advisories;
}

function thrownFailure(err: unknown, cellIndex: number | null): SearchAdvisory {
  const { fullMessage } = extractError(err);
  return {
    kind: "fetch_failure",
    cellIndex,
    page: null,
    status: null,
    backendMessage: null,
    message: fullMessage,
  };
}

// ── Grid radius search ──────────────────────────────────────────

/**
 * Exhaustive radius search: tile the bounding square into cells small enough
 * to stay under the per-query cap, fetch every cell, then merge, dedupe and
 * cut back to the circle.
 */
export async function gridRadiusSearch(
  client: Pick<ParcelQueryClient, "queryPage" | "lookupParcel">,
  request: GridSearchRequest,
  options: SearchOptions = {}
): Promise<GridSearchResult> {
  const { radiusMiles, gridSize = DEFAULT_GRID_SIZE } = request;
  const filters = request.filters ?? [];
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  assertSearchArea(radiusMiles, gridSize);
  assertPaging(pageSize, maxPages);
  if (!("catastro" in request.center)) assertCenter(request.center);
  const { dateRange } = splitFilters(filters);

  const jitter = options.cellJitterMs ?? DEFAULT_CELL_JITTER_MS;
  const clock = options.clock ?? systemClock;
  const random = options.random ?? Math.random;
  const cap = pageSize * maxPages;

  const resolved = await resolveCenter(client, request.center, options.limiter);
  if (!resolved.ok) {
    logger.warn("Center lookup failed", { ...resolved.advisory });
    return {
      center: null,
      records: [],
      advisories: [resolved.advisory],
      stats: emptyStats(),
    };
  }
  const center = resolved.center;

  const cells = buildGrid(center, radiusMiles, gridSize);
  logger.info("Starting grid radius search", {
    lat: center.lat,
    lon: center.lon,
    radiusMiles,
    gridSize,
    cells: cells.length,
  });

  const advisories: SearchAdvisory[] = [];
  const cellResults: PropertyRecord[][] = [];
  const stats = emptyStats();
  stats.cells = cells.length;

  async function searchCell(cell: GridCell): Promise<void> {
    const progress = `${cell.index + 1}/${cells.length}`;
    try {
      const { descriptor } = buildCellQuery(cell, filters);
      const result = await fetchAllPages(client, descriptor, {
        pageSize,
        maxPages,
        pageDelayMs: options.pageDelayMs,
        sleep: clock.sleep,
        limiter: options.limiter,
        onPage: (p) => options.onPage?.({ ...p, cellIndex: cell.index }),
      });

      cellResults.push(result.records);
      stats.fetched += result.records.length;
      if (result.failure) stats.cellsFailed++;
      if (result.hitCap) {
        stats.cellsAtCap++;
        logger.warn("Cell hit the result cap; results may be incomplete", {
          cellIndex: cell.index,
          records: result.records.length,
          cap,
          suggestedGridSize: gridSize + 2,
        });
      }
      advisories.push(...fetchAdvisories(result, cell.index, cap, gridSize + 2));

      logger.log("Cell complete", {
        cellIndex: cell.index,
        records: result.records.length,
        pages: result.pagesFetched,
        progress,
      });
      options.onCell?.({
        cellIndex: cell.index,
        cells: cells.length,
        received: result.records.length,
      });
    } catch (err) {
      const { fullMessage, type, stack, cause } = extractError(err);
      logger.error("Cell query failed", {
        cellIndex: cell.index,
        error: fullMessage,
        errorType: type,
        cause,
        stack,
        progress,
      });
      advisories.push(thrownFailure(err, cell.index));
      stats.cellsFailed++;
    }
  }

  for (const cell of cells) {
    await logger.trace("grid-cell", () => searchCell(cell), {
      attributes: { "cell.index": cell.index, "cell.row": cell.row, "cell.col": cell.col },
    });

    if (cell.index < cells.length - 1) {
      await clock.sleep(jitter.min + random() * (jitter.max - jitter.min));
    }
  }

  const filtered = mergeAndFilter(cellResults, center, radiusMiles);
  const records = filterBySaleDate(enrichRecords(filtered.records, center), dateRange);

  stats.unique = filtered.unique;
  stats.withinRadius = filtered.records.length;
  stats.returned = records.length;

  logger.info("Grid radius search complete", { ...stats, advisories: advisories.length });

  return { center, records, advisories, stats };
}

// ── Attribute-only searches ─────────────────────────────────────

/** All parcels in one municipality matching the remaining filters. */
export async function municipioSearch(
  client: Pick<ParcelQueryClient, "queryPage">,
  request: MunicipioSearchRequest,
  options: SearchOptions = {}
): Promise<GridSearchResult> {
  const municipio = request.municipio.trim();
  if (!municipio) {
    throw new InvalidArgumentError("INVALID_FILTER", "Municipio must not be empty");
  }

  const filters: AttributeFilter[] = [
    { kind: "exact", field: "MUNICIPIO", value: municipio },
    ...(request.filters ?? []).filter((f) => f.field !== "MUNICIPIO"),
  ];
  const { dateRange } = splitFilters(filters);

  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  assertPaging(pageSize, maxPages);

  const descriptor: QueryDescriptor = {
    spatialRel: "esriSpatialRelIntersects",
    where: buildWhereClause(filters),
    outFields: "*",
    returnGeometry: true,
    outSR: WEB_MERCATOR_WKID,
  };

  logger.info("Starting municipio search", { municipio, where: descriptor.where });

  const stats = emptyStats();
  const advisories: SearchAdvisory[] = [];
  let fetched: PropertyRecord[] = [];

  try {
    const result = await fetchAllPages(client, descriptor, {
      pageSize,
      maxPages,
      pageDelayMs: options.pageDelayMs,
      sleep: (options.clock ?? systemClock).sleep,
      limiter: options.limiter,
      onPage: (p) => options.onPage?.({ ...p, cellIndex: null }),
    });
    fetched = result.records;
    advisories.push(...fetchAdvisories(result, null, pageSize * maxPages, null));
    if (result.failure) stats.cellsFailed = 1;
    if (result.hitCap) stats.cellsAtCap = 1;
  } catch (err) {
    const { fullMessage, type, cause } = extractError(err);
    logger.error("Municipio query failed", { municipio, error: fullMessage, errorType: type, cause });
    advisories.push(thrownFailure(err, null));
    stats.cellsFailed = 1;
  }

  const records = filterBySaleDate(enrichRecords(fetched), dateRange);

  stats.cells = 1;
  stats.fetched = fetched.length;
  stats.unique = fetched.length;
  stats.withinRadius = fetched.length;
  stats.returned = records.length;

  logger.info("Municipio search complete", { municipio, ...stats });

  return { center: null, records, advisories, stats };
}

/** Full-detail lookup of one parcel. */
export async function catastroSearch(
  client: Pick<ParcelQueryClient, "lookupParcel">,
  catastro: string,
  options: Pick<SearchOptions, "limiter"> = {}
): Promise<GridSearchResult> {
  const stats = emptyStats();
  let record: PropertyRecord | null;

  try {
    await options.limiter?.waitForSlot();
    record = await client.lookupParcel(catastro);
  } catch (err) {
    const { fullMessage } = extractError(err);
    logger.warn("Catastro lookup failed", { catastro, error: fullMessage });
    return {
      center: null,
      records: [],
      advisories: [{ kind: "lookup_failure", catastro, message: fullMessage }],
      stats,
    };
  }

  if (!record) {
    logger.info("No parcel found", { catastro });
    return {
      center: null,
      records: [],
      advisories: [
        { kind: "lookup_failure", catastro, message: `No parcel found for catastro ${catastro}` },
      ],
      stats,
    };
  }

  const records = enrichRecords([record]);
  return {
    center: coordinateOf(record),
    records,
    advisories: [],
    stats: { ...stats, fetched: 1, unique: 1, withinRadius: 1, returned: 1 },
  };
}
