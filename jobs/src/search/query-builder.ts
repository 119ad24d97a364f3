import { z } from "zod";
import {
  WEB_MERCATOR_WKID,
  type EsriPolygon,
  type QueryDescriptor,
} from "@parcel-radius/clients";
import { InvalidArgumentError } from "../utils/errors";
import type { BoundingBox } from "../utils/geo";

export type FilterValue = string | number;

export type AttributeFilter =
  | { kind: "exact"; field: string; value: FilterValue }
  | { kind: "range"; field: string; min?: FilterValue; max?: FilterValue };

export interface DateRange {
  /** Inclusive lower bound, YYYY-MM-DD */
  minDate: string | null;
  /** Inclusive upper bound, YYYY-MM-DD */
  maxDate: string | null;
}

export interface CellQuery extends DateRange {
  descriptor: QueryDescriptor;
}

/** Input spatial reference of cell polygons (WGS84) */
export const WGS84_WKID = 4326;

/**
 * Fields the registry stores as epoch-ms timestamps. The layer does not
 * filter on them reliably, so they are always matched after fetching.
 */
export const CLIENT_SIDE_DATE_FIELDS: ReadonlySet<string> = new Set(["SALESDTTM"]);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// ── Legacy key/value filters ────────────────────────────────────

export const FilterRecordSchema = z.record(
  z.union([z.string(), z.number(), z.null()]).optional()
);

export type FilterRecord = z.infer<typeof FilterRecordSchema>;

/** Range bounds on server-side fields are numeric; JSON payloads may carry them as strings. */
function rangeBound(field: string, key: string, value: FilterValue): FilterValue {
  if (CLIENT_SIDE_DATE_FIELDS.has(field) || typeof value === "number") return value;

  const text = value.trim();
  const numeric = Number(text);
  if (text === "" || !Number.isFinite(numeric)) {
    throw new InvalidArgumentError("INVALID_FILTER", `${key} must be numeric, got "${value}"`);
  }
  return numeric;
}

/**
 * Convert `{ MUNICIPIO: "San Juan", SALESAMT_MIN: 50000 }` style input into
 * typed filters. `<FIELD>_MIN` / `<FIELD>_MAX` become one range filter per
 * field, with numeric bounds; every other key is an exact match. Empty
 * values are ignored.
 */
export function filtersFromRecord(input: unknown): AttributeFilter[] {
  const parsed = FilterRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      "INVALID_FILTER",
      `Filters must map field names to strings or numbers: ${parsed.error.issues[0]?.message ?? "invalid input"}`
    );
  }

  const exact: AttributeFilter[] = [];
  const ranges = new Map<string, { min?: FilterValue; max?: FilterValue }>();

  for (const [key, value] of Object.entries(parsed.data)) {
    if (value === null || value === undefined || value === "") continue;

    const bound = /^(.+)_(MIN|MAX)$/.exec(key);
    if (!bound) {
      exact.push({ kind: "exact", field: key, value });
      continue;
    }

    const [, field, side] = bound;
    const range = ranges.get(field) ?? {};
    const boundValue = rangeBound(field, key, value);
    if (side === "MIN") range.min = boundValue;
    else range.max = boundValue;
    ranges.set(field, range);
  }

  const rangeFilters = [...ranges].map(([field, range]): AttributeFilter => ({
    kind: "range",
    field,
    ...range,
  }));

  return [...exact, ...rangeFilters];
}

// ── Validation & splitting ──────────────────────────────────────

function assertField(field: string): void {
  if (!IDENTIFIER.test(field)) {
    throw new InvalidArgumentError(
      "INVALID_FILTER",
      `Filter field "${field}" is not a plain identifier`
    );
  }
}

export function parseIsoDate(value: FilterValue, field: string): string {
  const text = String(value).trim();
  const match = ISO_DATE.exec(text);
  if (match) {
    const [, y, m, d] = match.map(Number);
    const date = new Date(Date.UTC(y, m - 1, d));
    if (
      date.getUTCFullYear() === y &&
      date.getUTCMonth() === m - 1 &&
      date.getUTCDate() === d
    ) {
      return text;
    }
  }
  throw new InvalidArgumentError(
    "INVALID_DATE",
    `${field} must be a calendar date in YYYY-MM-DD form, got "${text}"`
  );
}

function tighten(
  current: string | null,
  next: string,
  pick: (a: string, b: string) => boolean
): string {
  return current === null || pick(next, current) ? next : current;
}

/**
 * Separate filters the layer evaluates from date bounds applied after
 * fetching. Validates field names, range bounds and dates.
 */
export function splitFilters(filters: readonly AttributeFilter[]): {
  server: AttributeFilter[];
  dateRange: DateRange;
} {
  const server: AttributeFilter[] = [];
  let minDate: string | null = null;
  let maxDate: string | null = null;

  for (const filter of filters) {
    assertField(filter.field);

    if (filter.kind === "range" && filter.min === undefined && filter.max === undefined) {
      throw new InvalidArgumentError(
        "INVALID_FILTER",
        `Range filter on ${filter.field} needs a min or a max`
      );
    }

    if (!CLIENT_SIDE_DATE_FIELDS.has(filter.field)) {
      server.push(filter);
      continue;
    }

    const lower = filter.kind === "exact" ? filter.value : filter.min;
    const upper = filter.kind === "exact" ? filter.value : filter.max;
    if (lower !== undefined) {
      minDate = tighten(minDate, parseIsoDate(lower, `${filter.field}_MIN`), (a, b) => a > b);
    }
    if (upper !== undefined) {
      maxDate = tighten(maxDate, parseIsoDate(upper, `${filter.field}_MAX`), (a, b) => a < b);
    }
  }

  return { server, dateRange: { minDate, maxDate } };
}

// ── Predicate ───────────────────────────────────────────────────

export function formatLiteral(value: FilterValue): string {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError("INVALID_FILTER", `Filter value ${value} is not finite`);
    }
    return String(value);
  }
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * WHERE predicate for server-side filters, clauses joined with AND.
 * Undefined when there is nothing to filter on.
 */
export function buildWhereClause(filters: readonly AttributeFilter[]): string | undefined {
  const { server } = splitFilters(filters);
  const clauses: string[] = [];

  for (const filter of server) {
    if (filter.kind === "exact") {
      clauses.push(`${filter.field} = ${formatLiteral(filter.value)}`);
      continue;
    }
    if (filter.min !== undefined) {
      clauses.push(`${filter.field} >= ${formatLiteral(filter.min)}`);
    }
    if (filter.max !== undefined) {
      clauses.push(`${filter.field} <= ${formatLiteral(filter.max)}`);
    }
  }

  return clauses.length > 0 ? clauses.join(" AND ") : undefined;
}

export function cellPolygon(cell: BoundingBox): EsriPolygon {
  return {
    rings: [
      [
        [cell.minLon, cell.minLat],
        [cell.minLon, cell.maxLat],
        [cell.maxLon, cell.maxLat],
        [cell.maxLon, cell.minLat],
        [cell.minLon, cell.minLat],
      ],
    ],
    spatialReference: { wkid: WGS84_WKID },
  };
}

/** Query for one grid cell plus the date bounds to apply to its results. */
export function buildCellQuery(
  cell: BoundingBox,
  filters: readonly AttributeFilter[]
): CellQuery {
  const { dateRange } = splitFilters(filters);
  const where = buildWhereClause(filters);

  const descriptor: QueryDescriptor = {
    geometry: cellPolygon(cell),
    spatialRel: "esriSpatialRelIntersects",
    outFields: "*",
    returnGeometry: true,
    outSR: WEB_MERCATOR_WKID,
    ...(where ? { where } : {}),
  };

  return { descriptor, ...dateRange };
}
