import { logger } from "@trigger.dev/sdk";
import type { PropertyRecord } from "@parcel-radius/clients";
import {
  decimalToDms,
  haversineKm,
  kmToMiles,
  roundTo,
  type Coordinate,
} from "../utils/geo";
import { coordinateOf } from "./radius-filter";
import type { DateRange } from "./query-builder";

export const SALE_DATE_FIELD = "SALESDTTM";
export const SALE_DATE_FORMATTED_FIELD = "SALESDTTM_FORMATTED";

/** Largest epoch second a 32-bit signed timestamp can hold */
const MAX_EPOCH_SECONDS = 2_147_483_647;

const MAP_VIEW_LON_OFFSET = 0.0025803;
const MAP_VIEW_METERS = 1146;

export type EnrichedRecord = PropertyRecord & {
  SALESDTTM_FORMATTED?: string | null;
  MAP_LINK?: string;
  DISTANCE_KM?: number;
  DISTANCE_MILES?: number;
};

/** Epoch milliseconds → UTC `YYYY-MM-DD`, or null when unusable. */
export function formatSaleDate(value: unknown): string | null {
  if (value === null || value === undefined) return null;

  if (typeof value !== "number" || !Number.isFinite(value)) {
    logger.warn("Sale date is not a timestamp", { value: String(value) });
    return null;
  }

  const seconds = value / 1000;
  if (seconds < 0 || seconds > MAX_EPOCH_SECONDS) {
    logger.warn("Sale date out of range", { value });
    return null;
  }

  return new Date(value).toISOString().slice(0, 10);
}

/** Google Maps satellite view with a pin on the coordinate. */
export function buildMapLink({ lat, lon }: Coordinate): string {
  const place = encodeURIComponent(
    `${decimalToDms(lat, "lat")} ${decimalToDms(lon, "lon")}`
  ).replace(/'/g, "%27");
  const viewLon = lon - MAP_VIEW_LON_OFFSET;

  return (
    `https://www.google.com/maps/place/${place}/` +
    `@${lat},${viewLon},${MAP_VIEW_METERS}m/data=!3m2!1e3!4b1` +
    `!4m4!3m3!8m2!3d${lat}!4d${lon}?entry=ttu`
  );
}

export function enrichRecord(record: PropertyRecord, center?: Coordinate): EnrichedRecord {
  const enriched: EnrichedRecord = { ...record };

  if (SALE_DATE_FIELD in record) {
    enriched.SALESDTTM_FORMATTED = formatSaleDate(record[SALE_DATE_FIELD]);
  }

  const coordinate = coordinateOf(record);
  if (coordinate) {
    enriched.MAP_LINK = buildMapLink(coordinate);
    if (center) {
      const km = haversineKm(center, coordinate);
      enriched.DISTANCE_KM = roundTo(km, 3);
      enriched.DISTANCE_MILES = roundTo(kmToMiles(km), 3);
    }
  }

  return enriched;
}

export function enrichRecords(
  records: readonly PropertyRecord[],
  center?: Coordinate
): EnrichedRecord[] {
  return records.map((record) => enrichRecord(record, center));
}

/**
 * Inclusive sale-date window. Once a bound is set, records without a
 * formatted sale date are dropped.
 */
export function filterBySaleDate<T extends PropertyRecord>(
  records: readonly T[],
  { minDate, maxDate }: DateRange
): T[] {
  if (minDate === null && maxDate === null) return [...records];

  return records.filter((record) => {
    const date = record[SALE_DATE_FORMATTED_FIELD];
    if (typeof date !== "string") return false;
    if (minDate !== null && date < minDate) return false;
    if (maxDate !== null && date > maxDate) return false;
    return true;
  });
}
