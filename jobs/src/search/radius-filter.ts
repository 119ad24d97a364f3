import RBush from "rbush";
import type { PropertyRecord } from "@parcel-radius/clients";
import {
  boundingBoxAround,
  haversineKm,
  isValidCoordinate,
  kmToMiles,
  milesToKm,
  roundTo,
  type Coordinate,
} from "../utils/geo";

export const LAT_FIELD = "INSIDE_Y";
export const LON_FIELD = "INSIDE_X";

export type DistanceRecord = PropertyRecord & {
  OBJECTID: number;
  DISTANCE_KM: number;
  DISTANCE_MILES: number;
};

export interface MergeResult {
  records: PropertyRecord[];
  /** Records seen again in a later cell */
  duplicates: number;
  /** Records without an integer OBJECTID */
  missingId: number;
}

export interface MergeAndFilterResult {
  records: DistanceRecord[];
  /** Distinct OBJECTIDs across all cells */
  unique: number;
  duplicates: number;
  missingId: number;
  missingCoordinates: number;
}

export interface RadiusFilterResult {
  records: DistanceRecord[];
  /** Records without usable INSIDE_Y / INSIDE_X */
  missingCoordinates: number;
}

interface IndexedRecord {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  order: number;
  record: PropertyRecord;
  coordinate: Coordinate;
}

export function objectIdOf(record: PropertyRecord): number | null {
  const id = record.OBJECTID;
  return typeof id === "number" && Number.isInteger(id) ? id : null;
}

export function coordinateOf(record: PropertyRecord): Coordinate | null {
  const lat = record[LAT_FIELD];
  const lon = record[LON_FIELD];
  if (typeof lat !== "number" || typeof lon !== "number") return null;
  const coordinate = { lat, lon };
  return isValidCoordinate(coordinate) ? coordinate : null;
}

/** Union of per-cell result sets; the first record seen for an OBJECTID wins. */
export function mergeByObjectId(
  cellResultSets: ReadonlyArray<readonly PropertyRecord[]>
): MergeResult {
  const seen = new Set<number>();
  const records: PropertyRecord[] = [];
  let duplicates = 0;
  let missingId = 0;

  for (const set of cellResultSets) {
    for (const record of set) {
      const id = objectIdOf(record);
      if (id === null) {
        missingId++;
        continue;
      }
      if (seen.has(id)) {
        duplicates++;
        continue;
      }
      seen.add(id);
      records.push(record);
    }
  }

  return { records, duplicates, missingId };
}

/**
 * Keep records whose interior point lies within `radiusMiles` of the center.
 * Candidates come from an R-tree box query; the haversine distance decides.
 * Output is sorted by distance, ties in input order.
 */
export function filterByRadius(
  records: readonly PropertyRecord[],
  center: Coordinate,
  radiusMiles: number
): RadiusFilterResult {
  const items: IndexedRecord[] = [];
  let missingCoordinates = 0;

  records.forEach((record, order) => {
    const coordinate = coordinateOf(record);
    if (!coordinate) {
      missingCoordinates++;
      return;
    }
    items.push({
      minX: coordinate.lon,
      minY: coordinate.lat,
      maxX: coordinate.lon,
      maxY: coordinate.lat,
      order,
      record,
      coordinate,
    });
  });

  const tree = new RBush<IndexedRecord>();
  tree.load(items);

  const box = boundingBoxAround(center, milesToKm(radiusMiles));
  const candidates = tree.search({
    minX: box.minLon,
    minY: box.minLat,
    maxX: box.maxLon,
    maxY: box.maxLat,
  });

  const hits: Array<{ order: number; miles: number; record: DistanceRecord }> = [];
  for (const item of candidates) {
    const km = haversineKm(center, item.coordinate);
    const miles = kmToMiles(km);
    if (miles > radiusMiles) continue;

    const id = objectIdOf(item.record);
    if (id === null) continue;

    hits.push({
      order: item.order,
      miles,
      record: {
        ...item.record,
        OBJECTID: id,
        DISTANCE_KM: roundTo(km, 3),
        DISTANCE_MILES: roundTo(miles, 3),
      },
    });
  }

  hits.sort((a, b) => a.miles - b.miles || a.order - b.order);

  return { records: hits.map((h) => h.record), missingCoordinates };
}

export function mergeAndFilter(
  cellResultSets: ReadonlyArray<readonly PropertyRecord[]>,
  center: Coordinate,
  radiusMiles: number
): MergeAndFilterResult {
  const merged = mergeByObjectId(cellResultSets);
  const filtered = filterByRadius(merged.records, center, radiusMiles);
  return {
    records: filtered.records,
    missingCoordinates: filtered.missingCoordinates,
    unique: merged.records.length,
    duplicates: merged.duplicates,
    missingId: merged.missingId,
  };
}
