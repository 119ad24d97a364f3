/**
 * Geodesy helpers shared by grid partitioning, radius filtering and result
 * enrichment. Spherical Earth, decimal degrees (WGS84).
 */

export interface Coordinate {
  lat: number;
  lon: number;
}

export interface BoundingBox {
  minLon: number;
  minLat: number;
  maxLon: number;
  maxLat: number;
}

export const MILES_TO_KM = 1.60934;
export const EARTH_RADIUS_KM = 6371;
/** Rough length of one degree of latitude, used for bounding boxes only */
export const KM_PER_DEGREE = 111;
/** Lower bound on |cos(lat)| so longitude offsets stay finite at the poles */
export const COS_LAT_EPSILON = 1e-6;

const toRad = (d: number) => (d * Math.PI) / 180;

export function milesToKm(miles: number): number {
  return miles * MILES_TO_KM;
}

export function kmToMiles(km: number): number {
  return km / MILES_TO_KM;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function isValidCoordinate(c: Coordinate): boolean {
  return (
    Number.isFinite(c.lat) &&
    Number.isFinite(c.lon) &&
    c.lat >= -90 &&
    c.lat <= 90 &&
    c.lon >= -180 &&
    c.lon <= 180
  );
}

/** Great-circle distance in kilometers. */
export function haversineKm(a: Coordinate, b: Coordinate): number {
  const dLat = toRad(b.lat - a.lat);
  const dLon = toRad(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2;
  return EARTH_RADIUS_KM * 2 * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function haversineMiles(a: Coordinate, b: Coordinate): number {
  return kmToMiles(haversineKm(a, b));
}

/**
 * Degree offsets that reach `radiusKm` from the center along each axis.
 * The square center ± offsets contains the whole circle.
 */
export function degreeOffsets(
  center: Coordinate,
  radiusKm: number
): { lat: number; lon: number } {
  const cosLat = Math.max(Math.abs(Math.cos(toRad(center.lat))), COS_LAT_EPSILON);
  return {
    lat: radiusKm / KM_PER_DEGREE,
    lon: radiusKm / (KM_PER_DEGREE * cosLat),
  };
}

export function boundingBoxAround(center: Coordinate, radiusKm: number): BoundingBox {
  const offset = degreeOffsets(center, radiusKm);
  return {
    minLon: center.lon - offset.lon,
    minLat: center.lat - offset.lat,
    maxLon: center.lon + offset.lon,
    maxLat: center.lat + offset.lat,
  };
}

/**
 * Degrees/minutes/seconds notation, e.g. `18°27'55.8"N`.
 * Seconds carry one decimal; rounding carries into minutes and degrees.
 */
export function decimalToDms(value: number, axis: "lat" | "lon"): string {
  const hemisphere =
    axis === "lat" ? (value >= 0 ? "N" : "S") : value >= 0 ? "E" : "W";

  const tenths = Math.round(Math.abs(value) * 36_000);
  const degrees = Math.floor(tenths / 36_000);
  const minutes = Math.floor((tenths % 36_000) / 600);
  const seconds = (tenths % 600) / 10;

  const mm = String(minutes).padStart(2, "0");
  const ss = seconds.toFixed(1).padStart(4, "0");
  return `${degrees}°${mm}'${ss}"${hemisphere}`;
}
