import {
  degreeOffsets,
  isValidCoordinate,
  milesToKm,
  type BoundingBox,
  type Coordinate,
} from "../utils/geo";
import { InvalidArgumentError } from "../utils/errors";

export interface GridCell extends BoundingBox {
  /** Position in query order */
  index: number;
  /** Latitude band, 0 = southernmost */
  row: number;
  /** Longitude band, 0 = westernmost */
  col: number;
}

export function assertSearchArea(radiusMiles: number, gridSize: number): void {
  if (!Number.isFinite(radiusMiles) || radiusMiles <= 0) {
    throw new InvalidArgumentError(
      "INVALID_RADIUS",
      `Radius must be a positive number of miles, got ${radiusMiles}`
    );
  }
  if (!Number.isInteger(gridSize) || gridSize < 1) {
    throw new InvalidArgumentError(
      "INVALID_GRID_SIZE",
      `Grid size must be an integer >= 1, got ${gridSize}`
    );
  }
}

export function assertCenter(center: Coordinate): void {
  if (!isValidCoordinate(center)) {
    throw new InvalidArgumentError(
      "INVALID_CENTER",
      `Center (${center.lat}, ${center.lon}) is not a valid coordinate`
    );
  }
}

/**
 * Split the square that bounds the search circle into gridSize × gridSize
 * equal cells. Columns run west to east; within a column, cells run south to
 * north.
 */
export function buildGrid(
  center: Coordinate,
  radiusMiles: number,
  gridSize: number
): readonly GridCell[] {
  assertSearchArea(radiusMiles, gridSize);
  assertCenter(center);

  const offset = degreeOffsets(center, milesToKm(radiusMiles));
  const minLon = center.lon - offset.lon;
  const minLat = center.lat - offset.lat;
  const lonStep = (2 * offset.lon) / gridSize;
  const latStep = (2 * offset.lat) / gridSize;

  const cells: GridCell[] = [];
  for (let col = 0; col < gridSize; col++) {
    for (let row = 0; row < gridSize; row++) {
      cells.push(
        Object.freeze({
          index: cells.length,
          row,
          col,
          minLon: minLon + col * lonStep,
          minLat: minLat + row * latStep,
          maxLon: minLon + (col + 1) * lonStep,
          maxLat: minLat + (row + 1) * latStep,
        })
      );
    }
  }

  return Object.freeze(cells);
}
