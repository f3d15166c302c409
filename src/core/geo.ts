import type { GeoPoint } from "../types.js";

const EARTH_RADIUS_METERS = 6_371_008.8;
export const METERS_PER_DEGREE = (EARTH_RADIUS_METERS * Math.PI) / 180;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;
const toDegrees = (radians: number) => (radians * 180) / Math.PI;

/** Maps a longitude into [-180, 180) when it has drifted past the antimeridian. */
function wrapLongitude(longitude: number) {
  if (longitude >= 180) return longitude - 360;
  if (longitude < -180) return longitude + 360;
  return longitude;
}

export function haversineMeters(a: GeoPoint, b: GeoPoint) {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLng = toRadians(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

/** Running average: centroid of `count` points after adding `point` to a centroid of `count - 1`. */
export function runningCentroid(centroid: GeoPoint, count: number, point: GeoPoint): GeoPoint {
  let dLng = point.longitude - centroid.longitude;
  if (dLng > 180) dLng -= 360;
  else if (dLng < -180) dLng += 360;
  return {
    latitude: centroid.latitude + (point.latitude - centroid.latitude) / count,
    longitude: wrapLongitude(centroid.longitude + dLng / count)
  };
}

/**
 * Lat/lng grid with rows `cellMeters` tall. Each row is split into as many columns as fit at its
 * widest parallel, so no cell is narrower than `cellMeters` and rows near a pole hold only a few
 * columns. Column indexes wrap at the antimeridian.
 */
export class GeoGrid {
  readonly cellDegrees: number;
  private readonly rowCount: number;

  constructor(readonly cellMeters: number) {
    this.cellDegrees = cellMeters / METERS_PER_DEGREE;
    this.rowCount = Math.ceil(180 / this.cellDegrees);
  }

  cellOf(point: GeoPoint): string {
    const row = this.rowOf(point.latitude);
    const columns = this.columnsIn(row);
    return `${row}:${this.columnOf(point.longitude, 360 / columns, columns)}`;
  }

  /** Every cell overlapping the disc of `radiusMeters` around `point`, sorted. */
  cellsAround(point: GeoPoint, radiusMeters: number): string[] {
    const angle = radiusMeters / EARTH_RADIUS_METERS;
    const dLat = toDegrees(angle);
    const phi = toRadians(Math.abs(point.latitude));
    // Widest longitude reach of the disc; the whole parallel once the disc covers a pole.
    const dLng = phi + angle >= Math.PI / 2 ? 180 : toDegrees(Math.asin(Math.sin(angle) / Math.cos(phi)));

    const rowFrom = this.rowOf(Math.max(-90, point.latitude - dLat));
    const rowTo = this.rowOf(Math.min(90, point.latitude + dLat));

    const cells: string[] = [];
    for (let row = rowFrom; row <= rowTo; row++) {
      const columns = this.columnsIn(row);
      const width = 360 / columns;
      let from = 0;
      let count = columns;
      if (2 * dLng < 360 - width) {
        from = this.columnOf(point.longitude - dLng, width, columns);
        const to = this.columnOf(point.longitude + dLng, width, columns);
        count = Math.min(columns, ((to - from + columns) % columns) + 1);
      }
      for (let offset = 0; offset < count; offset++) {
        cells.push(`${row}:${(from + offset) % columns}`);
      }
    }
    return cells.sort();
  }

  private rowOf(latitude: number) {
    return Math.min(this.rowCount - 1, Math.floor((latitude + 90) / this.cellDegrees));
  }

  private columnsIn(row: number) {
    const south = -90 + row * this.cellDegrees;
    const north = south + this.cellDegrees;
    const widest = south <= 0 && north >= 0 ? 0 : Math.min(Math.abs(south), Math.abs(north));
    return Math.max(1, Math.floor((360 * Math.cos(toRadians(widest))) / this.cellDegrees));
  }

  private columnOf(longitude: number, width: number, columns: number) {
    const offset = (((longitude + 180) % 360) + 360) % 360;
    return Math.min(columns - 1, Math.floor(offset / width));
  }
}
