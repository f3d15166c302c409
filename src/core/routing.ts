import type { GovernmentUnit, JurisdictionRegistry } from "../config/jurisdictions.js";
import { NoJurisdictionError, type Result, fail, ok } from "../errors.js";
import type { Category, GeoPoint } from "../types.js";

function covers(unit: GovernmentUnit, category: Category, point: GeoPoint) {
  const { bounds } = unit;
  const categoryMatch = unit.categories === "*" || unit.categories.includes(category);
  return (
    categoryMatch &&
    point.latitude >= bounds.minLat &&
    point.latitude <= bounds.maxLat &&
    point.longitude >= bounds.minLng &&
    point.longitude <= bounds.maxLng
  );
}

function area(unit: GovernmentUnit) {
  const { bounds } = unit;
  return (bounds.maxLat - bounds.minLat) * (bounds.maxLng - bounds.minLng);
}

export class RoutingResolver {
  constructor(private readonly registry: JurisdictionRegistry) {}

  /**
   * Most specific unit wins: smallest bounding area, then an explicit category list over a
   * wildcard, then id order.
   */
  route(category: Category, point: GeoPoint): Result<string, NoJurisdictionError> {
    const matches = this.registry.units
      .filter((unit) => covers(unit, category, point))
      .sort(
        (a, b) =>
          area(a) - area(b) ||
          Number(a.categories === "*") - Number(b.categories === "*") ||
          a.id.localeCompare(b.id)
      );
    const chosen = matches[0];
    if (!chosen) return fail(new NoJurisdictionError(category, point.latitude, point.longitude));
    return ok(chosen.id);
  }
}
