/**
 * Zone geometry engine
 *
 * Pure, synchronous geometry over delivery zones: containment, proximity and
 * shape validation. Inputs and outputs are in decimal degrees and kilometers.
 * Nothing here throws; a zone whose shape payload is unusable never contains a
 * point and is infinitely far away.
 *
 * The antimeridian and the poles get no special treatment, so zones spanning
 * ±180° longitude are evaluated incorrectly.
 */

import { BoundingBox, Coordinate, DeliveryZone, ZoneType } from '../types/domain';

export const EARTH_RADIUS_KM = 6371;

/** Endpoints of a closed polygon ring must be within this distance (about 10 m) */
export const RING_CLOSURE_TOLERANCE_KM = 0.01;

export const MIN_CIRCLE_RADIUS_KM = 0.1; // exclusive
export const MAX_CIRCLE_RADIUS_KM = 50.0;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

function isUsableCoordinate(value: Coordinate | null | undefined): value is Coordinate {
  return value != null && Number.isFinite(value.lat) && Number.isFinite(value.lng);
}

/**
 * Great-circle distance between two points using the Haversine formula
 * @returns Distance in kilometers
 */
export function haversineDistance(point1: Coordinate, point2: Coordinate): number {
  const lat1Rad = toRadians(point1.lat);
  const lat2Rad = toRadians(point2.lat);
  const deltaLat = toRadians(point2.lat - point1.lat);
  const deltaLng = toRadians(point2.lng - point1.lng);

  const a =
    Math.sin(deltaLat / 2) * Math.sin(deltaLat / 2) +
    Math.cos(lat1Rad) * Math.cos(lat2Rad) * Math.sin(deltaLng / 2) * Math.sin(deltaLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}

export function coordinatesEqual(a: Coordinate, b: Coordinate): boolean {
  return a.lat === b.lat && a.lng === b.lng;
}

/**
 * Even-odd ray casting. A crossing is counted for every edge that straddles
 * the point's latitude and meets that latitude east of the point.
 */
function isPointInPolygon(point: Coordinate, polygon: readonly Coordinate[]): boolean {
  if (polygon.length < 3) return false;

  let crossings = 0;

  for (let i = 0; i < polygon.length; i++) {
    const v1 = polygon[i];
    const v2 = polygon[(i + 1) % polygon.length];

    if (!isUsableCoordinate(v1) || !isUsableCoordinate(v2)) return false;

    if (v1.lat > point.lat !== v2.lat > point.lat) {
      const lngAtPointLat = ((v2.lng - v1.lng) * (point.lat - v1.lat)) / (v2.lat - v1.lat) + v1.lng;
      if (point.lng < lngAtPointLat) {
        crossings++;
      }
    }
  }

  return crossings % 2 === 1;
}

function isPointInCircle(point: Coordinate, center: Coordinate, radiusKm: number): boolean {
  return haversineDistance(point, center) <= radiusKm;
}

/**
 * Whether the point lies inside the zone. Inactive zones never contain anything.
 * The circle boundary is inclusive.
 */
export function containsPoint(point: Coordinate, zone: DeliveryZone): boolean {
  if (!zone.isActive || !isUsableCoordinate(point)) return false;

  switch (zone.zoneType) {
    case ZoneType.POLYGON:
      return Array.isArray(zone.boundaryCoordinates) && isPointInPolygon(point, zone.boundaryCoordinates);
    case ZoneType.CIRCLE:
      return (
        isUsableCoordinate(zone.center) &&
        Number.isFinite(zone.radiusKm) &&
        isPointInCircle(point, zone.center, zone.radiusKm)
      );
    default:
      return false;
  }
}

/**
 * Distance used to rank zones by proximity: to the center of a circle, or to
 * the nearest vertex of a polygon. The polygon figure is an approximation and
 * overstates the distance for points closest to the middle of a long edge.
 *
 * Returns Infinity for inactive zones and zones without a usable shape.
 */
export function distanceToZone(point: Coordinate, zone: DeliveryZone): number {
  if (!zone.isActive || !isUsableCoordinate(point)) return Infinity;

  switch (zone.zoneType) {
    case ZoneType.CIRCLE:
      return isUsableCoordinate(zone.center) ? haversineDistance(point, zone.center) : Infinity;
    case ZoneType.POLYGON: {
      if (!Array.isArray(zone.boundaryCoordinates)) return Infinity;

      let minDistance = Infinity;
      for (const vertex of zone.boundaryCoordinates) {
        if (!isUsableCoordinate(vertex)) continue;
        minDistance = Math.min(minDistance, haversineDistance(point, vertex));
      }
      return minDistance;
    }
    default:
      return Infinity;
  }
}

/**
 * Nearest active zone with a usable shape, or null when there is none.
 * Ties keep the zone listed first.
 */
export function findClosestZone(point: Coordinate, zones: readonly DeliveryZone[]): DeliveryZone | null {
  let closestZone: DeliveryZone | null = null;
  let minDistance = Infinity;

  for (const zone of zones) {
    const distance = distanceToZone(point, zone);
    if (distance < minDistance) {
      minDistance = distance;
      closestZone = zone;
    }
  }

  return closestZone;
}

/**
 * At least three points, and first and last point within about 10 m of each other
 */
export function validatePolygon(points: readonly Coordinate[]): boolean {
  if (points.length < 3) return false;

  const first = points[0];
  const last = points[points.length - 1];
  if (!points.every(isUsableCoordinate)) return false;

  return haversineDistance(first, last) < RING_CLOSURE_TOLERANCE_KM;
}

export function validateCircle(center: Coordinate, radiusKm: number): boolean {
  if (!isUsableCoordinate(center)) return false;
  if (center.lat < -90 || center.lat > 90) return false;
  if (center.lng < -180 || center.lng > 180) return false;

  return radiusKm > MIN_CIRCLE_RADIUS_KM && radiusKm <= MAX_CIRCLE_RADIUS_KM;
}

/**
 * Shape check for a zone at ingestion time
 */
export function validateZone(zone: DeliveryZone): boolean {
  switch (zone.zoneType) {
    case ZoneType.POLYGON:
      return Array.isArray(zone.boundaryCoordinates) && validatePolygon(zone.boundaryCoordinates);
    case ZoneType.CIRCLE:
      return validateCircle(zone.center, zone.radiusKm);
    default:
      return false;
  }
}

/**
 * Axis-aligned bounds. An empty list yields an all-zero box.
 */
export function boundingBox(points: readonly Coordinate[]): BoundingBox {
  if (points.length === 0) {
    return { minLat: 0, maxLat: 0, minLng: 0, maxLng: 0 };
  }

  const box: BoundingBox = {
    minLat: points[0].lat,
    maxLat: points[0].lat,
    minLng: points[0].lng,
    maxLng: points[0].lng,
  };

  for (const point of points) {
    if (point.lat < box.minLat) box.minLat = point.lat;
    if (point.lat > box.maxLat) box.maxLat = point.lat;
    if (point.lng < box.minLng) box.minLng = point.lng;
    if (point.lng > box.maxLng) box.maxLng = point.lng;
  }

  return box;
}

/**
 * Cheap pre-filter before a polygon test. Edges are inclusive.
 */
export function isInBoundingBox(point: Coordinate, box: BoundingBox): boolean {
  return (
    point.lat >= box.minLat && point.lat <= box.maxLat && point.lng >= box.minLng && point.lng <= box.maxLng
  );
}
