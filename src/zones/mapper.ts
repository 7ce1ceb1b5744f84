/**
 * Maps rows of the backend `zones` table to domain zones
 */

import { DeliveryZone, ZoneType } from '../types/domain';
import { ZoneRow, ZoneRowSchema } from '../types/validation';
import { GeofencingError, ErrorCode } from '../errors';

function optionalFields(row: ZoneRow) {
  return {
    ...(row.town_id != null && { townId: row.town_id }),
    ...(row.zone_number != null && { zoneNumber: row.zone_number }),
    ...(row.priority != null && { priority: row.priority }),
  };
}

/**
 * @throws GeofencingError(INVALID_ZONE) when the row is malformed or its
 * shape payload does not match its zone_type
 */
export function rowToZone(raw: unknown): DeliveryZone {
  const parsed = ZoneRowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GeofencingError(ErrorCode.INVALID_ZONE, 'Zone row failed validation', {
      details: { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
    });
  }

  const row = parsed.data;
  const base = {
    id: row.id,
    name: row.name,
    isActive: row.is_active,
    ...optionalFields(row),
  };

  if (row.zone_type === 'polygon') {
    if (!row.boundary_coordinates || row.boundary_coordinates.length < 3) {
      throw new GeofencingError(ErrorCode.INVALID_ZONE, 'Polygon zone needs at least 3 boundary points', {
        details: { zoneId: row.id },
      });
    }

    return { ...base, zoneType: ZoneType.POLYGON, boundaryCoordinates: row.boundary_coordinates };
  }

  if (row.center_lat == null || row.center_lng == null || row.radius_km == null) {
    throw new GeofencingError(ErrorCode.INVALID_ZONE, 'Circle zone needs a center and a radius', {
      details: { zoneId: row.id },
    });
  }

  return {
    ...base,
    zoneType: ZoneType.CIRCLE,
    center: { lat: row.center_lat, lng: row.center_lng },
    radiusKm: row.radius_km,
  };
}
