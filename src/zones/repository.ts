/**
 * Delivery zone repository
 * Loads zones through a ZoneSource, rejects unusable shapes at ingestion and
 * keeps the list in memory for a cache window.
 */

import NodeCache from 'node-cache';
import { BoundingBox, Coordinate, DeliveryZone, ZoneDetectionResult, ZoneType } from '../types/domain';
import { config } from '../config';
import { logger } from '../config/logger';
import {
  boundingBox,
  containsPoint,
  distanceToZone,
  findClosestZone,
  isInBoundingBox,
  validateCircle,
  validatePolygon,
} from '../geometry';
import { CoordinateSchema } from '../types/validation';
import { ZoneSource } from './sources';

interface CachedZones {
  zones: readonly DeliveryZone[];
  boxes: ReadonlyMap<DeliveryZone, BoundingBox>; // polygon zones only
}

export const OUTSIDE_ZONES_MESSAGE = "We don't deliver to this area yet, but we're expanding soon!";

/**
 * Polygons need three usable vertices; an open ring is kept. Circles need a
 * valid center and a radius in (0.1, 50] km.
 */
function hasUsableShape(zone: DeliveryZone): boolean {
  if (zone.zoneType === ZoneType.CIRCLE) {
    return validateCircle(zone.center, zone.radiusKm);
  }

  const ring = zone.boundaryCoordinates;
  if (ring.length < 3 || !ring.every((point) => CoordinateSchema.safeParse(point).success)) {
    return false;
  }

  if (!validatePolygon(ring)) {
    logger.warn('Delivery zone ring is not closed', { zoneId: zone.id });
  }
  return true;
}

function byPriority(a: DeliveryZone, b: DeliveryZone): number {
  const priorityDiff = (b.priority ?? 1) - (a.priority ?? 1);
  if (priorityDiff !== 0) return priorityDiff;
  return (a.zoneNumber ?? Number.MAX_SAFE_INTEGER) - (b.zoneNumber ?? Number.MAX_SAFE_INTEGER);
}

export class ZoneRepository {
  private cache: NodeCache;
  private readonly cacheKey = 'active_zones';
  private pending: Promise<CachedZones> | null = null;

  constructor(
    private readonly source: ZoneSource,
    cacheTtlSeconds: number = config.zones.cacheTtlSeconds
  ) {
    // Expired entries are dropped on read; no background sweep timer
    this.cache = new NodeCache({ stdTTL: cacheTtlSeconds, checkperiod: 0, useClones: false });
  }

  /**
   * Active zones with valid shapes, highest priority first
   */
  async getActiveZones(signal?: AbortSignal): Promise<readonly DeliveryZone[]> {
    return (await this.load(signal)).zones;
  }

  /**
   * First zone, in priority order, that contains the coordinate
   */
  async detectZone(coordinate: Coordinate, signal?: AbortSignal): Promise<ZoneDetectionResult> {
    const { zones, boxes } = await this.load(signal);

    for (const zone of zones) {
      const box = boxes.get(zone);
      if (box && !isInBoundingBox(coordinate, box)) continue;

      if (containsPoint(coordinate, zone)) {
        return { isInZone: true, zone, coordinate };
      }
    }

    const closestZone = findClosestZone(coordinate, zones);

    return {
      isInZone: false,
      coordinate,
      closestZone,
      distanceKm: closestZone ? distanceToZone(coordinate, closestZone) : null,
      message: OUTSIDE_ZONES_MESSAGE,
    };
  }

  async findClosestZone(coordinate: Coordinate, signal?: AbortSignal): Promise<DeliveryZone | null> {
    return findClosestZone(coordinate, await this.getActiveZones(signal));
  }

  async isDeliveryAvailable(coordinate: Coordinate, signal?: AbortSignal): Promise<boolean> {
    return (await this.detectZone(coordinate, signal)).isInZone;
  }

  /**
   * Force the next read to go back to the source
   */
  clearCache(): void {
    this.cache.del(this.cacheKey);
    logger.debug('Delivery zone cache cleared');
  }

  private async load(signal?: AbortSignal): Promise<CachedZones> {
    const cached = this.cache.get<CachedZones>(this.cacheKey);
    if (cached) {
      logger.debug('Returning cached delivery zones', { zones: cached.zones.length });
      return cached;
    }

    // Overlapping cold reads share one fetch, bound to the first caller's signal
    if (!this.pending) {
      this.pending = this.fetchAndCache(signal).finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async fetchAndCache(signal?: AbortSignal): Promise<CachedZones> {
    const fetched = await this.source.fetchActiveZones(signal);
    const zones = fetched
      .filter((zone) => {
        if (!zone.isActive) return false;
        if (hasUsableShape(zone)) return true;

        logger.warn('Dropping delivery zone with an invalid shape', {
          zoneId: zone.id,
          zoneType: zone.zoneType,
        });
        return false;
      })
      .sort(byPriority);

    const boxes = new Map<DeliveryZone, BoundingBox>();
    for (const zone of zones) {
      if (zone.zoneType === ZoneType.POLYGON) {
        boxes.set(zone, boundingBox(zone.boundaryCoordinates));
      }
    }

    const entry: CachedZones = { zones: Object.freeze(zones), boxes };
    this.cache.set(this.cacheKey, entry);

    logger.info('Delivery zones loaded', { fetched: fetched.length, active: zones.length });
    return entry;
  }
}
