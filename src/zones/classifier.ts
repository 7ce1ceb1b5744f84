/**
 * Access-level classification over the delivery zone list
 *
 * Inside an active zone: full access. Outside every zone but within the
 * viewing radius of the nearest one: the catalogue can be browsed, but not
 * ordered from. Anything further out: no access.
 */

import { AccessClassification, AccessLevel, Coordinate, ZoneDetectionResult } from '../types/domain';
import { AccessLevelClassifier } from '../location/types';
import { config } from '../config';
import { describeError, logger } from '../config/logger';
import { GeofencingError, ErrorCode } from '../errors';
import { ZoneRepository } from './repository';

export class ZoneAccessLevelClassifier implements AccessLevelClassifier {
  constructor(
    private readonly repository: ZoneRepository,
    private readonly viewingRadiusKm: number = config.zones.viewingRadiusKm
  ) {}

  async detectAccessLevel(coordinate: Coordinate, signal?: AbortSignal): Promise<AccessLevel> {
    const classification = await this.classify(coordinate, signal);
    return classification.accessLevel;
  }

  /**
   * @throws GeofencingError(CLASSIFICATION_FAILED) when zones cannot be loaded
   */
  async classify(coordinate: Coordinate, signal?: AbortSignal): Promise<AccessClassification> {
    let detection: ZoneDetectionResult;
    try {
      detection = await this.repository.detectZone(coordinate, signal);
    } catch (error) {
      logger.warn('Unable to load delivery zones for classification', { error: describeError(error) });
      throw new GeofencingError(ErrorCode.CLASSIFICATION_FAILED, `Unable to load delivery zones: ${describeError(error)}`, {
        ...(error instanceof Error && { originalError: error }),
        ...(error instanceof GeofencingError && { details: { cause: error.code } }),
      });
    }

    if (detection.isInZone) {
      return {
        accessLevel: AccessLevel.FULL_ACCESS,
        zone: detection.zone,
        message: `Delivery available in ${detection.zone.name}`,
      };
    }

    const { closestZone, distanceKm } = detection;

    if (closestZone && distanceKm !== null && distanceKm <= this.viewingRadiusKm) {
      return {
        accessLevel: AccessLevel.VIEWING_ONLY,
        closestZone,
        distanceKm,
        message: `Browsing only: ${closestZone.name} is ${distanceKm.toFixed(1)} km away`,
      };
    }

    return {
      accessLevel: AccessLevel.NO_ACCESS,
      ...(closestZone && { closestZone }),
      ...(distanceKm !== null && { distanceKm }),
      message: detection.message,
    };
  }
}
