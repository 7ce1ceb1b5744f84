import { LocationData, LocationReadinessResult, LocationReadinessStatus } from '../types/domain';

export function createReadinessResult(
  status: LocationReadinessStatus,
  options: { locationData?: LocationData; errorMessage?: string } = {}
): LocationReadinessResult {
  return Object.freeze({
    status,
    ...(options.locationData !== undefined && { locationData: options.locationData }),
    ...(options.errorMessage !== undefined && { errorMessage: options.errorMessage }),
    isServiceAvailable: status === LocationReadinessStatus.READY,
  });
}

export function isReady(result: LocationReadinessResult): boolean {
  return result.status === LocationReadinessStatus.READY;
}

/**
 * GPS off, permission missing, no fix in time, or an unexpected failure
 */
export function shouldGoToLocationAccess(result: LocationReadinessResult): boolean {
  return (
    result.status === LocationReadinessStatus.NEEDS_SETUP ||
    result.status === LocationReadinessStatus.ERROR ||
    result.status === LocationReadinessStatus.TIMEOUT
  );
}

export function shouldGoToServiceUnavailable(result: LocationReadinessResult): boolean {
  return result.status === LocationReadinessStatus.OUT_OF_SERVICE;
}
