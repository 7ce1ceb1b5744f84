/**
 * Where delivery zones come from
 */

import { DeliveryZone } from '../types/domain';
import { ZoneRowsSchema } from '../types/validation';
import { HttpClient, HttpClientOptions } from '../http/client';
import { config } from '../config';
import { describeError, logger } from '../config/logger';
import { GeofencingError, ErrorCode } from '../errors';
import { rowToZone } from './mapper';

export interface ZoneSource {
  /**
   * Zones flagged active by the backend. The list may still contain zones
   * with unusable shapes; the repository filters those out.
   */
  fetchActiveZones(signal?: AbortSignal): Promise<DeliveryZone[]>;
}

/**
 * Serves a list that has already been loaded
 */
export class StaticZoneSource implements ZoneSource {
  constructor(private readonly zones: readonly DeliveryZone[]) {}

  async fetchActiveZones(): Promise<DeliveryZone[]> {
    return this.zones.filter((zone) => zone.isActive);
  }
}

export interface HttpZoneSourceOptions extends Partial<Omit<HttpClientOptions, 'headers'>> {
  apiKey?: string;
  zonesPath?: string;
}

/**
 * Reads the `zones` table through the backend's REST interface
 */
export class HttpZoneSource implements ZoneSource {
  private httpClient: HttpClient;
  private readonly zonesPath: string;

  constructor(options: HttpZoneSourceOptions = {}) {
    const apiKey = options.apiKey ?? config.zoneApi.apiKey;

    this.httpClient = new HttpClient({
      baseURL: options.baseURL ?? config.zoneApi.baseUrl,
      timeout: options.timeout,
      retryAttempts: options.retryAttempts,
      retryDelayMs: options.retryDelayMs,
      headers: {
        apikey: apiKey,
        Authorization: `Bearer ${apiKey}`,
      },
    });
    this.zonesPath = options.zonesPath ?? config.zoneApi.zonesPath;
  }

  async fetchActiveZones(signal?: AbortSignal): Promise<DeliveryZone[]> {
    logger.info('Fetching active delivery zones');

    const body = await this.httpClient.get<unknown>(this.zonesPath, {
      params: {
        select: '*',
        is_active: 'eq.true',
        order: 'priority.desc,zone_number.asc',
      },
      signal,
    });

    const rows = ZoneRowsSchema.safeParse(body);
    if (!rows.success) {
      throw new GeofencingError(ErrorCode.INVALID_RESPONSE, 'Zone response is not a list of rows');
    }

    const zones: DeliveryZone[] = [];
    for (const row of rows.data) {
      try {
        zones.push(rowToZone(row));
      } catch (error) {
        logger.warn('Skipping malformed zone row', {
          error: describeError(error),
          ...(error instanceof GeofencingError && error.details),
        });
      }
    }

    logger.debug('Delivery zones fetched', { rows: rows.data.length, zones: zones.length });
    return zones;
  }
}
