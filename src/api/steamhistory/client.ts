import axios, { AxiosInstance } from 'axios';
import { logger } from '../../config/logger.js';
import { NetworkError, describeError } from '../../errors.js';
import type { HttpClientOptions } from '../steam/client.js';
import type { SourceBan, SourceBanRecord, SourceBanSeverity, SourceBansResponse } from './types.js';

// Bans from these servers are listed but never raise the severity
const IGNORED_SERVERS = new Set(['Scrap.tf']);
const ACTIVE_STATES = new Set(['Permanent', 'Temp-Ban']);

export function classifySeverity(bans: SourceBan[]): SourceBanSeverity {
  return bans.some((ban) => ACTIVE_STATES.has(ban.CurrentState) && !IGNORED_SERVERS.has(ban.Server))
    ? 'high'
    : 'low';
}

export class SteamHistoryClient {
  private client: AxiosInstance;

  constructor(private apiKey: string, options: HttpClientOptions = {}) {
    this.client = axios.create({
      baseURL: options.baseURL ?? 'https://steamhistory.net/api',
      timeout: options.timeout ?? 15000,
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  /**
   * GET /sourcebans?key=...&steamids=a,b&shouldkey=1
   *
   * Ids without any recorded bans are absent from the returned map.
   */
  async getSourceBans(steamIds64: string[]): Promise<Map<string, SourceBanRecord>> {
    const records = new Map<string, SourceBanRecord>();
    if (steamIds64.length === 0) {
      return records;
    }

    let data: SourceBansResponse;
    try {
      const response = await this.client.get<SourceBansResponse>('/sourcebans', {
        params: { key: this.apiKey, steamids: steamIds64.join(','), shouldkey: 1 },
      });
      data = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new NetworkError(
        steamIds64.join(','),
        `SourceBans request failed: ${describeError(error)}`,
        status,
        error
      );
    }

    for (const [steamId, bans] of Object.entries(data.response ?? {})) {
      if (!Array.isArray(bans)) {
        logger.debug('Ignoring malformed SourceBans entry', { steamId });
        continue;
      }
      records.set(steamId, { bans, severity: classifySeverity(bans) });
    }

    return records;
  }

  async getSourceBansFor(steamId64: string): Promise<SourceBanRecord | null> {
    const records = await this.getSourceBans([steamId64]);
    const direct = records.get(steamId64);
    if (direct) {
      return direct;
    }
    // Single-id queries are sometimes keyed by another id format
    for (const record of records.values()) {
      return record;
    }
    return null;
  }
}
