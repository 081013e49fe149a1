import axios from 'axios';
import { DEFAULT_REMOTE_LIST_URL } from '../config/env.js';
import { logger } from '../config/logger.js';
import { NetworkError, describeError } from '../errors.js';
import type { HttpClientOptions } from '../api/steam/client.js';
import type { RecordStore } from './record-store.service.js';
import type { ClassificationKind } from '../types/models.js';

export class RemoteListService {
  /**
   * Download a text list of SteamIDs and add them to the store's external
   * (session-only) record set. Returns the number of new records.
   */
  static async importFromUrl(
    store: RecordStore,
    url: string = DEFAULT_REMOTE_LIST_URL,
    asKind: ClassificationKind = 'Cheater',
    options: HttpClientOptions = {}
  ): Promise<number> {
    logger.info('Fetching remote player list', { url });

    let text: string;
    try {
      const response = await axios.get<string>(url, {
        responseType: 'text',
        timeout: options.timeout ?? 30000,
        ...(options.adapter && { adapter: options.adapter }),
      });
      text = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.error('Failed to fetch remote player list', { url, status });
      throw new NetworkError(url, `Remote list download failed: ${describeError(error)}`, status, error);
    }

    return store.importList(text, url, asKind, false);
  }
}
