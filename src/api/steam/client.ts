import axios, { AxiosInstance, AxiosError, type AxiosAdapter } from 'axios';
import { logger } from '../../config/logger.js';
import { NetworkError } from '../../errors.js';
import type {
  PlayerSummary,
  PlayerSummariesResponse,
  PlayerBans,
  PlayerBansResponse,
  FriendEntry,
  FriendListResponse,
} from './types.js';

export interface HttpClientOptions {
  baseURL?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

export class SteamWebApiClient {
  private client: AxiosInstance;

  constructor(private apiKey: string, options: HttpClientOptions = {}) {
    this.client = axios.create({
      baseURL: options.baseURL ?? 'https://api.steampowered.com',
      timeout: options.timeout ?? 15000,
      ...(options.adapter && { adapter: options.adapter }),
    });

    // Log requests in debug mode (without the key)
    this.client.interceptors.request.use((config) => {
      logger.debug(`Steam API request: ${config.method?.toUpperCase()} ${config.url}`);
      return config;
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        this.handleError(error);
        throw error;
      }
    );
  }

  private handleError(error: AxiosError) {
    if (error.response) {
      logger.warn('Steam API error', {
        status: error.response.status,
        url: error.config?.url,
      });
    } else if (error.request) {
      logger.warn('Steam API no response', { url: error.config?.url });
    } else {
      logger.warn('Steam API request setup error', { message: error.message });
    }
  }

  private wrap(steamId: string, what: string, error: unknown): NetworkError {
    if (error instanceof NetworkError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      return new NetworkError(steamId, `${what} failed: ${error.message}`, error.response?.status, error);
    }
    return new NetworkError(steamId, `${what} failed: ${String(error)}`, undefined, error);
  }

  /**
   * GET ISteamUser/GetPlayerSummaries/v0002
   */
  async getPlayerSummary(steamId64: string): Promise<PlayerSummary> {
    try {
      const response = await this.client.get<PlayerSummariesResponse>(
        '/ISteamUser/GetPlayerSummaries/v0002/',
        { params: { key: this.apiKey, steamids: steamId64 } }
      );
      const summary = response.data.response?.players?.[0];
      if (!summary) {
        throw new NetworkError(steamId64, 'Player summary returned empty');
      }
      return summary;
    } catch (error) {
      throw this.wrap(steamId64, 'Player summary request', error);
    }
  }

  /**
   * GET ISteamUser/GetPlayerBans/v1
   */
  async getPlayerBans(steamId64: string): Promise<PlayerBans> {
    try {
      const response = await this.client.get<PlayerBansResponse>(
        '/ISteamUser/GetPlayerBans/v1/',
        { params: { key: this.apiKey, steamids: steamId64 } }
      );
      const bans = response.data.players?.[0];
      if (!bans) {
        throw new NetworkError(steamId64, 'Player bans returned empty');
      }
      return bans;
    } catch (error) {
      throw this.wrap(steamId64, 'Player bans request', error);
    }
  }

  /**
   * GET ISteamUser/GetFriendList/v0001
   * Steam answers 401 for private friends lists.
   */
  async getFriendList(steamId64: string): Promise<FriendEntry[]> {
    try {
      const response = await this.client.get<FriendListResponse>(
        '/ISteamUser/GetFriendList/v0001/',
        { params: { key: this.apiKey, steamid: steamId64, relationship: 'friend' } }
      );
      return response.data.friendslist?.friends ?? [];
    } catch (error) {
      throw this.wrap(steamId64, 'Friend list request', error);
    }
  }

  /**
   * Download an avatar image referenced by a player summary
   */
  async getAvatar(steamId64: string, url: string): Promise<Buffer> {
    try {
      const response = await this.client.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      return Buffer.from(response.data);
    } catch (error) {
      throw this.wrap(steamId64, 'Avatar download', error);
    }
  }
}
