import { logger } from '../config/logger.js';
import { NetworkError, describeError } from '../errors.js';
import { Channel } from './channel.js';
import { VISIBILITY_PUBLIC, type FriendEntry, type PlayerBans, type PlayerSummary } from '../api/steam/types.js';
import type { SourceBanRecord } from '../api/steamhistory/types.js';
import type { AccountInfo, EnrichmentResponse, EnrichmentResult, SteamId64 } from '../types/models.js';

/** Implemented by SteamWebApiClient */
export interface SteamProfileApi {
  getPlayerSummary(steamId64: SteamId64): Promise<PlayerSummary>;
  getPlayerBans(steamId64: SteamId64): Promise<PlayerBans>;
  getFriendList(steamId64: SteamId64): Promise<FriendEntry[]>;
  getAvatar(steamId64: SteamId64, url: string): Promise<Buffer>;
}

/** Implemented by SteamHistoryClient */
export interface SourceBansApi {
  getSourceBansFor(steamId64: SteamId64): Promise<SourceBanRecord | null>;
}

export interface EnrichmentDispatcherOptions {
  /** Units allowed in flight at once; 0 means no limit */
  maxConcurrent?: number;
}

function toNetworkError(steamId64: SteamId64, error: unknown): NetworkError {
  return error instanceof NetworkError
    ? error
    : new NetworkError(steamId64, describeError(error), undefined, error);
}

/**
 * Turns SteamID64s into full account information in the background.
 *
 * Callers queue ids with `request` and poll `tryReceive`/`drain` for
 * responses, which arrive in any order and always carry the id they were
 * requested for. Every request produces exactly one response.
 */
export class EnrichmentDispatcher {
  private intake = new Channel<SteamId64>();
  private responses = new Channel<EnrichmentResponse>();
  private inFlight = new Set<Promise<void>>();
  private worker: Promise<void> | null = null;
  private readonly maxConcurrent: number;

  private stats = {
    requested: 0,
    completed: 0,
    failed: 0,
  };

  constructor(
    private steam: SteamProfileApi,
    private sourceBans: SourceBansApi | null = null,
    options: EnrichmentDispatcherOptions = {}
  ) {
    this.maxConcurrent = Math.max(0, options.maxConcurrent ?? 0);
  }

  /**
   * Start the dispatch worker
   */
  start() {
    if (this.worker) {
      logger.warn('Enrichment dispatcher already running');
      return;
    }
    this.worker = this.dispatchLoop();
  }

  /**
   * Queue a lookup. Returns false once the dispatcher has been closed.
   */
  request(steamId64: SteamId64): boolean {
    const accepted = this.intake.send(steamId64);
    if (accepted) {
      this.stats.requested++;
    }
    return accepted;
  }

  tryReceive(): EnrichmentResponse | undefined {
    return this.responses.tryReceive();
  }

  drain(): EnrichmentResponse[] {
    const drained: EnrichmentResponse[] = [];
    for (let next = this.responses.tryReceive(); next !== undefined; next = this.responses.tryReceive()) {
      drained.push(next);
    }
    return drained;
  }

  /**
   * Stop accepting requests. Queued and in-flight lookups still finish.
   */
  close() {
    this.intake.close();
  }

  /**
   * Responses of lookups that finish after this are discarded.
   */
  closeResponses() {
    this.responses.close();
  }

  /**
   * Resolves once the worker has exited and every in-flight lookup has
   * finished. Only settles after `close()`.
   */
  async whenIdle(): Promise<void> {
    if (this.worker) {
      await this.worker;
    }
    await Promise.all([...this.inFlight]);
  }

  getStatus() {
    return {
      isRunning: this.worker !== null && !this.intake.isClosed,
      queued: this.intake.size,
      inFlight: this.inFlight.size,
      pendingResponses: this.responses.size,
      maxConcurrent: this.maxConcurrent,
      stats: { ...this.stats },
    };
  }

  private async dispatchLoop() {
    logger.debug('Enrichment dispatcher started', { maxConcurrent: this.maxConcurrent });

    for (;;) {
      const steamId64 = await this.intake.receive();
      if (steamId64 === undefined) {
        break;
      }

      while (this.maxConcurrent > 0 && this.inFlight.size >= this.maxConcurrent) {
        await Promise.race(this.inFlight);
      }

      const unit: Promise<void> = this.runUnit(steamId64).finally(() => {
        this.inFlight.delete(unit);
      });
      this.inFlight.add(unit);
    }

    logger.info('Enrichment request queue closed, dispatcher stopping');
  }

  private async runUnit(steamId64: SteamId64): Promise<void> {
    let result: EnrichmentResult;
    try {
      const info = await this.fetchAccountInfo(steamId64);
      result = { status: 'ok', info };
      this.stats.completed++;
    } catch (error) {
      const networkError = toNetworkError(steamId64, error);
      logger.warn('Account lookup failed', { steamId64, error: networkError.message });
      result = { status: 'error', error: networkError };
      this.stats.failed++;
    }

    if (!this.responses.send({ steamId64, result })) {
      logger.debug('Dropped enrichment response, receiver closed', { steamId64 });
    }
  }

  /**
   * Summary and bans are required; friends, source bans and the avatar
   * degrade to null when unavailable.
   */
  private async fetchAccountInfo(steamId64: SteamId64): Promise<AccountInfo> {
    const summary = await this.steam.getPlayerSummary(steamId64);
    const bans = await this.steam.getPlayerBans(steamId64);

    let friends: FriendEntry[] | null = null;
    if (summary.communityvisibilitystate === VISIBILITY_PUBLIC) {
      try {
        friends = await this.steam.getFriendList(steamId64);
      } catch (error) {
        logger.warn('Error while getting friends list', { steamId64, error: describeError(error) });
      }
    }

    let sourceBans: SourceBanRecord | null = null;
    if (this.sourceBans) {
      try {
        sourceBans = await this.sourceBans.getSourceBansFor(steamId64);
      } catch (error) {
        logger.warn('Error while getting SteamHistory bans', { steamId64, error: describeError(error) });
      }
    }

    let avatar: Buffer | null = null;
    try {
      avatar = await this.steam.getAvatar(steamId64, summary.avatarmedium);
    } catch (error) {
      logger.warn('Error while getting profile image', { steamId64, error: describeError(error) });
    }

    return { summary, bans, friends, sourceBans, avatar };
  }
}
