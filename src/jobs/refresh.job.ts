import { logger } from '../config/logger.js';
import { describeError } from '../errors.js';
import type { MatchMonitor } from '../services/match-monitor.service.js';
import type { Roster } from '../types/models.js';

/**
 * Source of the current match roster (console log parser, RCON status, ...)
 */
export interface RosterFeed {
  getRoster(): Roster | Promise<Roster>;
}

export interface RefreshJobConfig {
  intervalSeconds: number;
}

/**
 * Background job that refreshes the roster on a fixed period and runs the
 * monitor over it.
 */
export class RefreshJob {
  private isRunning = false;
  private isProcessing = false;
  private intervalId: NodeJS.Timeout | null = null;
  private config: RefreshJobConfig;

  // Statistics
  private stats = {
    lastRun: null as Date | null,
    totalRuns: 0,
    totalFailed: 0,
    totalSkipped: 0,
    lastRunPlayers: 0,
    lastRunNewPlayers: 0,
    lastRunParties: 0,
  };

  constructor(
    private feed: RosterFeed,
    private monitor: MatchMonitor,
    config: RefreshJobConfig
  ) {
    this.config = { ...config };
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      isProcessing: this.isProcessing,
      config: this.config,
      stats: { ...this.stats },
    };
  }

  start() {
    if (this.isRunning) {
      logger.warn('Refresh job already running');
      return;
    }

    const intervalMs = Math.max(100, this.config.intervalSeconds * 1000);
    this.isRunning = true;
    this.intervalId = setInterval(() => {
      this.tick().catch((error: unknown) => {
        logger.error('Refresh tick failed unexpectedly', { error: describeError(error) });
      });
    }, intervalMs);

    logger.info('Refresh job started', { intervalSeconds: this.config.intervalSeconds });
  }

  stop() {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.isRunning = false;
    logger.info('Refresh job stopped');
  }

  /**
   * Run one refresh. Errors are logged and counted; a tick that starts while
   * the previous one is still waiting on the feed is skipped.
   */
  async tick(): Promise<boolean> {
    if (this.isProcessing) {
      this.stats.totalSkipped++;
      logger.debug('Refresh still in progress, skipping tick');
      return false;
    }

    this.isProcessing = true;
    try {
      const roster = await this.feed.getRoster();
      const summary = this.monitor.refresh(roster);

      this.stats.lastRun = new Date();
      this.stats.totalRuns++;
      this.stats.lastRunPlayers = roster.size;
      this.stats.lastRunNewPlayers = summary.newPlayers.length;
      this.stats.lastRunParties = summary.parties.length;
      return true;
    } catch (error) {
      this.stats.totalFailed++;
      logger.error('Error refreshing roster', { error: describeError(error) });
      return false;
    } finally {
      this.isProcessing = false;
    }
  }
}
