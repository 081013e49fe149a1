import { validateEnv, type Env } from './config/env.js';
import { logger } from './config/logger.js';
import { SteamWebApiClient } from './api/steam/client.js';
import { SteamHistoryClient } from './api/steamhistory/client.js';
import { RecordStore } from './services/record-store.service.js';
import { PartyDetector } from './services/party-detector.service.js';
import { EnrichmentDispatcher } from './services/enrichment-dispatcher.service.js';
import { MatchMonitor } from './services/match-monitor.service.js';
import { SteamIdService } from './services/steamid.service.js';
import { RefreshJob, type RosterFeed } from './jobs/refresh.job.js';

export interface MatchWatch {
  store: RecordStore;
  parties: PartyDetector;
  dispatcher: EnrichmentDispatcher | null;
  monitor: MatchMonitor;
  job: RefreshJob;
  /** Stop the job, let lookups finish and save records and patterns */
  shutdown(): Promise<void>;
}

/**
 * Build the components from configuration. Without an explicit config the
 * environment is validated here, throwing ConfigError when it is invalid.
 * Enrichment is only enabled when a Steam Web API key is configured.
 */
export function createMatchWatch(feed: RosterFeed, config: Env = validateEnv()): MatchWatch {
  logger.level = config.LOG_LEVEL;

  const store = new RecordStore();
  const parties = new PartyDetector();

  let dispatcher: EnrichmentDispatcher | null = null;
  if (config.STEAM_API_KEY) {
    const steam = new SteamWebApiClient(config.STEAM_API_KEY);
    const steamHistory = config.STEAMHISTORY_API_KEY
      ? new SteamHistoryClient(config.STEAMHISTORY_API_KEY)
      : null;
    dispatcher = new EnrichmentDispatcher(steam, steamHistory, {
      maxConcurrent: config.ENRICHMENT_MAX_CONCURRENCY,
    });
    dispatcher.start();
  } else {
    logger.warn('STEAM_API_KEY not set, profile lookups are disabled');
  }

  const selfId = config.SELF_STEAMID ? SteamIdService.normalize32(config.SELF_STEAMID) : null;
  const monitor = new MatchMonitor(
    store,
    parties,
    dispatcher,
    {
      configDir: config.CONFIG_DIR,
      playerListFile: config.PLAYER_LIST_FILE,
      regexListFile: config.REGEX_LIST_FILE,
    },
    selfId
  );
  const job = new RefreshJob(feed, monitor, { intervalSeconds: config.REFRESH_PERIOD_SECONDS });

  return {
    store,
    parties,
    dispatcher,
    monitor,
    job,
    async shutdown() {
      job.stop();
      if (dispatcher) {
        dispatcher.close();
        dispatcher.closeResponses();
        await dispatcher.whenIdle();
      }
      await monitor.save();
    },
  };
}
