export { createMatchWatch, type MatchWatch } from './app.js';
export {
  validateEnv,
  parseEnv,
  readLogSettings,
  DEFAULT_REMOTE_LIST_URL,
  type Env,
  type LogSettings,
} from './config/env.js';
export { logger } from './config/logger.js';
export * from './errors.js';
export * from './types/models.js';
export { SteamWebApiClient, type HttpClientOptions } from './api/steam/client.js';
export type * from './api/steam/types.js';
export { VISIBILITY_PUBLIC } from './api/steam/types.js';
export { SteamHistoryClient, classifySeverity } from './api/steamhistory/client.js';
export type * from './api/steamhistory/types.js';
export { SteamIdService, STEAMID64_OFFSET } from './services/steamid.service.js';
export { NameClassifier, compilePattern } from './services/name-classifier.service.js';
export {
  RecordStore,
  type PersistedRecord,
  type RecordImportResult,
  type PatternImportResult,
} from './services/record-store.service.js';
export { PartyDetector, type PartyMember, type PartyIndicator } from './services/party-detector.service.js';
export { PARTY_COLORS, PARTY_SYMBOL, PARTY_SYMBOL_WITH_SELF } from './constants/party-colors.js';
export { Channel } from './services/channel.js';
export {
  EnrichmentDispatcher,
  type SteamProfileApi,
  type SourceBansApi,
  type EnrichmentDispatcherOptions,
} from './services/enrichment-dispatcher.service.js';
export { RemoteListService } from './services/remote-list.service.js';
export { MatchMonitor, type MatchMonitorFiles, type RefreshSummary } from './services/match-monitor.service.js';
export { RefreshJob, type RosterFeed, type RefreshJobConfig } from './jobs/refresh.job.js';
