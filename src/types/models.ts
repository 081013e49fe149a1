import type { NetworkError } from '../errors.js';
import type { PlayerSummary, PlayerBans, FriendEntry } from '../api/steam/types.js';
import type { SourceBanRecord } from '../api/steamhistory/types.js';

/** `U:1:12345` */
export type SteamId32 = string;
/** Decimal string of the 64-bit id, e.g. `76561197960278073` */
export type SteamId64 = string;

export const CLASSIFICATION_KINDS = ['Player', 'Bot', 'Cheater', 'Suspicious'] as const;
export type ClassificationKind = (typeof CLASSIFICATION_KINDS)[number];

export interface PlayerRecord {
  steamId: SteamId32;
  kind: ClassificationKind;
  notes: string;
}

export interface NamePattern {
  /** Text as written in the pattern file */
  source: string;
  regex: RegExp;
}

export interface AccountInfo {
  summary: PlayerSummary;
  bans: PlayerBans;
  /** null unless the profile's friends list is public */
  friends: FriendEntry[] | null;
  sourceBans: SourceBanRecord | null;
  avatar: Buffer | null;
}

export type EnrichmentResult =
  | { status: 'ok'; info: AccountInfo }
  | { status: 'error'; error: NetworkError };

export interface EnrichmentResponse {
  steamId64: SteamId64;
  result: EnrichmentResult;
}

export type Team = 'Red' | 'Blu' | 'Spectator' | 'None';

/**
 * A player currently in the match. The roster feed owns these entries;
 * the core only writes classification and enrichment fields.
 */
export interface RosterPlayer {
  steamId32: SteamId32;
  steamId64: SteamId64;
  name: string;
  team: Team;
  kind: ClassificationKind;
  notes: string;
  enrichment: EnrichmentResult | null;
}

export type Roster = Map<SteamId32, RosterPlayer>;
