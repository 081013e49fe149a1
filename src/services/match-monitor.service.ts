import path from 'path';
import { logger } from '../config/logger.js';
import { IOError, describeError } from '../errors.js';
import { SteamIdService } from './steamid.service.js';
import type { RecordStore } from './record-store.service.js';
import type { PartyDetector, PartyIndicator } from './party-detector.service.js';
import type { EnrichmentDispatcher } from './enrichment-dispatcher.service.js';
import type { ClassificationKind, Roster, RosterPlayer, SteamId32 } from '../types/models.js';

export interface MatchMonitorFiles {
  configDir: string;
  playerListFile: string;
  regexListFile: string;
}

export interface RefreshSummary {
  newPlayers: SteamId32[];
  enriched: number;
  parties: SteamId32[][];
}

/**
 * Wires the record store, party detector and enrichment dispatcher together
 * for one refresh of the roster. The roster itself belongs to the feed; only
 * classification and enrichment fields of its entries are written here.
 */
export class MatchMonitor {
  private seen = new Set<SteamId32>();

  constructor(
    private store: RecordStore,
    private parties: PartyDetector,
    private dispatcher: EnrichmentDispatcher | null,
    private files: MatchMonitorFiles,
    private selfId: SteamId32 | null = null
  ) {}

  get playerListPath(): string {
    return path.join(this.files.configDir, this.files.playerListFile);
  }

  get regexListPath(): string {
    return path.join(this.files.configDir, this.files.regexListFile);
  }

  refresh(roster: Roster): RefreshSummary {
    // Players who left are classified again if they come back
    for (const steamId of this.seen) {
      if (!roster.has(steamId)) {
        this.seen.delete(steamId);
      }
    }

    const newPlayers: SteamId32[] = [];
    for (const player of roster.values()) {
      if (this.seen.has(player.steamId32)) {
        continue;
      }
      this.seen.add(player.steamId32);
      newPlayers.push(player.steamId32);

      this.classify(player);
      if (this.dispatcher && !this.dispatcher.request(player.steamId64)) {
        logger.warn('Enrichment dispatcher closed, skipping lookup', { steamId: player.steamId32 });
      }
    }

    const enriched = this.applyEnrichment(roster);
    const parties = this.parties.update(roster.values());

    if (newPlayers.length > 0 || enriched > 0) {
      logger.debug('Roster refreshed', {
        players: roster.size,
        newPlayers: newPlayers.length,
        enriched,
        parties: parties.length,
      });
    }

    return { newPlayers, enriched, parties };
  }

  /**
   * A stored record wins; otherwise a matching name pattern marks the
   * player as a bot for this session.
   */
  classify(player: RosterPlayer) {
    const record = this.store.lookup(player.steamId32);
    if (record) {
      player.kind = record.kind;
      player.notes = record.notes;
      return;
    }

    const pattern = this.store.classifyByName(player.name);
    if (pattern) {
      player.kind = 'Bot';
      player.notes = `Matched name pattern ${pattern.source}`;
      logger.info('Player name matched a bot pattern', {
        steamId: player.steamId32,
        name: player.name,
        pattern: pattern.source,
      });
    }
  }

  /**
   * Record a user's classification of a roster player and keep the entry in
   * sync with the store.
   */
  setClassification(player: RosterPlayer, kind: ClassificationKind, notes: string = player.notes) {
    player.kind = kind;
    player.notes = notes;
    this.store.upsert({ steamId: player.steamId32, kind, notes });
  }

  playersOfKind(roster: Roster, kind: ClassificationKind): RosterPlayer[] {
    return [...roster.values()].filter((player) => player.kind === kind);
  }

  indicatorFor(steamId: SteamId32): PartyIndicator | null {
    return this.parties.indicatorFor(steamId, this.selfId);
  }

  /**
   * Load the saved records and name patterns. Missing files are expected on
   * first run.
   */
  async load() {
    try {
      await this.store.importRecords(this.playerListPath);
    } catch (error) {
      this.logLoadFailure('player records', this.playerListPath, error);
    }

    try {
      await this.store.importPatternFile(this.regexListPath);
    } catch (error) {
      this.logLoadFailure('name patterns', this.regexListPath, error);
    }
  }

  /**
   * Save records and patterns. Failures are logged; returns false if either
   * write failed.
   */
  async save(): Promise<boolean> {
    let ok = true;

    try {
      await this.store.exportRecords(this.playerListPath);
    } catch (error) {
      logger.error('Failed to save players', { error: describeError(error) });
      ok = false;
    }

    try {
      await this.store.exportPatterns(this.regexListPath);
    } catch (error) {
      logger.error('Failed to save name patterns', { error: describeError(error) });
      ok = false;
    }

    return ok;
  }

  private applyEnrichment(roster: Roster): number {
    if (!this.dispatcher) {
      return 0;
    }

    let applied = 0;
    for (const { steamId64, result } of this.dispatcher.drain()) {
      const steamId32 = SteamIdService.tryTo32(steamId64);
      const player = steamId32 === null ? undefined : roster.get(steamId32);
      if (!player) {
        logger.debug('Dropping enrichment for player no longer in the match', { steamId64 });
        continue;
      }
      player.enrichment = result;
      applied++;
    }
    return applied;
  }

  private logLoadFailure(what: string, filePath: string, error: unknown) {
    const missing =
      error instanceof IOError &&
      error.cause instanceof Error &&
      'code' in error.cause &&
      error.cause.code === 'ENOENT';

    if (missing) {
      logger.info(`No saved ${what} found`, { path: filePath });
    } else {
      logger.error(`Failed to load ${what}`, { path: filePath, error: describeError(error) });
    }
  }
}
