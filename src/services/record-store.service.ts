import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { logger } from '../config/logger.js';
import {
  IOError,
  ParseError,
  PartialImportError,
  describeError,
  type ImportFailure,
  type PatternCompileError,
} from '../errors.js';
import { NameClassifier } from './name-classifier.service.js';
import { SteamIdService } from './steamid.service.js';
import {
  CLASSIFICATION_KINDS,
  type ClassificationKind,
  type NamePattern,
  type PlayerRecord,
  type SteamId32,
} from '../types/models.js';

const STEAMID32_IN_TEXT = /\[?(U:\d:\d+)\]?/g;
const STEAMID64_IN_TEXT = /7656\d{13}/g;

// One entry of the persisted record list. `player_type` is accepted as the
// older spelling of `kind`.
const recordEntrySchema = z.object({
  steamid: z.string().optional(),
  kind: z.string().optional(),
  player_type: z.string().optional(),
  notes: z.string().nullish(),
});

export interface PersistedRecord {
  steamid: SteamId32;
  kind: ClassificationKind;
  notes: string;
}

export interface RecordImportResult {
  imported: number;
  failures: ImportFailure[];
  /** Set when at least one entry could not be used */
  error: PartialImportError | null;
}

export interface PatternImportResult {
  added: NamePattern[];
  warnings: PatternCompileError[];
}

function isClassificationKind(value: string): value is ClassificationKind {
  return (CLASSIFICATION_KINDS as readonly string[]).includes(value);
}

/**
 * Player records keyed by SteamID32.
 *
 * The internal set is curated by the user and saved to disk. The external set
 * holds entries imported from third-party lists for this session only.
 * Internal entries take precedence on lookup.
 */
export class RecordStore {
  private internal = new Map<SteamId32, PlayerRecord>();
  private external = new Map<SteamId32, PlayerRecord>();
  private names = new NameClassifier();

  private static key(steamId: SteamId32): SteamId32 {
    return SteamIdService.isSteamId32(steamId) ? SteamIdService.normalize32(steamId) : steamId.trim();
  }

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  lookup(steamId: SteamId32): PlayerRecord | null {
    const key = RecordStore.key(steamId);
    return this.internal.get(key) ?? this.external.get(key) ?? null;
  }

  /**
   * Insert or overwrite an internal record. A plain Player with no notes
   * carries nothing worth keeping, so it removes the entry instead.
   */
  upsert(record: PlayerRecord) {
    const key = RecordStore.key(record.steamId);
    if (record.kind === 'Player' && record.notes.length === 0) {
      this.internal.delete(key);
      return;
    }
    this.internal.set(key, { ...record, steamId: key });
  }

  remove(steamId: SteamId32): boolean {
    return this.internal.delete(RecordStore.key(steamId));
  }

  records(): PlayerRecord[] {
    return [...this.internal.values()];
  }

  externalRecords(): PlayerRecord[] {
    return [...this.external.values()];
  }

  /**
   * Scan free text for SteamID32 (`U:1:123`, optionally bracketed) and
   * SteamID64 (`7656…`, 17 digits) substrings and add a record for every id
   * not already present in the target set.
   *
   * Returns the number of records added.
   */
  importList(
    text: string,
    sourceName: string,
    asKind: ClassificationKind,
    targetIsInternal: boolean
  ): number {
    const target = targetIsInternal ? this.internal : this.external;
    const notes = `Imported from ${sourceName} as ${asKind}`;
    let added = 0;

    const insert = (steamId: SteamId32) => {
      if (target.has(steamId)) {
        return;
      }
      target.set(steamId, { steamId, kind: asKind, notes });
      added++;
    };

    for (const match of text.matchAll(STEAMID32_IN_TEXT)) {
      if (SteamIdService.isSteamId32(match[1])) {
        insert(match[1]);
      }
    }

    for (const match of text.matchAll(STEAMID64_IN_TEXT)) {
      const steamId = SteamIdService.tryTo32(match[0]);
      if (steamId !== null) {
        insert(steamId);
      }
    }

    logger.info(`Imported ${added} steamids from ${sourceName}`, {
      kind: asKind,
      target: targetIsInternal ? 'internal' : 'external',
    });
    return added;
  }

  async importListFile(
    filePath: string,
    asKind: ClassificationKind,
    targetIsInternal: boolean
  ): Promise<number> {
    const contents = await readText(filePath);
    return this.importList(contents, filePath, asKind, targetIsInternal);
  }

  /**
   * Write the internal records as a JSON array of `{ steamid, kind, notes }`.
   */
  async exportRecords(filePath: string) {
    const list: PersistedRecord[] = this.records().map((r) => ({
      steamid: r.steamId,
      kind: r.kind,
      notes: r.notes,
    }));
    await writeText(filePath, JSON.stringify(list, null, 2));
    logger.debug(`Saved ${list.length} player records`, { path: filePath });
  }

  /**
   * Load records written by `exportRecords` into the internal set.
   * Unusable entries are skipped and reported; the rest still load.
   */
  async importRecords(filePath: string): Promise<RecordImportResult> {
    const contents = await readText(filePath);

    let json: unknown;
    try {
      json = JSON.parse(contents);
    } catch (error) {
      throw new ParseError(filePath, describeError(error), error);
    }
    if (!Array.isArray(json)) {
      throw new ParseError(filePath, 'expected a JSON array of player records');
    }

    const failures: ImportFailure[] = [];
    let imported = 0;

    json.forEach((raw: unknown, index) => {
      const parsed = recordEntrySchema.safeParse(raw);
      if (!parsed.success) {
        failures.push({ index, reason: 'not a player record object' });
        return;
      }

      const entry = parsed.data;
      const steamId = (entry.steamid ?? '').trim();
      if (steamId === '') {
        return;
      }

      const kind = entry.kind ?? entry.player_type ?? '';
      if (!isClassificationKind(kind)) {
        logger.error(`Unexpected player kind: ${kind}`, { steamId, path: filePath });
        failures.push({ index, reason: `unknown kind "${kind}"` });
        return;
      }

      this.upsert({ steamId, kind, notes: entry.notes ?? '' });
      imported++;
    });

    const error = failures.length > 0 ? new PartialImportError(filePath, failures, imported) : null;
    if (error) {
      logger.warn(error.message, { failures });
    }
    logger.info(`Loaded ${imported} player records`, { path: filePath });

    return { imported, failures, error };
  }

  // ---------------------------------------------------------------------------
  // Name patterns
  // ---------------------------------------------------------------------------

  /**
   * First pattern matching the display name, if any. Does not change any
   * record; acting on the match is up to the caller.
   */
  classifyByName(name: string): NamePattern | null {
    return this.names.match(name);
  }

  patterns(): readonly NamePattern[] {
    return this.names.patterns();
  }

  addPattern(source: string): NamePattern {
    return this.names.add(source);
  }

  removePattern(index: number): NamePattern | null {
    return this.names.remove(index);
  }

  /**
   * Append the patterns of a line-oriented file. Invalid lines are logged
   * and returned as warnings.
   */
  async importPatternFile(filePath: string): Promise<PatternImportResult> {
    const contents = await readText(filePath);
    const { added, warnings } = this.names.addLines(contents);

    for (const warning of warnings) {
      logger.warn(warning.message, { path: filePath });
    }
    logger.info(`Loaded ${added.length} name patterns`, { path: filePath, skipped: warnings.length });

    return { added, warnings };
  }

  async exportPatterns(filePath: string) {
    await writeText(filePath, this.names.serialize());
    logger.debug(`Saved ${this.names.size} name patterns`, { path: filePath });
  }
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new IOError(filePath, 'read', error);
  }
}

async function writeText(filePath: string, contents: string) {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, contents, 'utf-8');
  } catch (error) {
    throw new IOError(filePath, 'write', error);
  }
}
