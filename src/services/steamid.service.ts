import { FormatError } from '../errors.js';
import type { SteamId32, SteamId64 } from '../types/models.js';

// Individual-account base: universe 1, type 1, instance 1
export const STEAMID64_OFFSET = 76561197960265728n;
const MAX_ACCOUNT_ID = 2n ** 32n;

// Individual accounts only; no leading zeros, so every id has one spelling
const STEAMID32_PATTERN = /^\[?U:1:(0|[1-9]\d*)\]?$/;
const STEAMID64_PATTERN = /^\d{1,20}$/;

export class SteamIdService {
  /**
   * `[U:1:22202]` or `U:1:22202` -> `76561197960287930`
   */
  static to64(steamId32: SteamId32): SteamId64 {
    return (this.accountOf(steamId32) + STEAMID64_OFFSET).toString();
  }

  /**
   * `76561197960287930` -> `U:1:22202`
   */
  static to32(steamId64: SteamId64): SteamId32 {
    const trimmed = steamId64.trim();
    if (!STEAMID64_PATTERN.test(trimmed)) {
      throw new FormatError(steamId64, 'SteamID64');
    }
    const account = BigInt(trimmed) - STEAMID64_OFFSET;
    if (account < 0n || account >= MAX_ACCOUNT_ID) {
      throw new FormatError(steamId64, 'SteamID64');
    }
    return `U:1:${account}`;
  }

  static tryTo64(steamId32: SteamId32): SteamId64 | null {
    try {
      return this.to64(steamId32);
    } catch (error) {
      if (error instanceof FormatError) {
        return null;
      }
      throw error;
    }
  }

  static tryTo32(steamId64: SteamId64): SteamId32 | null {
    try {
      return this.to32(steamId64);
    } catch (error) {
      if (error instanceof FormatError) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Strips brackets and whitespace: `[U:1:5]` -> `U:1:5`
   */
  static normalize32(steamId32: SteamId32): SteamId32 {
    return `U:1:${this.accountOf(steamId32)}`;
  }

  static isSteamId32(value: string): boolean {
    const match = STEAMID32_PATTERN.exec(value.trim());
    return match !== null && BigInt(match[1]) < MAX_ACCOUNT_ID;
  }

  private static accountOf(steamId32: SteamId32): bigint {
    const match = STEAMID32_PATTERN.exec(steamId32.trim());
    if (!match) {
      throw new FormatError(steamId32, 'SteamID32');
    }
    const account = BigInt(match[1]);
    if (account >= MAX_ACCOUNT_ID) {
      throw new FormatError(steamId32, 'SteamID32');
    }
    return account;
  }
}
