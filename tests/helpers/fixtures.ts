import { SteamIdService } from '../../src/services/steamid.service';
import type { PlayerBans, PlayerSummary } from '../../src/api/steam/types';
import type { AccountInfo, RosterPlayer } from '../../src/types/models';

export function makeSummary(steamId64: string, visibility = 3): PlayerSummary {
  return {
    steamid: steamId64,
    communityvisibilitystate: visibility,
    personaname: `player-${steamId64.slice(-4)}`,
    profileurl: `https://steamcommunity.com/profiles/${steamId64}/`,
    avatar: 'https://avatars.example.test/small.jpg',
    avatarmedium: 'https://avatars.example.test/medium.jpg',
    avatarfull: 'https://avatars.example.test/full.jpg',
  };
}

export function makeBans(steamId64: string): PlayerBans {
  return {
    SteamId: steamId64,
    CommunityBanned: false,
    VACBanned: false,
    NumberOfVACBans: 0,
    DaysSinceLastBan: 0,
    NumberOfGameBans: 0,
    EconomyBan: 'none',
  };
}

/**
 * Account info whose friends list holds the given SteamID32s
 * (null for a private friends list).
 */
export function makeAccountInfo(steamId32: string, friends: string[] | null): AccountInfo {
  const steamId64 = SteamIdService.to64(steamId32);
  return {
    summary: makeSummary(steamId64),
    bans: makeBans(steamId64),
    friends:
      friends === null
        ? null
        : friends.map((f) => ({ steamid: SteamIdService.to64(f), relationship: 'friend', friend_since: 0 })),
    sourceBans: null,
    avatar: null,
  };
}

export function makePlayer(steamId32: string, name = steamId32, friends?: string[] | null): RosterPlayer {
  return {
    steamId32,
    steamId64: SteamIdService.to64(steamId32),
    name,
    team: 'Red',
    kind: 'Player',
    notes: '',
    enrichment: friends === undefined ? null : { status: 'ok', info: makeAccountInfo(steamId32, friends) },
  };
}
