// Steam Web API response types (ISteamUser interface)

/** communityvisibilitystate value for a public profile */
export const VISIBILITY_PUBLIC = 3;

export interface PlayerSummary {
  steamid: string;
  communityvisibilitystate: number;
  profilestate?: number;
  personaname: string;
  profileurl: string;
  avatar: string;
  avatarmedium: string;
  avatarfull: string;
  personastate?: number;
  lastlogoff?: number;
  commentpermission?: number;
  realname?: string;
  primaryclanid?: string;
  timecreated?: number;
  loccountrycode?: string;
}

export interface PlayerSummariesResponse {
  response: {
    players: PlayerSummary[];
  };
}

export interface PlayerBans {
  SteamId: string;
  CommunityBanned: boolean;
  VACBanned: boolean;
  NumberOfVACBans: number;
  DaysSinceLastBan: number;
  NumberOfGameBans: number;
  EconomyBan: string;
}

export interface PlayerBansResponse {
  players: PlayerBans[];
}

export interface FriendEntry {
  steamid: string;
  relationship: string;
  friend_since: number;
}

export interface FriendListResponse {
  friendslist?: {
    friends: FriendEntry[];
  };
}
