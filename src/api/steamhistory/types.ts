// SteamHistory SourceBans API response types

export type BanState = 'Permanent' | 'Temp-Ban' | 'Expired' | 'Unbanned' | (string & {});

export interface SourceBan {
  SteamID: string;
  Name: string | null;
  CurrentState: BanState;
  BanReason: string | null;
  UnbanReason: string | null;
  BanTimestamp: number;
  UnbanTimestamp: number;
  Server: string;
}

export interface SourceBansResponse {
  response: Record<string, SourceBan[]>;
}

/**
 * 'high' when at least one ban is still in force on a community server
 * that counts, 'low' otherwise.
 */
export type SourceBanSeverity = 'high' | 'low';

export interface SourceBanRecord {
  bans: SourceBan[];
  severity: SourceBanSeverity;
}
