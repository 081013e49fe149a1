import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { SteamHistoryClient, classifySeverity } from '../../src/api/steamhistory/client';
import { NetworkError } from '../../src/errors';
import type { SourceBan } from '../../src/api/steamhistory/types';

const ID_A = '76561197960265730';
const ID_B = '76561197960265731';

function ban(overrides: Partial<SourceBan>): SourceBan {
  return {
    SteamID: ID_A,
    Name: 'someone',
    CurrentState: 'Expired',
    BanReason: 'cheating',
    UnbanReason: null,
    BanTimestamp: 1600000000,
    UnbanTimestamp: 1600086400,
    Server: 'Example Community',
    ...overrides,
  };
}

function respondWith(data: unknown, calls: InternalAxiosRequestConfig[]): AxiosAdapter {
  return async (config) => {
    calls.push(config);
    return { data, status: 200, statusText: 'OK', headers: {}, config };
  };
}

describe('classifySeverity', () => {
  it('should be high for an active ban on a counted server', () => {
    expect(classifySeverity([ban({ CurrentState: 'Permanent' })])).toBe('high');
    expect(classifySeverity([ban({ CurrentState: 'Temp-Ban' })])).toBe('high');
  });

  it('should be low for expired, lifted or ignored-server bans', () => {
    expect(classifySeverity([])).toBe('low');
    expect(classifySeverity([ban({ CurrentState: 'Expired' }), ban({ CurrentState: 'Unbanned' })])).toBe('low');
    expect(classifySeverity([ban({ CurrentState: 'Permanent', Server: 'Scrap.tf' })])).toBe('low');
  });
});

describe('SteamHistoryClient', () => {
  it('should key results by id and grade them', async () => {
    const calls: InternalAxiosRequestConfig[] = [];
    const data = {
      response: {
        [ID_A]: [ban({ CurrentState: 'Permanent', Server: 'Scrap.tf' })],
        [ID_B]: [ban({ SteamID: ID_B, CurrentState: 'Temp-Ban' })],
      },
    };
    const client = new SteamHistoryClient('test-key', { adapter: respondWith(data, calls) });

    const records = await client.getSourceBans([ID_A, ID_B]);

    expect(records.get(ID_A)?.severity).toBe('low');
    expect(records.get(ID_B)?.severity).toBe('high');
    expect(records.get(ID_B)?.bans).toHaveLength(1);
    expect(calls[0].url).toBe('/sourcebans');
    expect(calls[0].params).toEqual({ key: 'test-key', steamids: `${ID_A},${ID_B}`, shouldkey: 1 });
  });

  it('should skip the request for an empty id list', async () => {
    const calls: InternalAxiosRequestConfig[] = [];
    const client = new SteamHistoryClient('test-key', { adapter: respondWith({ response: {} }, calls) });

    await expect(client.getSourceBans([])).resolves.toEqual(new Map());
    expect(calls).toHaveLength(0);
  });

  it('should return null for an id without bans', async () => {
    const client = new SteamHistoryClient('test-key', { adapter: respondWith({ response: {} }, []) });
    await expect(client.getSourceBansFor(ID_A)).resolves.toBeNull();
  });

  it('should wrap transport failures in NetworkError', async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError('timeout of 15000ms exceeded', AxiosError.ECONNABORTED, config);
    };
    const client = new SteamHistoryClient('test-key', { adapter });

    await expect(client.getSourceBansFor(ID_A)).rejects.toBeInstanceOf(NetworkError);
  });
});
