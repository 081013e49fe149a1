import { AxiosError, type AxiosAdapter } from 'axios';
import { RemoteListService } from '../../src/services/remote-list.service';
import { RecordStore } from '../../src/services/record-store.service';
import { NetworkError } from '../../src/errors';

const LIST_URL = 'https://lists.example.test/reported_ids.txt';

describe('RemoteListService', () => {
  it('should import the downloaded ids into the external set', async () => {
    const adapter: AxiosAdapter = async (config) => ({
      data: '# reported\n[U:1:10]\n76561197960265740\n',
      status: 200,
      statusText: 'OK',
      headers: {},
      config,
    });
    const store = new RecordStore();

    await expect(RemoteListService.importFromUrl(store, LIST_URL, 'Cheater', { adapter })).resolves.toBe(2);

    expect(store.records()).toEqual([]);
    expect(store.lookup('U:1:10')).toEqual({
      steamId: 'U:1:10',
      kind: 'Cheater',
      notes: `Imported from ${LIST_URL} as Cheater`,
    });
    expect(store.lookup('U:1:12')?.kind).toBe('Cheater');
  });

  it('should raise NetworkError when the download fails', async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError('getaddrinfo ENOTFOUND', 'ENOTFOUND', config);
    };

    const error = await RemoteListService.importFromUrl(new RecordStore(), LIST_URL, 'Bot', { adapter }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ target: LIST_URL });
  });
});
