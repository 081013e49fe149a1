import { Channel } from '../../src/services/channel';

describe('Channel', () => {
  it('should deliver values in order', async () => {
    const channel = new Channel<number>();
    channel.send(1);
    channel.send(2);

    await expect(channel.receive()).resolves.toBe(1);
    expect(channel.tryReceive()).toBe(2);
    expect(channel.tryReceive()).toBeUndefined();
  });

  it('should wake a waiting receiver', async () => {
    const channel = new Channel<string>();
    const pending = channel.receive();

    channel.send('hello');

    await expect(pending).resolves.toBe('hello');
    expect(channel.size).toBe(0);
  });

  it('should refuse sends after close but keep buffered values', async () => {
    const channel = new Channel<number>();
    channel.send(1);
    channel.close();

    expect(channel.send(2)).toBe(false);
    expect(channel.isClosed).toBe(true);
    await expect(channel.receive()).resolves.toBe(1);
    await expect(channel.receive()).resolves.toBeUndefined();
  });

  it('should release waiting receivers on close', async () => {
    const channel = new Channel<number>();
    const pending = channel.receive();

    channel.close();

    await expect(pending).resolves.toBeUndefined();
  });
});
