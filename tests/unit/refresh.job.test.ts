import { RefreshJob, type RosterFeed } from '../../src/jobs/refresh.job';
import { MatchMonitor } from '../../src/services/match-monitor.service';
import { RecordStore } from '../../src/services/record-store.service';
import { PartyDetector } from '../../src/services/party-detector.service';
import { makePlayer } from '../helpers/fixtures';
import type { Roster } from '../../src/types/models';

function makeMonitor(): MatchMonitor {
  return new MatchMonitor(new RecordStore(), new PartyDetector(), null, {
    configDir: 'unused',
    playerListFile: 'playerlist.json',
    regexListFile: 'regx.txt',
  });
}

function rosterFeed(): RosterFeed {
  const roster: Roster = new Map([
    ['U:1:1', makePlayer('U:1:1', 'Alice', ['U:1:2'])],
    ['U:1:2', makePlayer('U:1:2', 'Bob', [])],
  ]);
  return { getRoster: () => roster };
}

describe('RefreshJob', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  describe('tick', () => {
    it('should refresh the monitor and record the run', async () => {
      const job = new RefreshJob(rosterFeed(), makeMonitor(), { intervalSeconds: 10 });

      await expect(job.tick()).resolves.toBe(true);

      const { stats } = job.getStatus();
      expect(stats.totalRuns).toBe(1);
      expect(stats.lastRunPlayers).toBe(2);
      expect(stats.lastRunNewPlayers).toBe(2);
      expect(stats.lastRunParties).toBe(1);
      expect(stats.lastRun).toBeInstanceOf(Date);
    });

    it('should count a failing feed without throwing', async () => {
      const feed: RosterFeed = { getRoster: () => Promise.reject(new Error('console log unreadable')) };
      const job = new RefreshJob(feed, makeMonitor(), { intervalSeconds: 10 });

      await expect(job.tick()).resolves.toBe(false);

      const { stats, isProcessing } = job.getStatus();
      expect(stats.totalFailed).toBe(1);
      expect(stats.totalRuns).toBe(0);
      expect(isProcessing).toBe(false);
    });

    it('should skip a tick while the previous one is still running', async () => {
      let release: (roster: Roster) => void = () => undefined;
      const feed: RosterFeed = {
        getRoster: () =>
          new Promise<Roster>((resolve) => {
            release = resolve;
          }),
      };
      const job = new RefreshJob(feed, makeMonitor(), { intervalSeconds: 10 });

      const first = job.tick();
      await expect(job.tick()).resolves.toBe(false);

      release(new Map());
      await expect(first).resolves.toBe(true);
      expect(job.getStatus().stats).toMatchObject({ totalRuns: 1, totalSkipped: 1 });
    });
  });

  describe('start / stop', () => {
    it('should tick on the configured period until stopped', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
      const getRoster = jest.fn((): Roster => new Map());
      const job = new RefreshJob({ getRoster }, makeMonitor(), { intervalSeconds: 2 });

      job.start();
      expect(job.getStatus().isRunning).toBe(true);

      await jest.advanceTimersByTimeAsync(6000);
      expect(getRoster).toHaveBeenCalledTimes(3);

      job.stop();
      await jest.advanceTimersByTimeAsync(6000);
      expect(getRoster).toHaveBeenCalledTimes(3);
      expect(job.getStatus().isRunning).toBe(false);
    });

    it('should ignore a second start', () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
      const setIntervalSpy = jest.spyOn(global, 'setInterval');
      const clearIntervalSpy = jest.spyOn(global, 'clearInterval');
      const job = new RefreshJob(rosterFeed(), makeMonitor(), { intervalSeconds: 1 });

      job.start();
      job.start();
      job.stop();

      expect(setIntervalSpy).toHaveBeenCalledTimes(1);
      expect(clearIntervalSpy).toHaveBeenCalledTimes(1);
    });
  });
});
