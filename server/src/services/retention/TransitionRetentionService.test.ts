import pino from 'pino';
import { TransitionRetentionService } from './TransitionRetentionService';

const silent = pino({ level: 'silent' });
const NOW = Date.parse('2026-03-10T12:00:00.000Z');

describe('TransitionRetentionService', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should delete transitions older than the retention period', () => {
    const store = { deleteOlderThan: jest.fn(() => 4) };
    const service = new TransitionRetentionService({ store, retentionDays: 7, logger: silent, now: () => NOW });

    const result = service.runCleanup();

    expect(store.deleteOlderThan).toHaveBeenCalledWith('2026-03-03T12:00:00.000Z');
    expect(result).toEqual({ deleted: 4, retentionDays: 7, cutoffTimestamp: '2026-03-03T12:00:00.000Z' });
  });

  it('should run at start and on every interval', () => {
    jest.useFakeTimers();
    const store = { deleteOlderThan: jest.fn(() => 0) };
    const service = new TransitionRetentionService({ store, retentionDays: 1, checkIntervalMs: 1000, logger: silent });

    service.start();
    service.start();
    jest.advanceTimersByTime(2000);

    expect(store.deleteOlderThan).toHaveBeenCalledTimes(3);
    expect(service.isSchedulerActive).toBe(true);
    service.stop();
    expect(service.isSchedulerActive).toBe(false);
  });

  it('should log store failures instead of throwing', () => {
    const store = {
      deleteOlderThan: jest.fn((): number => {
        throw new Error('database is locked');
      }),
    };
    const error = jest.spyOn(silent, 'error');
    const service = new TransitionRetentionService({ store, retentionDays: 1, logger: silent });

    expect(() => service.start()).not.toThrow();
    expect(error).toHaveBeenCalledWith({ err: expect.any(Error) }, 'transition retention cleanup failed');
    service.stop();
    error.mockRestore();
  });
});
