import { nextRunTime, startScheduler } from '../cron';
import type { IngestSummary } from '../../ingestion/feedIngestor';
import type { StartResult } from '../../pipeline/processingRunner';

const mocks = vi.hoisted(() => {
  const jobs = new Map<string, () => Promise<void>>();
  const stop = vi.fn();
  return {
    jobs,
    stop,
    validate: vi.fn((expression: string) => expression !== 'bad'),
    schedule: vi.fn((expression: string, job: () => Promise<void>) => {
      jobs.set(expression, job);
      return { stop };
    })
  };
});

vi.mock('node-cron', () => ({
  default: { validate: mocks.validate, schedule: mocks.schedule }
}));

const SUMMARY: IngestSummary = {
  sourcesProcessed: 2,
  newItems: 3,
  failures: 0,
  reports: [],
  startTime: 0,
  endTime: 1
};

const STARTED: StartResult = {
  started: true,
  snapshot: { state: 'running', batchSize: 5, startedAt: null, finishedAt: null, progress: null, error: null }
};

const cronConfig = {
  enabled: true,
  fetchSchedule: '*/30 * * * *',
  processSchedule: '*/10 * * * *',
  processBatchSize: 5
};

function createDeps(config = cronConfig) {
  return {
    config,
    ingestor: { fetchAllEnabled: vi.fn(async () => SUMMARY) },
    runner: { start: vi.fn((_batchSize: number) => STARTED) }
  };
}

describe('startScheduler', () => {
  beforeEach(() => {
    mocks.jobs.clear();
    mocks.stop.mockClear();
    mocks.schedule.mockClear();
  });

  it('schedules nothing when disabled', () => {
    const handle = startScheduler(createDeps({ ...cronConfig, enabled: false }));

    expect(mocks.schedule).not.toHaveBeenCalled();
    handle.stop();
    expect(mocks.stop).not.toHaveBeenCalled();
  });

  it('rejects an invalid expression before scheduling', () => {
    expect(() => startScheduler(createDeps({ ...cronConfig, processSchedule: 'bad' }))).toThrow(
      'Invalid cron expression for process_articles: "bad"'
    );
    expect(mocks.schedule).not.toHaveBeenCalled();
  });

  it('runs ingestion and starts a processing drain on their schedules', async () => {
    const deps = createDeps();
    startScheduler(deps);

    await mocks.jobs.get('*/30 * * * *')?.();
    await mocks.jobs.get('*/10 * * * *')?.();

    expect(deps.ingestor.fetchAllEnabled).toHaveBeenCalledTimes(1);
    expect(deps.runner.start).toHaveBeenCalledWith(5);
  });

  it('keeps running when a job fails', async () => {
    const deps = createDeps();
    deps.ingestor.fetchAllEnabled.mockRejectedValueOnce(new Error('network down'));
    startScheduler(deps);

    await expect(mocks.jobs.get('*/30 * * * *')?.()).resolves.toBeUndefined();
  });

  it('stops every task', () => {
    const handle = startScheduler(createDeps());

    handle.stop();

    expect(mocks.stop).toHaveBeenCalledTimes(2);
  });
});

describe('nextRunTime', () => {
  it('returns the next firing after the given time', () => {
    expect(nextRunTime('0 6 * * *', new Date(2024, 3, 1, 7, 0))).toEqual(new Date(2024, 3, 2, 6, 0));
  });

  it('returns null for an expression it cannot parse', () => {
    expect(nextRunTime('not a schedule', new Date(2024, 3, 1))).toBeNull();
  });
});
