import { describe, it, expect, vi } from 'vitest';
import type { EncodeRunner, RunOutcome } from '../pipedRunner.js';
import { JobExecutor, computeJobStats, summarize, type JobResult } from '../jobExecutor.js';
import { makeJob } from './fixtures.js';

const success = (elapsedSeconds = 10): RunOutcome => ({
  success: true,
  exitCode: 0,
  diagnostics: '',
  interrupted: false,
  elapsedSeconds,
});

const failure = (diagnostics: string): RunOutcome => ({
  success: false,
  exitCode: 1,
  diagnostics,
  interrupted: false,
  elapsedSeconds: 2,
});

const SIZES: Record<string, number> = {
  '/films/One.mkv': 1000,
  '/encoded/One_enc.mkv': 400,
  '/films/Two.mkv': 2000,
  '/encoded/Two_enc.mkv': 100,
  '/films/Three.mkv': 3000,
  '/encoded/Three_enc.mkv': 1500,
};

const JOBS = ['One', 'Two', 'Three'].map(name =>
  makeJob({ inputPath: `/films/${name}.mkv`, outputPath: `/encoded/${name}_enc.mkv` })
);

function setup() {
  const run = vi.fn<EncodeRunner['run']>();
  const sleep = vi.fn((_ms: number) => Promise.resolve());
  const ensureDir = vi.fn((_dir: string) => Promise.resolve());
  const executor = new JobExecutor({
    runner: { run },
    sleep,
    ensureDir,
    fileSize: async (filePath: string) => SIZES[filePath] ?? null,
  });
  return { run, sleep, ensureDir, executor };
}

describe('computeJobStats', () => {
  it('reports the output as a share of the input', () => {
    expect(computeJobStats(2000, 500)).toEqual({
      inputBytes: 2000,
      outputBytes: 500,
      ratioPercent: 25,
      savedBytes: 1500,
    });
  });

  it('reports a zero ratio for an empty input', () => {
    expect(computeJobStats(0, 10).ratioPercent).toBe(0);
  });
});

describe('summarize', () => {
  it('leaves failed jobs out of the byte totals', () => {
    const results: JobResult[] = [
      { job: JOBS[0] ?? makeJob(), success: true, interrupted: false, stats: computeJobStats(1000, 250), elapsedSeconds: 1 },
      { job: JOBS[1] ?? makeJob(), success: false, interrupted: false, diagnostics: 'boom', elapsedSeconds: 1 },
    ];

    const summary = summarize(results);

    expect(summary.attempted).toBe(2);
    expect(summary.succeeded).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.totalInputBytes).toBe(1000);
    expect(summary.savedPercent).toBe(75);
  });
});

describe('JobExecutor', () => {
  it('runs each job with its built arguments and duration', async () => {
    const { run, executor } = setup();
    run.mockResolvedValue(success());
    const job = makeJob({ inputPath: '/films/One.mkv', outputPath: '/encoded/One_enc.mkv' });

    await executor.execute([job]);

    expect(run).toHaveBeenCalledWith(executor.buildArgs(job), 6000);
  });

  it('keeps going past a failed job and totals only the successes', async () => {
    const { run, sleep, executor } = setup();
    run
      .mockResolvedValueOnce(success())
      .mockResolvedValueOnce(failure('Unknown encoder'))
      .mockResolvedValueOnce(success());
    const failed: JobResult[] = [];
    executor.on('job:failed', (result: JobResult) => failed.push(result));

    const summary = await executor.execute(JOBS);

    expect(run).toHaveBeenCalledTimes(3);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.totalInputBytes).toBe(4000);
    expect(summary.totalOutputBytes).toBe(1900);
    expect(summary.savedBytes).toBe(2100);
    expect(summary.savedPercent).toBeCloseTo(52.5);
    expect(failed).toHaveLength(1);
    expect(failed[0]?.job.inputPath).toBe('/films/Two.mkv');
    expect(failed[0]?.diagnostics).toBe('Unknown encoder');
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it('emits a summary only when more than one job ran', async () => {
    const { run, executor } = setup();
    run.mockResolvedValue(success());
    const onSummary = vi.fn();
    executor.on('summary', onSummary);

    await executor.execute(JOBS.slice(0, 1));
    expect(onSummary).not.toHaveBeenCalled();

    await executor.execute(JOBS.slice(0, 2));
    expect(onSummary).toHaveBeenCalledTimes(1);
  });

  it('stops the queue when an encode is interrupted', async () => {
    const { run, sleep, executor } = setup();
    run.mockResolvedValue({ ...failure(''), exitCode: null, interrupted: true });

    const summary = await executor.execute(JOBS);

    expect(run).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(summary.interrupted).toBe(true);
    expect(summary.attempted).toBe(1);
  });

  it('reports a job whose output folder cannot be created without running it', async () => {
    const { run, ensureDir, executor } = setup();
    ensureDir.mockRejectedValueOnce(new Error('EACCES: permission denied'));
    run.mockResolvedValue(success());

    const summary = await executor.execute(JOBS.slice(0, 1));

    expect(run).not.toHaveBeenCalled();
    expect(summary.results[0]?.success).toBe(false);
    expect(summary.results[0]?.diagnostics).toBe('EACCES: permission denied');
  });

  it('succeeds without stats when a file cannot be measured', async () => {
    const { run, executor } = setup();
    run.mockResolvedValue(success());

    const summary = await executor.execute([makeJob({ inputPath: '/films/Unknown.mkv' })]);

    expect(summary.succeeded).toBe(1);
    expect(summary.results[0]?.stats).toBeUndefined();
    expect(summary.totalInputBytes).toBe(0);
  });
});
