import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { JobStore } from './jobStore';
import { JobConfig } from './types';

const baseConfig: JobConfig = {
  videoPath: '/videos/holiday.mp4',
  subtitlePath: '/videos/holiday.srt',
  styleOverrides: {},
  codecCopy: true,
};

describe('JobStore', () => {
  let rootDir: string;
  let store: JobStore;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'subburn-jobs-'));
    store = new JobStore({
      jobsDir: path.join(rootDir, 'jobs'),
      uploadsDir: path.join(rootDir, 'uploads'),
      outputsDir: path.join(rootDir, 'outputs'),
    });
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('should create a pending job with its directories', async () => {
    const job = await store.create({ config: baseConfig });

    expect(job.status).toBe('pending');
    expect(fs.existsSync(store.getUploadDir(job.id))).toBe(true);
    expect(fs.existsSync(store.getOutputDir(job.id))).toBe(true);

    const loaded = await store.get(job.id);
    expect(loaded?.config).toEqual(baseConfig);
    expect(loaded?.createdAt).toBeInstanceOf(Date);
  });

  it('should return null for unknown or unsafe ids', async () => {
    expect(await store.get('does-not-exist')).toBeNull();
    expect(await store.get('../jobs/x')).toBeNull();
  });

  it('should track stage changes', async () => {
    const job = await store.create({ config: baseConfig });
    await store.updateStatus(job.id, 'validating', 'Checking inputs');
    await store.updateStatus(job.id, 'encoding', 'Encoding', 50);

    const loaded = await store.get(job.id);
    expect(loaded?.status).toBe('encoding');
    expect(loaded?.progress.completedStages).toEqual(['validating']);
    expect(loaded?.progress.startedAt).toBeInstanceOf(Date);
  });

  it('should record failures with ffmpeg details and keep the failing stage', async () => {
    const job = await store.create({ config: baseConfig });
    await store.updateStatus(job.id, 'encoding', 'Encoding', 40);
    await store.setFailed(job.id, 'ffmpeg exited with code 1', 'Invalid data found');

    const loaded = await store.get(job.id);
    expect(loaded?.status).toBe('failed');
    expect(loaded?.progress.stage).toBe('encoding');
    expect(loaded?.error).toBe('ffmpeg exited with code 1');
    expect(loaded?.errorDetails).toBe('Invalid data found');
    expect(loaded?.progress.logs.at(-1)?.message).toBe('Processing failed: ffmpeg exited with code 1');
  });

  it('should mark cancelled jobs', async () => {
    const job = await store.create({ config: baseConfig });
    await store.setCancelled(job.id);

    const loaded = await store.get(job.id);
    expect(loaded?.status).toBe('cancelled');
    expect(loaded?.completedAt).toBeInstanceOf(Date);
  });

  it('should keep only the last 100 log entries', async () => {
    const job = await store.create({ config: baseConfig });
    for (let i = 0; i < 105; i++) {
      await store.addLog(job.id, 'info', `line ${i}`);
    }

    const logs = (await store.get(job.id))?.progress.logs ?? [];
    expect(logs).toHaveLength(100);
    expect(logs[0]?.message).toBe('line 5');
    expect(logs[0]?.timestamp).toBeInstanceOf(Date);
  });

  it('should list jobs newest first with their names', async () => {
    const first = await store.create({ config: baseConfig });
    await new Promise((resolve) => setTimeout(resolve, 5));
    const second = await store.create({ config: { ...baseConfig, name: 'Second run' } });
    await store.setFile(
      first.id,
      { originalName: 'trip.mkv', storedName: 'x.mkv', path: '/tmp/x.mkv', size: 10 },
      'video'
    );

    const list = await store.list();
    expect(list.map((item) => item.id)).toEqual([second.id, first.id]);
    expect(list[0]?.name).toBe('Second run');
    expect(list[1]?.videoName).toBe('trip.mkv');
    expect(list[1]?.subtitleName).toBe('holiday.srt');
  });

  it('should delete a job and its directories', async () => {
    const job = await store.create({ config: baseConfig });

    expect(await store.delete(job.id)).toBe(true);
    expect(await store.get(job.id)).toBeNull();
    expect(fs.existsSync(store.getUploadDir(job.id))).toBe(false);
    expect(await store.delete(job.id)).toBe(false);
  });
});
