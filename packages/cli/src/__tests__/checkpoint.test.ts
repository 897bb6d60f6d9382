/**
 * Resume checkpoint tests
 */

import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

import { emptyStatistics } from '@tacticforge/core';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  CHECKPOINT_VERSION,
  checkpointPath,
  createCheckpoint,
  deleteCheckpoint,
  loadCheckpoint,
  saveCheckpoint,
} from '../resume/checkpoint.js';

describe('checkpointPath', () => {
  it('should place checkpoints in a .resume directory beside the output', () => {
    expect(checkpointPath('/data/out/puzzles.pgn', '/games/club-2024.pgn')).toBe(
      '/data/out/.resume/club-2024.json',
    );
  });
});

describe('checkpoint files', () => {
  let dir: string;
  let file: string;
  let input: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'tacticforge-resume-'));
    file = path.join(dir, '.resume', 'games.json');
    input = path.join(dir, 'games.pgn');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report a missing checkpoint', async () => {
    expect(await loadCheckpoint(file, input)).toEqual({ status: 'missing' });
  });

  it('should load what was saved', async () => {
    const statistics = { ...emptyStatistics(), totalGames: 4, elapsedMs: 2500 };
    const checkpoint = createCheckpoint(input, 4, statistics);

    await saveCheckpoint(file, checkpoint);

    expect(checkpoint).toEqual({
      version: CHECKPOINT_VERSION,
      input,
      gamesProcessed: 4,
      elapsedMs: 2500,
      statistics,
    });
    expect(await loadCheckpoint(file, input)).toEqual({ status: 'loaded', checkpoint });
    expect(existsSync(`${file}.tmp`)).toBe(false);
  });

  it('should end the file with a newline', async () => {
    await saveCheckpoint(file, createCheckpoint(input, 1, emptyStatistics()));

    expect((await readFile(file, 'utf-8')).endsWith('}\n')).toBe(true);
  });

  it('should reject text that is not JSON', async () => {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, 'not json', 'utf-8');

    const load = await loadCheckpoint(file, input);
    expect(load.status).toBe('invalid');
  });

  it('should name the field that fails the schema', async () => {
    await mkdir(path.dirname(file), { recursive: true });
    const broken = { ...createCheckpoint(input, 1, emptyStatistics()), gamesProcessed: -1 };
    await writeFile(file, JSON.stringify(broken), 'utf-8');

    const load = await loadCheckpoint(file, input);
    expect(load.status).toBe('invalid');
    if (load.status === 'invalid') {
      expect(load.reason.startsWith('gamesProcessed: ')).toBe(true);
    }
  });

  it('should reject a checkpoint from another version', async () => {
    await mkdir(path.dirname(file), { recursive: true });
    const future = { ...createCheckpoint(input, 1, emptyStatistics()), version: 2 };
    await writeFile(file, JSON.stringify(future), 'utf-8');

    expect((await loadCheckpoint(file, input)).status).toBe('invalid');
  });

  it('should reject a checkpoint written for another input', async () => {
    const other = path.join(dir, 'other.pgn');
    await saveCheckpoint(file, createCheckpoint(other, 1, emptyStatistics()));

    expect(await loadCheckpoint(file, input)).toEqual({
      status: 'invalid',
      reason: `written for ${other}`,
    });
  });

  it('should delete a checkpoint, and tolerate one that is gone', async () => {
    await saveCheckpoint(file, createCheckpoint(input, 1, emptyStatistics()));

    await deleteCheckpoint(file);
    await deleteCheckpoint(file);

    expect(existsSync(file)).toBe(false);
  });
});
