/**
 * Resume checkpoints
 *
 * One JSON file per input under `<output dir>/.resume/`, rewritten after
 * every completed game and removed once the input is fully processed.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import type { StatisticsSnapshot } from '@tacticforge/core';
import { z } from 'zod';

import { OutputError } from '../errors/cli-errors.js';

export const CHECKPOINT_VERSION = 1;

const countsSchema = z.record(z.number().int().min(0));

const statisticsSchema = z.object({
  totalGames: z.number().int().min(0),
  puzzlesFound: z.number().int().min(0),
  puzzlesRejected: z.number().int().min(0),
  rejectionReasons: countsSchema,
  objectives: countsSchema,
  phases: countsSchema,
  elapsedMs: z.number().min(0),
});

export const checkpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  /** Absolute path of the input file */
  input: z.string().min(1),
  /** Games completed from the start of the input */
  gamesProcessed: z.number().int().min(0),
  elapsedMs: z.number().min(0),
  statistics: statisticsSchema,
});

export type Checkpoint = z.infer<typeof checkpointSchema>;

export type CheckpointLoad =
  | { status: 'missing' }
  | { status: 'loaded'; checkpoint: Checkpoint }
  | { status: 'invalid'; reason: string };

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Checkpoint location for an input, next to the output file
 */
export function checkpointPath(outputPath: string, inputPath: string): string {
  const outputDir = path.dirname(path.resolve(outputPath));
  return path.join(outputDir, '.resume', `${path.parse(inputPath).name}.json`);
}

/**
 * Build a checkpoint for an input
 */
export function createCheckpoint(
  inputPath: string,
  gamesProcessed: number,
  statistics: StatisticsSnapshot,
): Checkpoint {
  return {
    version: CHECKPOINT_VERSION,
    input: path.resolve(inputPath),
    gamesProcessed,
    elapsedMs: statistics.elapsedMs,
    statistics,
  };
}

/**
 * Read the checkpoint for an input
 *
 * A file that cannot be parsed, or that belongs to another input, is
 * reported as invalid for the caller to warn about and ignore.
 */
export async function loadCheckpoint(file: string, inputPath: string): Promise<CheckpointLoad> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return { status: 'missing' };
    }
    throw new OutputError(
      `Failed to read checkpoint: ${file}`,
      error instanceof Error ? error.message : undefined,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return { status: 'invalid', reason: error instanceof Error ? error.message : 'not JSON' };
  }

  const result = checkpointSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { status: 'invalid', reason: `${where}${issue?.message ?? 'invalid checkpoint'}` };
  }

  const expected = path.resolve(inputPath);
  if (result.data.input !== expected) {
    return { status: 'invalid', reason: `written for ${result.data.input}` };
  }

  return { status: 'loaded', checkpoint: result.data };
}

/**
 * Write a checkpoint atomically: a temporary file renamed over the old one
 */
export async function saveCheckpoint(file: string, checkpoint: Checkpoint): Promise<void> {
  const temp = `${file}.tmp`;
  try {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(temp, `${JSON.stringify(checkpoint, null, 2)}\n`, 'utf-8');
    await rename(temp, file);
  } catch (error) {
    throw new OutputError(
      `Failed to write checkpoint: ${file}`,
      error instanceof Error ? error.message : undefined,
    );
  }
}

/**
 * Remove the checkpoint of a completed input
 */
export async function deleteCheckpoint(file: string): Promise<void> {
  await rm(file, { force: true });
}
