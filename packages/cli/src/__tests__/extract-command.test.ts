/**
 * Extract command tests (paths that never start an engine)
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

import { getFixturePath } from '@tacticforge/test-utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { extractCommand } from '../commands/extract.js';
import { InputError } from '../errors/index.js';

const SHORT_GAMES = getFixturePath('short-games.pgn');

describe('extractCommand', () => {
  let dir: string;
  let lines: string[];
  const write = (line: string): void => void lines.push(line);

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'tacticforge-cmd-'));
    lines = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should require at least one input', async () => {
    await expect(extractCommand({}, { env: {}, write })).rejects.toBeInstanceOf(InputError);
  });

  it('should print the resolved configuration and stop', async () => {
    await extractCommand(
      { input: [SHORT_GAMES], profile: 'deep', showConfig: true, color: false },
      { env: {}, write },
    );

    expect(lines[2]).toBe('Raw configuration:');
    const printed: unknown = JSON.parse(lines[3] ?? '');
    expect(printed).toMatchObject({ analysis: { profile: 'deep', depth: 18 } });
  });

  it('should count games in a dry run without starting an engine', async () => {
    const output = path.join(dir, 'puzzles.pgn');

    await extractCommand(
      { input: [SHORT_GAMES], output, dryRun: true, color: false },
      {
        env: {},
        write,
        engineFactory: () => {
          throw new Error('engine started');
        },
      },
    );

    expect(lines).toEqual([
      'tacticforge v0.1.0',
      '',
      'Dry-run mode: validating inputs...',
      '',
      `✓ ${SHORT_GAMES}: 2 game(s)`,
      '',
      `Output: ${output}`,
      'Dry-run complete. No analysis was performed.',
    ]);
  });
});
