/**
 * Engine process acquisition and release
 */

import type { EngineLine, EngineService } from '@tacticforge/core';
import { UciEngine, type UciEngineConfig, type UciLine } from '@tacticforge/engine';

import { createEngineError } from '../errors/index.js';

/**
 * Running engine processes, each wrapped for the extractor
 */
export interface EnginePool {
  engines: UciEngine[];
  services: EngineService[];
}

export type EngineFactory = (config: UciEngineConfig) => UciEngine;

const defaultFactory: EngineFactory = (config) => new UciEngine(config);

function toEngineLine(line: UciLine): EngineLine {
  return {
    score: { type: line.score.type, value: line.score.value },
    pv: line.pv,
    depth: line.depth,
  };
}

/**
 * Adapt a UCI client to the extractor's engine interface
 */
export function createEngineService(engine: UciEngine): EngineService {
  return {
    analyse: async (fen, request) => {
      const lines = await engine.analyse(fen, { depth: request.depth, multipv: request.multipv });
      return lines.map(toEngineLine);
    },
  };
}

/**
 * Start `count` engine processes
 *
 * If any of them fails to start, the ones already running are closed
 * before the error is raised.
 */
export async function startEngines(
  config: UciEngineConfig,
  count: number,
  factory: EngineFactory = defaultFactory,
): Promise<EnginePool> {
  const engines = Array.from({ length: count }, () => factory(config));
  const results = await Promise.allSettled(engines.map((engine) => engine.start()));

  const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (failure) {
    await closeEngines(engines);
    throw createEngineError(config.path, failure.reason);
  }

  return { engines, services: engines.map(createEngineService) };
}

/**
 * Close every engine; `close` on a stopped engine is a no-op
 */
export async function closeEngines(engines: readonly UciEngine[]): Promise<void> {
  await Promise.all(engines.map((engine) => engine.close()));
}
