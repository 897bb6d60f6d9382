/**
 * UCI engine client over a child process
 */

import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import {
  EngineClosedError,
  EngineProtocolError,
  EngineStartError,
  EngineTimeoutError,
} from '../errors.js';
import type { AnalyseOptions, UciLine } from '../types/uci.js';
import { parseBestMove, parseEngineName, parseInfoLine } from '../uci/parser.js';

/**
 * The parts of a child process the client talks to
 */
export interface EngineProcess extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnEngine = (path: string) => EngineProcess;

/**
 * Configuration for a UCI engine process
 */
export interface UciEngineConfig {
  /** Path to the engine binary */
  path: string;
  /** Value for the Threads option */
  threads?: number;
  /** Value for the Hash option, in MB */
  hashMb?: number;
  /** Timeout for a single analysis request */
  timeoutMs?: number;
  /** Timeout for the uci/isready handshake */
  startupTimeoutMs?: number;
  /** Process factory; defaults to node's spawn */
  spawn?: SpawnEngine;
}

/**
 * Default configuration for the engine process
 */
export const DEFAULT_UCI_ENGINE_CONFIG: Required<Omit<UciEngineConfig, 'path' | 'spawn'>> = {
  threads: 1,
  hashMb: 64,
  timeoutMs: 60000,
  startupTimeoutMs: 10000,
};

/** Time allowed for `quit` (or `stop`) before the process is killed */
const SHUTDOWN_GRACE_MS = 2000;

type EngineState = 'idle' | 'starting' | 'ready' | 'closed';

const spawnProcess: SpawnEngine = (path) => spawn(path, [], { stdio: ['pipe', 'pipe', 'ignore'] });

/**
 * Client for a single UCI engine process.
 *
 * Requests are serialized: `analyse` calls made while a search is running
 * wait for it to finish, so one instance must not be shared between
 * independent workers expecting parallelism.
 */
export class UciEngine {
  private readonly config: Required<Omit<UciEngineConfig, 'spawn'>>;
  private readonly spawnEngine: SpawnEngine;
  private process: EngineProcess | null = null;
  private state: EngineState = 'idle';
  private engineName: string | undefined;
  private currentMultiPv = 1;

  /** Receives every stdout line while a request is in flight */
  private lineHandler: ((line: string) => void) | undefined;
  /** Notified when the process exits while a request is in flight */
  private exitHandler: ((error: Error) => void) | undefined;
  /** Settles when the engine has no search running */
  private idle: Promise<void> = Promise.resolve();
  private exited: Promise<void> = Promise.resolve();

  constructor(config: UciEngineConfig) {
    this.config = {
      path: config.path,
      threads: config.threads ?? DEFAULT_UCI_ENGINE_CONFIG.threads,
      hashMb: config.hashMb ?? DEFAULT_UCI_ENGINE_CONFIG.hashMb,
      timeoutMs: config.timeoutMs ?? DEFAULT_UCI_ENGINE_CONFIG.timeoutMs,
      startupTimeoutMs: config.startupTimeoutMs ?? DEFAULT_UCI_ENGINE_CONFIG.startupTimeoutMs,
    };
    this.spawnEngine = config.spawn ?? spawnProcess;
  }

  /**
   * Engine name reported during the handshake
   */
  get name(): string | undefined {
    return this.engineName;
  }

  get running(): boolean {
    return this.state === 'ready';
  }

  /**
   * Spawn the process and complete the uci/isready handshake
   *
   * @throws EngineStartError if the binary cannot be started or does not answer
   */
  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new EngineProtocolError(`Engine cannot be started from state '${this.state}'`);
    }
    this.state = 'starting';

    let child: EngineProcess;
    try {
      child = this.spawnEngine(this.config.path);
    } catch (err) {
      this.state = 'closed';
      throw new EngineStartError(this.config.path, toError(err));
    }
    this.attach(child);

    try {
      await this.request('uci', (line) => {
        const name = parseEngineName(line);
        if (name) this.engineName = name;
        return line.trim() === 'uciok';
      });
      this.send(`setoption name Threads value ${this.config.threads}`);
      this.send(`setoption name Hash value ${this.config.hashMb}`);
      this.send(`setoption name MultiPV value ${this.currentMultiPv}`);
      await this.request('isready', (line) => line.trim() === 'readyok');
    } catch (err) {
      await this.close();
      throw new EngineStartError(this.config.path, toError(err));
    }

    this.state = 'ready';
  }

  /**
   * Analyse a position to a fixed depth
   *
   * @returns Principal variations ordered best-first, at most `multipv` of them
   * @throws EngineTimeoutError if the search exceeds the configured timeout
   * @throws EngineClosedError if the engine is not running
   */
  async analyse(fen: string, options: AnalyseOptions): Promise<UciLine[]> {
    const previous = this.idle;
    let markIdle: () => void = () => undefined;
    this.idle = new Promise<void>((resolve) => {
      markIdle = resolve;
    });

    await previous;
    if (this.state !== 'ready') {
      markIdle();
      throw new EngineClosedError();
    }
    return this.search(fen, options, markIdle);
  }

  /**
   * Quit the engine, killing it if it does not exit in time
   */
  async close(): Promise<void> {
    const child = this.process;
    if (!child || this.state === 'closed') {
      this.state = 'closed';
      return;
    }
    this.state = 'closed';
    this.send('quit');

    let forceKill: NodeJS.Timeout | undefined;
    const killed = new Promise<void>((resolve) => {
      forceKill = setTimeout(() => {
        child.kill('SIGKILL');
        resolve();
      }, SHUTDOWN_GRACE_MS);
    });
    await Promise.race([this.exited, killed]);
    clearTimeout(forceKill);
  }

  private search(fen: string, options: AnalyseOptions, markIdle: () => void): Promise<UciLine[]> {
    const multipv = options.multipv ?? 1;

    return new Promise<UciLine[]>((resolve, reject) => {
      const lines = new Map<number, UciLine>();
      let settled = false;
      let grace: NodeJS.Timeout | undefined;

      const finish = (): void => {
        clearTimeout(timer);
        clearTimeout(grace);
        this.lineHandler = undefined;
        this.exitHandler = undefined;
        markIdle();
      };

      // On timeout the caller is released at once, but the engine stays
      // busy until the stopped search prints its bestmove.
      const timer = setTimeout(() => {
        settled = true;
        reject(new EngineTimeoutError('analyse', this.config.timeoutMs));
        this.send('stop');
        grace = setTimeout(() => {
          finish();
          this.process?.kill('SIGKILL');
        }, SHUTDOWN_GRACE_MS);
      }, this.config.timeoutMs);

      this.lineHandler = (line) => {
        const info = parseInfoLine(line);
        if (info) {
          if (info.multipv <= multipv) lines.set(info.multipv, info);
          return;
        }
        if (parseBestMove(line) !== undefined) {
          finish();
          if (!settled) {
            settled = true;
            resolve([...lines.values()].sort((a, b) => a.multipv - b.multipv));
          }
        }
      };

      this.exitHandler = (error) => {
        finish();
        if (!settled) {
          settled = true;
          reject(error);
        }
      };

      if (multipv !== this.currentMultiPv) {
        this.send(`setoption name MultiPV value ${multipv}`);
        this.currentMultiPv = multipv;
      }
      this.send(`position fen ${fen}`);
      this.send(`go depth ${options.depth}`);
    });
  }

  /**
   * Send a handshake command and wait for the line that completes it
   */
  private request(command: string, isDone: (line: string) => boolean): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.lineHandler = undefined;
        this.exitHandler = undefined;
        reject(new EngineTimeoutError(command, this.config.startupTimeoutMs));
      }, this.config.startupTimeoutMs);

      this.lineHandler = (line) => {
        if (isDone(line)) {
          clearTimeout(timer);
          this.lineHandler = undefined;
          this.exitHandler = undefined;
          resolve();
        }
      };
      this.exitHandler = (error) => {
        clearTimeout(timer);
        reject(error);
      };

      this.send(command);
    });
  }

  private attach(child: EngineProcess): void {
    this.process = child;
    this.exited = new Promise<void>((resolve) => {
      child.once('exit', () => resolve());
    });

    if (child.stdout) {
      createInterface({ input: child.stdout }).on('line', (line) => this.lineHandler?.(line));
    }

    child.on('error', (err: Error) => {
      this.handleExit(err);
    });
    // Writes to a process that failed to spawn fail with EPIPE
    child.stdin?.on('error', (err: Error) => {
      this.handleExit(err);
    });
    child.once('exit', (code: number | null) => {
      this.handleExit(new EngineClosedError(`process exited with code ${String(code)}`));
    });
  }

  private handleExit(error: Error): void {
    this.state = 'closed';
    const handler = this.exitHandler;
    this.exitHandler = undefined;
    this.lineHandler = undefined;
    handler?.(error);
  }

  private send(command: string): void {
    const stdin = this.process?.stdin;
    if (stdin && !stdin.destroyed && stdin.writable) {
      stdin.write(`${command}\n`);
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
