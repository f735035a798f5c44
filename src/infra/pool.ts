import fs from "fs";
import path from "path";
import { Worker } from "worker_threads";
import { WORKER_SCRIPT_BASENAME } from "../config/constants";
import { parseChunk, type ChunkOutcome, type LineChunk } from "../core/chunk";
import { deserializeParseError, WorkerPoolError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { workerResponseSchema, type WorkerData, type WorkerRequest } from "./protocol";

const logger = createLogger('pool');
const threadLogger = logger.child('thread');

/**
 * Runs chunk parse tasks. `run` resolves with the chunk outcome (parse errors
 * included) and rejects only when the pool itself fails.
 */
export interface ParsePool {
  readonly kind: "thread" | "inline";
  readonly size: number;
  run(chunk: LineChunk): Promise<ChunkOutcome>;
  destroy(): Promise<void>;
}

export interface IPoolOptions {
  size: number;
  warn: boolean;
  /** Worker entry to load. Defaults to the compiled worker beside this module. */
  workerScript?: string;
}

type Task = {
  id: number;
  chunk: LineChunk;
  resolve: (outcome: ChunkOutcome) => void;
  reject: (error: Error) => void;
};

/**
 * Parses chunks on the main thread, one per event-loop turn.
 */
export class InlinePool implements ParsePool {
  readonly kind = "inline";
  private destroyed = false;

  constructor(readonly size: number, private readonly warn: boolean) {}

  run(chunk: LineChunk): Promise<ChunkOutcome> {
    if (this.destroyed) return Promise.reject(new WorkerPoolError("Pool has been destroyed"));
    return new Promise((resolve, reject) => {
      setImmediate(() => {
        try {
          resolve(parseChunk(chunk, this.warn));
        } catch (err) {
          reject(err instanceof Error ? err : new WorkerPoolError(String(err)));
        }
      });
    });
  }

  async destroy(): Promise<void> {
    this.destroyed = true;
  }
}

/**
 * Fixed set of worker threads pulling chunks from a shared queue.
 */
export class ThreadPool implements ParsePool {
  readonly kind = "thread";
  private readonly workers = new Set<Worker>();
  private readonly idle: Worker[] = [];
  private readonly active = new Map<Worker, Task>();
  private readonly queue: Task[] = [];
  private nextId = 0;
  private destroyed = false;

  constructor(script: string, readonly size: number, warn: boolean) {
    const workerData: WorkerData = { warn };
    for (let i = 0; i < size; i++) {
      const worker = new Worker(script, { workerData });
      worker.on("message", (message: unknown) => this.onMessage(worker, message));
      worker.on("error", (err) => this.onFailure(worker, err));
      worker.on("exit", (code) => {
        if (!this.destroyed && this.workers.has(worker)) {
          this.onFailure(worker, new WorkerPoolError(`Parse worker exited with code ${code}`));
        }
      });
      this.workers.add(worker);
      this.idle.push(worker);
    }
    threadLogger.debug('Started parse workers', { size, script });
  }

  run(chunk: LineChunk): Promise<ChunkOutcome> {
    if (this.destroyed) return Promise.reject(new WorkerPoolError("Pool has been destroyed"));
    if (this.workers.size === 0) return Promise.reject(new WorkerPoolError("No parse workers left"));
    return new Promise((resolve, reject) => {
      this.queue.push({ id: this.nextId++, chunk, resolve, reject });
      this.dispatch();
    });
  }

  private dispatch(): void {
    while (this.idle.length && this.queue.length) {
      const worker = this.idle.pop();
      const task = this.queue.shift();
      if (!worker || !task) return;
      this.active.set(worker, task);
      const request: WorkerRequest = { id: task.id, chunk: task.chunk };
      worker.postMessage(request);
    }
  }

  private onMessage(worker: Worker, message: unknown): void {
    const task = this.active.get(worker);
    if (!task) return;
    this.active.delete(worker);

    const parsed = workerResponseSchema.safeParse(message);
    if (!parsed.success || parsed.data.id !== task.id) {
      task.reject(new WorkerPoolError("Malformed response from parse worker"));
    } else if ("fatal" in parsed.data) {
      task.reject(new WorkerPoolError(parsed.data.fatal));
    } else {
      const { records, warnings, error } = parsed.data;
      task.resolve({ records, warnings, error: error && deserializeParseError(error) });
    }

    this.idle.push(worker);
    this.dispatch();
  }

  private onFailure(worker: Worker, err: Error): void {
    threadLogger.error('Parse worker failed', { error: err.message });
    this.workers.delete(worker);
    const idleAt = this.idle.indexOf(worker);
    if (idleAt !== -1) this.idle.splice(idleAt, 1);

    const task = this.active.get(worker);
    this.active.delete(worker);
    const failure = err instanceof WorkerPoolError ? err : new WorkerPoolError(err.message);
    task?.reject(failure);

    if (this.workers.size === 0) {
      for (const queued of this.queue.splice(0)) queued.reject(failure);
    }
  }

  async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;
    const stopped = new WorkerPoolError("Pool has been destroyed");
    for (const queued of this.queue.splice(0)) queued.reject(stopped);
    for (const task of this.active.values()) task.reject(stopped);
    this.active.clear();
    const workers = [...this.workers];
    this.workers.clear();
    this.idle.length = 0;
    await Promise.all(workers.map((w) => w.terminate()));
    threadLogger.debug('Parse workers stopped', { size: workers.length });
  }
}

/**
 * Thread pool when the compiled worker script is available, otherwise an
 * in-process pool with the same interface.
 */
export function createParsePool(options: IPoolOptions): ParsePool {
  const script = options.workerScript ?? path.join(__dirname, WORKER_SCRIPT_BASENAME);
  if (fs.existsSync(script)) {
    return new ThreadPool(script, options.size, options.warn);
  }
  logger.debug('Worker script not found, parsing chunks in process', { script });
  return new InlinePool(options.size, options.warn);
}
