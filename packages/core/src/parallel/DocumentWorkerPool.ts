/**
 * DocumentWorkerPool - pool of worker_threads for parallel document parsing
 *
 * Each task is one range of a multi-document stream (its text plus its
 * origin in the full source). Workers run an independent Scanner→Composer
 * pipeline and post back the document roots, or the error as JSON.
 */

import { Worker } from 'worker_threads';
import { EventEmitter } from 'events';
import { fileURLToPath } from 'url';
import { extname } from 'path';
import type { Value } from '@yamlet/types';
import { WorkerError, errorFromJSON } from '../errors/YamletError.js';
import type { YamletError, YamletErrorJSON } from '../errors/YamletError.js';
import { silentLogger } from '../logging/Logger.js';
import type { Logger } from '../logging/Logger.js';

// The worker script sits beside this module: .ts under tsx, .js once built
const WORKER_URL = new URL(`./DocumentWorker${extname(fileURLToPath(import.meta.url))}`, import.meta.url);

/**
 * Start one worker. A .ts worker registers the tsx loader inside its own
 * thread before importing the script (execArgv loaders do not reach
 * workers on Node 20).
 */
function spawnWorker(): Worker {
  if (!WORKER_URL.pathname.endsWith('.ts')) {
    return new Worker(WORKER_URL);
  }
  const bootstrap =
    `import('tsx/esm/api')` +
    `.then(({ register }) => { register(); return import(${JSON.stringify(WORKER_URL.href)}); });`;
  return new Worker(bootstrap, { eval: true });
}

const INIT_TIMEOUT_MS = 10000;

export interface RangeOrigin {
  offset: number;
  line: number;
}

/**
 * Message types from main thread
 */
interface ParseMessage {
  type: 'parse';
  taskId: number;
  source: string;
  origin: RangeOrigin;
}

interface ExitMessage {
  type: 'exit';
}

export type WorkerRequest = ParseMessage | ExitMessage;

/**
 * Worker message types
 */
interface ResultMessage {
  type: 'result';
  taskId: number;
  values: Value[];
}

interface ErrorMessage {
  type: 'error';
  taskId: number;
  error: YamletErrorJSON;
}

interface ReadyMessage {
  type: 'ready';
}

type WorkerResponse = ResultMessage | ErrorMessage | ReadyMessage;

interface ParseTask {
  taskId: number;
  source: string;
  origin: RangeOrigin;
  resolve: (values: Value[]) => void;
  reject: (error: YamletError) => void;
}

/**
 * Settled outcome of one range
 */
export type RangeResult =
  | { index: number; values: Value[]; error: null }
  | { index: number; values: null; error: YamletError };

export interface DocumentWorkerPoolStats {
  workerCount: number;
  activeWorkers: number;
  queuedTasks: number;
  pendingTasks: number;
}

export class DocumentWorkerPool extends EventEmitter {
  private readonly workerCount: number;
  private workers: Worker[] = [];
  private taskQueue: ParseTask[] = [];
  private pendingTasks = new Map<number, ParseTask>();
  /** Task currently owned by each busy worker */
  private running = new Map<Worker, number>();
  private taskIdCounter = 0;
  private readyWorkers: Worker[] = [];
  private initialized = false;

  constructor(
    workerCount: number,
    private readonly logger: Logger = silentLogger
  ) {
    super();
    this.workerCount = Math.max(1, workerCount);
  }

  /**
   * Start the workers and wait until every one reports ready
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    const initPromises: Promise<void>[] = [];

    for (let i = 0; i < this.workerCount; i++) {
      const worker = spawnWorker();

      const initPromise = new Promise<void>((resolve, reject) => {
        const timeout = setTimeout(() => {
          reject(new WorkerError(`Worker ${i} initialization timeout`, 'ERR_WORKER_CRASHED', { worker: i }));
        }, INIT_TIMEOUT_MS);

        worker.once('message', (msg: WorkerResponse) => {
          if (msg.type === 'ready') {
            clearTimeout(timeout);
            resolve();
          }
        });

        worker.once('error', (err: Error) => {
          clearTimeout(timeout);
          reject(err);
        });
      });

      worker.on('message', (msg: WorkerResponse) => this._handleMessage(worker, msg));
      worker.on('error', (err: Error) => this._handleError(worker, err));
      worker.on('exit', (code: number) => this._handleExit(worker, code));

      this.workers.push(worker);
      initPromises.push(initPromise);
    }

    await Promise.all(initPromises);

    this.readyWorkers = [...this.workers];
    this.initialized = true;
    this.logger.debug('Document worker pool ready', { workers: this.workerCount });
    this.emit('pool:ready', { workerCount: this.workerCount });
  }

  /**
   * Parse one range on a worker thread
   */
  parseRange(source: string, origin: RangeOrigin): Promise<Value[]> {
    return new Promise((resolve, reject) => {
      const taskId = this.taskIdCounter++;
      const task: ParseTask = { taskId, source, origin, resolve, reject };

      this.pendingTasks.set(taskId, task);
      this._dispatchNext(task);
    });
  }

  /**
   * Parse every range and wait for all of them to settle. Results are in
   * input order; each carries either its values or its error.
   */
  async parseRanges(ranges: Array<{ index: number; source: string; origin: RangeOrigin }>): Promise<RangeResult[]> {
    await this.init();

    const promises = ranges.map(range =>
      this.parseRange(range.source, range.origin).then(
        (values): RangeResult => ({ index: range.index, values, error: null }),
        (error: YamletError): RangeResult => ({ index: range.index, values: null, error })
      )
    );

    return Promise.all(promises);
  }

  private _send(worker: Worker, task: ParseTask): void {
    this.running.set(worker, task.taskId);
    const message: WorkerRequest = { type: 'parse', taskId: task.taskId, source: task.source, origin: task.origin };
    worker.postMessage(message);
    this.emit('task:started', { taskId: task.taskId });
  }

  /**
   * Dispatch task to available worker or queue it
   */
  private _dispatchNext(task: ParseTask): void {
    const worker = this.readyWorkers.pop();
    if (worker) {
      this._send(worker, task);
    } else {
      this.taskQueue.push(task);
    }
  }

  private _handleMessage(worker: Worker, msg: WorkerResponse): void {
    if (msg.type === 'ready') return;

    this.running.delete(worker);
    const task = this.pendingTasks.get(msg.taskId);
    if (task) {
      this.pendingTasks.delete(msg.taskId);
      if (msg.type === 'result') {
        task.resolve(msg.values);
        this.emit('task:completed', { taskId: msg.taskId });
      } else {
        task.reject(errorFromJSON(msg.error));
        this.emit('task:failed', { taskId: msg.taskId, error: msg.error.message });
      }
    }

    this._workerReady(worker);
  }

  /**
   * Mark worker as ready and dispatch queued task
   */
  private _workerReady(worker: Worker): void {
    const nextTask = this.taskQueue.shift();
    if (nextTask) {
      this._send(worker, nextTask);
    } else {
      this.readyWorkers.push(worker);
    }
  }

  private _handleError(_worker: Worker, error: Error): void {
    this.logger.error('Document worker error', { error: error.message });
    this.emit('worker:error', { error });
  }

  /**
   * A worker that exits while owning a task fails that task
   */
  private _handleExit(worker: Worker, code: number): void {
    if (code !== 0) {
      this.logger.error('Document worker exited', { code });
    }

    this.workers = this.workers.filter(w => w !== worker);
    this.readyWorkers = this.readyWorkers.filter(w => w !== worker);

    const taskId = this.running.get(worker);
    this.running.delete(worker);
    const task = taskId === undefined ? undefined : this.pendingTasks.get(taskId);
    if (task) {
      this.pendingTasks.delete(task.taskId);
      task.reject(new WorkerError(`worker exited with code ${code} while parsing`, 'ERR_WORKER_CRASHED', { code }));
    }

    // Nobody left to run the queue
    if (this.workers.length === 0) {
      for (const queued of this.taskQueue) {
        this.pendingTasks.delete(queued.taskId);
        queued.reject(new WorkerError('no workers left to parse the document', 'ERR_WORKER_CRASHED'));
      }
      this.taskQueue = [];
    }
  }

  /**
   * Terminate all workers
   */
  async terminate(): Promise<void> {
    const terminatePromises = this.workers.map(worker => {
      return new Promise<void>(resolve => {
        worker.once('exit', () => resolve());
        const message: WorkerRequest = { type: 'exit' };
        worker.postMessage(message);
      });
    });

    await Promise.all(terminatePromises);
    this.workers = [];
    this.readyWorkers = [];
    this.initialized = false;
    this.logger.debug('Document worker pool terminated');
    this.emit('pool:terminated');
  }

  getStats(): DocumentWorkerPoolStats {
    return {
      workerCount: this.workerCount,
      activeWorkers: this.running.size,
      queuedTasks: this.taskQueue.length,
      pendingTasks: this.pendingTasks.size,
    };
  }
}
