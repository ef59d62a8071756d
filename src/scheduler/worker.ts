/**
 * Worker execution contexts
 *
 * An AsyncWorker runs one long-lived async function on the event loop. Its
 * "interrupt" aborts the signal the work is currently waiting on; the work
 * clears the interrupt once it has reacted, like a thread's interrupt flag.
 */

import { IllegalStateError, InterruptedError } from '../errors/scheduler-errors.js';
import { toError } from '../errors/base-error.js';
import { MAX_TIMER_MS } from '../timing/clock.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { WorkerContext, WorkerFactory, WorkerTask } from './types.js';

export const DEFAULT_WORKER_NAME_PREFIX = 'timed-scheduler-worker';

let nameSuffixSequence = 0;

export class AsyncWorker implements WorkerContext {
  readonly name: string;
  private readonly work: WorkerTask;
  private readonly log: Logger;
  private controller = new AbortController();
  private started = false;
  private alive = false;
  private exited: Promise<void> | null = null;

  constructor(name: string, work: WorkerTask, log: Logger = getLogger()) {
    this.name = name;
    this.work = work;
    this.log = log;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  start(): void {
    if (this.started) {
      throw new IllegalStateError(`Worker ${this.name} already started`);
    }
    this.started = true;
    this.alive = true;
    this.log.debug(`Worker ${this.name} started`);
    this.exited = this.run();
  }

  interrupt(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new InterruptedError(`Worker ${this.name} interrupted`));
    }
  }

  clearInterrupt(): boolean {
    if (!this.controller.signal.aborted) return false;
    this.controller = new AbortController();
    return true;
  }

  isAlive(): boolean {
    return this.alive;
  }

  async join(timeoutMs?: number): Promise<boolean> {
    if (!this.exited) return !this.alive;
    if (timeoutMs === undefined || !Number.isFinite(timeoutMs)) {
      await this.exited;
      return true;
    }

    // One timer cannot exceed MAX_TIMER_MS; chain them for longer waits
    let remaining = timeoutMs;
    while (this.alive && remaining > 0) {
      const slice = Math.min(remaining, MAX_TIMER_MS);
      await this.waitForExit(slice);
      remaining -= slice;
    }
    return !this.alive;
  }

  private async waitForExit(ms: number): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, ms);
    });
    try {
      await Promise.race([this.exited, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(): Promise<void> {
    try {
      await this.work(this);
    } catch (error) {
      this.log.error(`Worker ${this.name} exited with an error`, toError(error));
    } finally {
      this.alive = false;
      this.log.debug(`Worker ${this.name} exited`);
    }
  }
}

export interface AsyncWorkerFactoryOptions {
  namePrefix?: string;
  /** Receives worker lifecycle and crash entries */
  logger?: Logger;
}

/**
 * Default factory: names workers `<prefix>-<n>` with a process-wide counter
 */
export class AsyncWorkerFactory implements WorkerFactory {
  private readonly namePrefix: string;
  private readonly log?: Logger;

  constructor(options: AsyncWorkerFactoryOptions = {}) {
    this.namePrefix = options.namePrefix ?? DEFAULT_WORKER_NAME_PREFIX;
    this.log = options.logger;
  }

  newWorker(work: WorkerTask): WorkerContext {
    return new AsyncWorker(`${this.namePrefix}-${++nameSuffixSequence}`, work, this.log);
  }
}
