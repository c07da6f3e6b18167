import { Worker } from 'worker_threads';
import { DEQUEUE_TIMEOUT_MS, SERVICE, TRADE_DB, WORKER_COUNT } from './config.js';
import { errorMessage } from './errors.js';
import type { FrameWorkerData } from './frame-worker.js';
import type { FrameReply, ProcessContext } from './processor.js';
import { END_OF_WORK, type EndOfWork, type FrameQueue } from './queue.js';

export type WorkItem = Buffer | EndOfWork;

export interface WorkerPoolOptions extends ProcessContext {
  size?: number;
  dequeueTimeoutMs?: number;
  /** Second interrupt: workers leave after their current message, sentinel or not. */
  forceStop?: AbortSignal;
}

// Run from source the entry is TypeScript and the thread needs tsx to load it.
const FROM_SOURCE = import.meta.url.endsWith('.ts');
const FRAME_WORKER = new URL(FROM_SOURCE ? './frame-worker.ts' : './frame-worker.js', import.meta.url);

/** One worker thread, handed one frame at a time. */
class FrameThread {
  private readonly worker: Worker;
  private pending?: { resolve(reply: FrameReply): void; reject(err: Error): void };
  private exited = false;

  constructor(readonly id: number, data: FrameWorkerData) {
    this.worker = new Worker(FRAME_WORKER, {
      workerData: data,
      execArgv: FROM_SOURCE ? ['--import', 'tsx'] : undefined,
    });
    this.worker.on('message', (reply: FrameReply) => this.settle()?.resolve(reply));
    this.worker.on('error', (err) => {
      console.error(`[${SERVICE}] worker ${id} thread error:`, err.message);
      this.exited = true;
      this.settle()?.reject(err);
    });
    this.worker.on('exit', (code) => {
      this.exited = true;
      this.settle()?.reject(new Error(`worker ${id} thread exited with code ${code}`));
    });
  }

  get alive(): boolean {
    return !this.exited;
  }

  process(frame: Buffer): Promise<FrameReply> {
    return new Promise<FrameReply>((resolve, reject) => {
      this.pending = { resolve, reject };
      this.worker.postMessage(frame);
    });
  }

  async close(): Promise<void> {
    if (!this.exited) await this.worker.terminate();
  }

  private settle() {
    const pending = this.pending;
    this.pending = undefined;
    return pending;
  }
}

/**
 * Fixed set of symmetric workers draining the queue FIFO. Each worker owns a
 * thread that does decode → persist, so a write waiting on a locked store
 * holds up that worker alone.
 *
 * Workers run concurrently, so two updates for the same row may commit out of
 * arrival order; the store keeps whichever committed last.
 */
export class WorkerPool {
  readonly size: number;
  private readonly dequeueTimeoutMs: number;
  private readonly threadData: FrameWorkerData;
  private workers: Promise<number>[] = [];

  constructor(
    private readonly queue: FrameQueue<WorkItem>,
    private readonly opts: WorkerPoolOptions = {}
  ) {
    this.size = opts.size ?? WORKER_COUNT;
    this.dequeueTimeoutMs = opts.dequeueTimeoutMs ?? DEQUEUE_TIMEOUT_MS;
    if (!Number.isInteger(this.size) || this.size < 1) {
      throw new RangeError(`worker count must be a positive integer, got ${this.size}`);
    }
    this.threadData = {
      dbPath: opts.dbPath ?? TRADE_DB,
      busyTimeoutMs: opts.busyTimeoutMs,
      logMessages: opts.logMessages,
    };
  }

  get running(): boolean {
    return this.workers.length > 0;
  }

  start(): void {
    if (this.running) throw new Error('worker pool already started');
    for (let i = 0; i < this.size; i++) this.workers.push(this.work(i));
    console.log(`[${SERVICE}] started ${this.size} worker(s)`);
  }

  /**
   * Enqueue one sentinel per worker behind any pending frames, then wait for
   * every worker to exit. Resolves with the number of frames each one handled.
   */
  async shutdown(): Promise<number[]> {
    for (let i = 0; i < this.workers.length; i++) this.queue.push(END_OF_WORK);
    const handled = await Promise.all(this.workers);
    this.workers = [];
    const left = this.queue.size;
    if (left > 0) console.warn(`[${SERVICE}] ${left} queued item(s) abandoned by forced stop`);
    console.log(`[${SERVICE}] all workers stopped`);
    return handled;
  }

  private async work(id: number): Promise<number> {
    let handled = 0;
    // Started on the first frame; a worker that never gets one costs no thread.
    let thread: FrameThread | undefined;
    try {
      for (;;) {
        if (this.opts.forceStop?.aborted) {
          console.warn(`[${SERVICE}] worker ${id} forced to stop`);
          break;
        }
        const item = await this.queue.take(this.dequeueTimeoutMs);
        if (item === undefined) continue;
        if (item === END_OF_WORK) break;
        handled++;
        if (!thread?.alive) thread = new FrameThread(id, this.threadData);
        await this.handle(thread, item);
      }
    } finally {
      await thread?.close();
    }
    return handled;
  }

  private async handle(thread: FrameThread, frame: Buffer): Promise<void> {
    const stats = this.opts.stats;
    let reply: FrameReply;
    try {
      reply = await thread.process(frame);
    } catch (e) {
      stats?.recordError('UNEXPECTED');
      console.error(`[${SERVICE}] worker ${thread.id} lost a message:`, errorMessage(e));
      return;
    }
    stats?.merge(reply.counters);
    if (reply.type === 'done') return;
    const { code, name, message } = reply.error;
    stats?.recordError(code);
    if (code === 'UNEXPECTED') console.error(`[${SERVICE}] error processing message:`, message);
    else console.error(`[${SERVICE}] ${name}: ${message}`);
  }
}
