import { Subscriber } from 'zeromq';
import { SERVICE, IDLE_SLEEP_MS, POLL_TIMEOUT_MS, RETRY_DELAY_MS } from './config.js';
import { TransientIOError, errorMessage } from './errors.js';
import type { ListenerStats } from './stats.js';

/**
 * Transport seam for the feed. `receive` waits at most one poll interval and
 * resolves `null` when nothing arrived; any rejection is a transport error.
 */
export interface FeedSocket {
  readonly address: string;
  connect(): void;
  receive(): Promise<Buffer | null>;
  close(): void;
}

function isReceiveTimeout(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'EAGAIN';
}

/** ZeroMQ SUB socket subscribed to every topic on the relay. */
export function createZmqFeedSocket(address: string, pollTimeoutMs: number = POLL_TIMEOUT_MS): FeedSocket {
  const sock = new Subscriber({ receiveTimeout: pollTimeoutMs, linger: 0 });
  return {
    address,
    connect() {
      sock.connect(address);
      sock.subscribe();
    },
    async receive() {
      try {
        const [frame] = await sock.receive();
        return frame ?? null;
      } catch (e) {
        if (isReceiveTimeout(e)) return null;
        throw e;
      }
    },
    close() {
      sock.close();
    },
  };
}

/** Producer side of the work queue. */
export interface FrameSink {
  put(frame: Buffer): Promise<void>;
}

export type SubscriberState = 'idle' | 'connecting' | 'subscribed' | 'polling' | 'enqueuing' | 'closing' | 'closed';

export interface SubscriberOptions {
  idleSleepMs?: number;
  retryDelayMs?: number;
  stats?: ListenerStats;
}

/** Sleep that ends early when `signal` aborts. Never rejects. */
export function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Pulls frames off the feed and hands them to the queue in arrival order.
 * Waits on a full queue rather than dropping; survives transport errors.
 */
export class FeedSubscriber {
  private _state: SubscriberState = 'idle';
  private readonly idleSleepMs: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly socket: FeedSocket,
    private readonly queue: FrameSink,
    private readonly opts: SubscriberOptions = {}
  ) {
    this.idleSleepMs = opts.idleSleepMs ?? IDLE_SLEEP_MS;
    this.retryDelayMs = opts.retryDelayMs ?? RETRY_DELAY_MS;
  }

  get state(): SubscriberState {
    return this._state;
  }

  /**
   * Run until `signal` aborts. Connect failures are fatal and rethrown.
   * Resolves with the number of frames enqueued.
   */
  async run(signal: AbortSignal): Promise<number> {
    this._state = 'connecting';
    try {
      this.socket.connect();
    } catch (e) {
      this._state = 'closed';
      throw e;
    }
    this._state = 'subscribed';
    console.log(`[${SERVICE}] subscribed to EDDN relay at ${this.socket.address}`);

    let frames = 0;
    try {
      while (!signal.aborted) {
        this._state = 'polling';
        let frame: Buffer | null;
        try {
          frame = await this.socket.receive();
        } catch (e) {
          const err = new TransientIOError(`receive failed: ${errorMessage(e)}`, { cause: e });
          this.opts.stats?.recordError(err.code);
          console.warn(`[${SERVICE}] ${err.message}; retrying in ${this.retryDelayMs}ms`);
          await pause(this.retryDelayMs, signal);
          continue;
        }
        if (frame === null) {
          if (!signal.aborted) await pause(this.idleSleepMs, signal);
          continue;
        }
        // A frame already off the wire is queued even if shutdown began meanwhile.
        this._state = 'enqueuing';
        this.opts.stats?.increment('received');
        await this.queue.put(frame);
        frames++;
      }
    } finally {
      this._state = 'closing';
      try {
        this.socket.close();
      } catch (e) {
        console.warn(`[${SERVICE}] error closing feed socket:`, errorMessage(e));
      }
      this._state = 'closed';
      console.log(`[${SERVICE}] feed subscription closed after ${frames} frame(s)`);
    }
    return frames;
  }
}
