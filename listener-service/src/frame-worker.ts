/**
 * Worker thread entry for the pool: one frame in, one `FrameReply` out.
 * The synchronous store write blocks this thread only, never the feed.
 */
import { parentPort, workerData } from 'worker_threads';
import { z } from 'zod';
import { runFrame } from './processor.js';

const FrameWorkerDataSchema = z.object({
  dbPath: z.string(),
  busyTimeoutMs: z.number().int().nonnegative().optional(),
  logMessages: z.boolean().optional(),
});

export type FrameWorkerData = z.infer<typeof FrameWorkerDataSchema>;

const port = parentPort;
if (!port) throw new Error('frame-worker must be started as a worker thread');

const ctx = FrameWorkerDataSchema.parse(workerData);

port.on('message', (bytes: Uint8Array) => {
  port.postMessage(runFrame(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength), ctx));
});
