import { SERVICE } from './config.js';

const ESC = 0x1b;
const CTRL_C = 0x03; // raw mode swallows SIGINT, so the byte is handled here

/**
 * First SIGINT/SIGTERM (or ESC/Ctrl+C on an interactive terminal) aborts
 * `graceful`: stop reading the feed and drain the queue. A second one aborts
 * `force`: workers leave after their current message.
 * Returns a function that removes every listener installed here.
 */
export function registerShutdown(graceful: AbortController, force: AbortController): () => void {
  const trigger = (reason: string) => {
    if (!graceful.signal.aborted) {
      console.log(`[${SERVICE}] ${reason} received, draining and shutting down...`);
      graceful.abort(reason);
    } else if (!force.signal.aborted) {
      console.warn(`[${SERVICE}] ${reason} received again, forcing workers to stop`);
      force.abort(reason);
    }
  };
  const onSigint = () => trigger('SIGINT');
  const onSigterm = () => trigger('SIGTERM');
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  const stdin = process.stdin;
  const interactive = stdin.isTTY === true;
  const onKey = (chunk: Buffer) => {
    if (chunk.length === 1 && chunk[0] === ESC) trigger('ESC');
    else if (chunk.includes(CTRL_C)) trigger('Ctrl+C');
  };
  if (interactive) {
    stdin.setRawMode(true);
    stdin.on('data', onKey);
    stdin.resume();
    console.log(`[${SERVICE}] press ESC or Ctrl+C to stop`);
  }

  return () => {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    if (interactive) {
      stdin.off('data', onKey);
      stdin.setRawMode(false);
      stdin.pause();
    }
  };
}
