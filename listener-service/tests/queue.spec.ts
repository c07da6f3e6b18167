import { describe, it, expect } from 'vitest';
import { END_OF_WORK, FrameQueue } from '../src/queue.js';

const tick = () => new Promise((r) => setTimeout(r, 0));

describe('FrameQueue', () => {
  it('hands items out in arrival order', async () => {
    const q = new FrameQueue<string>(10);
    await q.put('a');
    await q.put('b');
    await q.put('c');
    expect([await q.take(10), await q.take(10), await q.take(10)]).toEqual(['a', 'b', 'c']);
  });

  it('resolves undefined when nothing arrives in time', async () => {
    const q = new FrameQueue<string>(1);
    expect(await q.take(5)).toBeUndefined();
  });

  it('wakes a waiting consumer on put', async () => {
    const q = new FrameQueue<string>(1);
    const pending = q.take(1000);
    await q.put('frame');
    expect(await pending).toBe('frame');
    expect(q.size).toBe(0);
  });

  it('blocks the producer while full instead of dropping', async () => {
    const q = new FrameQueue<string>(1);
    await q.put('a');
    let stored = false;
    const blocked = q.put('b').then(() => {
      stored = true;
    });
    await tick();
    expect(stored).toBe(false);
    expect(q.blockedProducers).toBe(1);
    expect(q.size).toBe(1);

    expect(await q.take(10)).toBe('a');
    await blocked;
    expect(stored).toBe(true);
    expect(q.blockedProducers).toBe(0);
    expect(await q.take(10)).toBe('b');
  });

  it('keeps waiting producers in order', async () => {
    const q = new FrameQueue<number>(1);
    await q.put(1);
    const rest = [q.put(2), q.put(3)];
    expect(await q.take(10)).toBe(1);
    expect(await q.take(10)).toBe(2);
    expect(await q.take(10)).toBe(3);
    await Promise.all(rest);
  });

  it('lets sentinels past a full queue, behind pending items', async () => {
    const q = new FrameQueue<string | typeof END_OF_WORK>(1);
    await q.put('a');
    q.push(END_OF_WORK);
    expect(q.size).toBe(2);
    expect(await q.take(10)).toBe('a');
    expect(await q.take(10)).toBe(END_OF_WORK);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new FrameQueue<string>(0)).toThrow(RangeError);
  });
});
