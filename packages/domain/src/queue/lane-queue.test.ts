import { describe, it, expect } from 'vitest';
import { LaneQueue, END_OF_LANE } from './lane-queue.js';
import { isAbortError } from '../errors.js';

describe('LaneQueue', () => {
  it('should dequeue in insertion order', async () => {
    const queue = new LaneQueue<number>('test');
    queue.put(1);
    queue.put(2);
    queue.put(3);

    expect(await queue.get()).toBe(1);
    expect(await queue.get()).toBe(2);
    expect(await queue.get()).toBe(3);
  });

  it('should hand an item to a waiting consumer', async () => {
    const queue = new LaneQueue<string>('test');
    const pending = queue.get();

    queue.put('frame');

    expect(await pending).toBe('frame');
    expect(queue.size).toBe(0);
  });

  it('should deliver the sentinel after every real item', async () => {
    const queue = new LaneQueue<string>('test');
    queue.put('a');
    queue.put('b');
    queue.close();

    const seen: string[] = [];
    for await (const item of queue.drain()) {
      seen.push(item);
    }

    expect(seen).toEqual(['a', 'b']);
  });

  it('should keep returning the sentinel once drained', async () => {
    const queue = new LaneQueue<number>('test');
    queue.close();

    expect(await queue.get()).toBe(END_OF_LANE);
    expect(await queue.get()).toBe(END_OF_LANE);
  });

  it('should enqueue the sentinel only once', async () => {
    const queue = new LaneQueue<number>('test');

    expect(queue.close()).toBe(true);
    expect(queue.close()).toBe(false);
    expect(queue.size).toBe(0);
    expect(queue.isClosed).toBe(true);
  });

  it('should reject puts after close', () => {
    const queue = new LaneQueue<number>('upload');
    queue.close();

    expect(() => queue.put(1)).toThrow('[LaneQueue] upload is closed');
  });

  it('should release a blocked consumer when closed', async () => {
    const queue = new LaneQueue<number>('test');
    const pending = queue.get();

    queue.close();

    expect(await pending).toBe(END_OF_LANE);
  });

  it('should reject a pending get when aborted', async () => {
    const queue = new LaneQueue<number>('test');
    const controller = new AbortController();
    const pending = queue.get(controller.signal);

    controller.abort();

    const error = await pending.catch((e: unknown) => e);
    expect(isAbortError(error)).toBe(true);

    // The aborted waiter must not swallow the next item
    queue.put(7);
    expect(await queue.get()).toBe(7);
  });

  it('should still return queued items when the signal is already aborted', async () => {
    const queue = new LaneQueue<number>('test');
    const controller = new AbortController();
    controller.abort();
    queue.put(4);

    expect(await queue.get(controller.signal)).toBe(4);
    await expect(queue.get(controller.signal)).rejects.toThrow('test: get aborted');
  });
});
