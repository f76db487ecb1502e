import { describe, expect, it } from 'vitest';
import { QueueSaturatedError } from './errors.js';
import { JobQueue } from './jobQueue.js';

const item = (id: string) => ({ id });

describe('JobQueue', () => {
  it('hands out items in submission order', async () => {
    const queue = new JobQueue<{ id: string }>(3);
    queue.submit(item('a'));
    queue.submit(item('b'));

    expect(await queue.dequeue()).toEqual({ id: 'a' });
    expect(await queue.dequeue()).toEqual({ id: 'b' });
  });

  it('rejects submissions beyond capacity without waiting', () => {
    const queue = new JobQueue<{ id: string }>(1);
    queue.submit(item('a'));

    expect(() => queue.submit(item('b'))).toThrow(QueueSaturatedError);
    expect(queue.size).toBe(1);
  });

  it('hands a submission straight to a waiting consumer', async () => {
    const queue = new JobQueue<{ id: string }>(1);
    queue.submit(item('a'));
    const first = await queue.dequeue();
    const waiting = queue.dequeue();

    queue.submit(item('b'));
    queue.submit(item('c'));

    expect(first?.id).toBe('a');
    expect((await waiting)?.id).toBe('b');
    expect(queue.size).toBe(1);
  });

  it('requeues past capacity at the back', async () => {
    const queue = new JobQueue<{ id: string }>(1);
    queue.submit(item('a'));
    queue.requeue(item('retry'));

    expect(queue.size).toBe(2);
    expect((await queue.dequeue())?.id).toBe('a');
    expect((await queue.dequeue())?.id).toBe('retry');
  });

  it('delivers each item to exactly one of several concurrent consumers', async () => {
    const queue = new JobQueue<{ id: string }>(10);
    const consumers = [queue.dequeue(), queue.dequeue(), queue.dequeue()];

    queue.submit(item('a'));
    queue.submit(item('b'));
    queue.close();

    const received = await Promise.all(consumers);
    expect(received.map((entry) => entry?.id)).toEqual(['a', 'b', undefined]);
  });

  it('removes a queued item on cancel', async () => {
    const queue = new JobQueue<{ id: string }>(5);
    queue.submit(item('a'));
    queue.submit(item('b'));

    expect(queue.cancel('a')).toBe(true);
    expect(queue.cancel('missing')).toBe(false);
    expect(queue.has('a')).toBe(false);
    expect((await queue.dequeue())?.id).toBe('b');
  });

  it('drains remaining items after close and then yields undefined', async () => {
    const queue = new JobQueue<{ id: string }>(5);
    queue.submit(item('a'));
    queue.close();

    expect(() => queue.submit(item('b'))).toThrow('Job queue is closed');
    expect((await queue.dequeue())?.id).toBe('a');
    expect(await queue.dequeue()).toBeUndefined();
  });
});
