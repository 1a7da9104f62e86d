import { BackgroundTaskRunner } from '../../src';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('BackgroundTaskRunner', () => {
  it('should return from submit before the task starts', async () => {
    const runner = new BackgroundTaskRunner({ concurrency: 2 });
    const started: string[] = [];

    runner.submit('first', async () => {
      started.push('first');
    });
    expect(started).toEqual([]);

    await runner.onIdle();
    expect(started).toEqual(['first']);
  });

  it('should never run more tasks than its concurrency', async () => {
    const runner = new BackgroundTaskRunner({ concurrency: 2 });
    const gates = [deferred(), deferred(), deferred()];
    let running = 0;
    let peak = 0;

    gates.forEach((gate, index) => {
      runner.submit(`task-${index}`, async () => {
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
      });
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(runner.getStats()).toMatchObject({ running: 2, queued: 1 });

    gates.forEach((gate) => gate.resolve());
    await runner.onIdle();

    expect(peak).toBe(2);
    expect(runner.getStats()).toMatchObject({ submitted: 3, succeeded: 3, failed: 0, running: 0 });
  });

  it('should absorb failing tasks and keep working', async () => {
    const runner = new BackgroundTaskRunner({ concurrency: 1 });
    const completed: string[] = [];

    runner.submit('boom', async () => {
      throw new Error('boom');
    });
    runner.submit('after', async () => {
      completed.push('after');
    });

    await runner.onIdle();

    expect(completed).toEqual(['after']);
    expect(runner.getStats()).toMatchObject({ succeeded: 1, failed: 1 });
  });

  it('should resolve onIdle immediately when nothing is queued', async () => {
    const runner = new BackgroundTaskRunner();
    await expect(runner.onIdle()).resolves.toBeUndefined();
    expect(runner.getStats().concurrency).toBe(4);
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => new BackgroundTaskRunner({ concurrency: 0 })).toThrow(
      'Runner concurrency must be a positive integer',
    );
  });
});
