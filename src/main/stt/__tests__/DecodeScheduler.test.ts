import { deferred } from '../../__tests__/fakes';
import { DecodeScheduler } from '../DecodeScheduler';

describe('DecodeScheduler', () => {
  test('run returns the task result and frees the slot', async () => {
    const scheduler = new DecodeScheduler();

    await expect(scheduler.run('final', async () => 42)).resolves.toBe(42);
    expect(scheduler.isBusy).toBe(false);
    expect(scheduler.completed).toBe(1);
  });

  test('never runs two tasks at once', async () => {
    const scheduler = new DecodeScheduler();
    const gate = deferred<void>();
    const log: string[] = [];

    const first = scheduler.run('final', async () => {
      log.push('first start');
      await gate.promise;
      log.push('first end');
    });
    const second = scheduler.run('final', async () => {
      log.push('second');
    });

    expect(log).toEqual(['first start']);
    expect(scheduler.pendingFinals).toBe(1);

    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(['first start', 'first end', 'second']);
  });

  test('a final waits for the running partial, then goes ahead of queued partials', async () => {
    const scheduler = new DecodeScheduler();
    const gate = deferred<void>();
    const log: string[] = [];

    const partial = scheduler.tryRun(async () => {
      log.push('partial start');
      await gate.promise;
      log.push('partial end');
    });
    const queuedPartial = scheduler.run('partial', async () => {
      log.push('queued partial');
    });
    const final = scheduler.run('final', async () => {
      log.push('final');
    });

    expect(scheduler.isBusy).toBe(true);
    expect(scheduler.pendingFinals).toBe(1);

    gate.resolve();
    await Promise.all([partial, queuedPartial, final]);

    expect(log).toEqual(['partial start', 'partial end', 'final', 'queued partial']);
  });

  test('tryRun skips instead of waiting while busy', async () => {
    const scheduler = new DecodeScheduler();
    const gate = deferred<void>();
    const running = scheduler.run('final', () => gate.promise);
    const task = vi.fn(async () => 'never');

    await expect(scheduler.tryRun(task)).resolves.toEqual({ status: 'skipped' });
    expect(task).not.toHaveBeenCalled();
    expect(scheduler.skipped).toBe(1);

    gate.resolve();
    await running;
    await expect(scheduler.tryRun(task)).resolves.toEqual({ status: 'ran', value: 'never' });
  });

  test('a failing task releases the slot and rejects its caller', async () => {
    const scheduler = new DecodeScheduler();

    await expect(scheduler.run('final', async () => {
      throw new Error('engine crashed');
    })).rejects.toThrow('engine crashed');

    expect(scheduler.isBusy).toBe(false);
    await expect(scheduler.run('partial', async () => 'ok')).resolves.toBe('ok');
  });
});
