import { test } from 'node:test';
import assert from 'node:assert/strict';

import { createDispatcher } from '../src/core/dispatcher.js';
import { configureScheduler, getSchedulerConfig, schedule, scheduleMicrotask } from '../src/core/scheduler.js';
import { captureErrors, tick } from './helpers.js';

test('scheduleMicrotask(): executes higher-priority tasks first', async () => {
  const order: string[] = [];

  scheduleMicrotask(() => order.push('low'), { priority: 'low' });
  scheduleMicrotask(() => order.push('medium'));
  scheduleMicrotask(() => order.push('high'), { priority: 'high' });

  await Promise.resolve();

  assert.deepEqual(order, ['high', 'medium', 'low']);
});

test('schedule(): low-priority frame tasks still make progress under repeated high-priority load', async () => {
  const order: string[] = [];
  const totalHighRuns = 20;
  let highRuns = 0;

  const highTask = () => {
    order.push(`h${highRuns}`);
    highRuns++;
    if (highRuns < totalHighRuns) {
      schedule(highTask, { priority: 'high' });
    }
  };

  schedule(highTask, { priority: 'high' });
  schedule(() => order.push('low'), { priority: 'low' });

  await tick(30);

  const lowIndex = order.indexOf('low');
  assert.notEqual(lowIndex, -1, 'low-priority task should eventually run');
  assert.ok(lowIndex < totalHighRuns, 'low-priority task should run before all high tasks finish');
  assert.equal(highRuns, totalHighRuns);
});

test('a throwing task is reported and the queue keeps draining', async () => {
  const captured = captureErrors();
  try {
    const order: string[] = [];
    scheduleMicrotask(() => {
      throw new Error('task failed');
    });
    scheduleMicrotask(() => order.push('after'));

    await tick();

    assert.deepEqual(order, ['after']);
    assert.equal(captured.errors.length, 1);
    assert.equal(captured.errors[0].source, 'scheduled task');
  } finally {
    captured.restore();
  }
});

test('configureScheduler(): runaway microtask loops are cut off at the cap', async () => {
  const previous = getSchedulerConfig();
  const originalError = console.error;
  const logged: unknown[] = [];
  console.error = (...args: unknown[]) => {
    logged.push(args[0]);
  };
  configureScheduler({ maxMicrotaskIterations: 5 });
  try {
    let runs = 0;
    const loop = () => {
      runs++;
      scheduleMicrotask(loop);
    };
    scheduleMicrotask(loop);
    await tick();

    assert.equal(runs, 5);
    assert.equal(logged.length, 1);
    assert.match(String(logged[0]), /^\[Switchyard\] Scheduler exceeded 5 microtask iterations\./);
  } finally {
    configureScheduler(previous);
    console.error = originalError;
  }
});

test('createDispatcher(): resolves with the work result and tracks the running context', async () => {
  const dispatcher = createDispatcher({ mode: 'microtask' });
  let inside = false;

  const result = await dispatcher.dispatch(() => {
    inside = dispatcher.isDispatching();
    return 42;
  });

  assert.equal(result, 42);
  assert.equal(inside, true);
  assert.equal(dispatcher.isDispatching(), false);
});

test('createDispatcher(): rejects with what the work threw', async () => {
  const dispatcher = createDispatcher({ mode: 'frame' });
  await assert.rejects(
    dispatcher.dispatch(() => {
      throw new Error('work failed');
    }),
    /work failed/
  );
});
