import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DeliveryQueue } from '../../src/core/delivery-queue';
import { SingleFlightExecutor, isTerminalStatus, transitionTask } from '../../src/core/single-flight';
import type { TaskRecord } from '../../src/core/types';
import { MemoryChannel, TaskLog } from '../../src/outputChannel';
import { deferred, until } from './helpers';

function setup() {
  const queue = new DeliveryQueue();
  const channel = new MemoryChannel();
  const executor = new SingleFlightExecutor(queue, 'query', new TaskLog(channel, 'executor'));
  return { queue, channel, executor };
}

describe('SingleFlightExecutor', () => {
  describe('state machine', () => {
    it('should allow pending -> running -> completed', () => {
      const task: TaskRecord<number> = { id: 1, status: 'pending', elapsedMs: 0 };
      transitionTask(task, 'running');
      transitionTask(task, 'completed');
      assert.strictEqual(task.status, 'completed');
      assert.strictEqual(isTerminalStatus(task.status), true);
    });

    it('should reject leaving a terminal state', () => {
      const task: TaskRecord<number> = { id: 1, status: 'cancelled', elapsedMs: 0 };
      assert.throws(() => transitionTask(task, 'running'), /Illegal task transition: cancelled -> running/);
    });

    it('should reject skipping the running state', () => {
      const task: TaskRecord<number> = { id: 1, status: 'pending', elapsedMs: 0 };
      assert.throws(() => transitionTask(task, 'completed'), /pending -> completed/);
      assert.strictEqual(isTerminalStatus('running'), false);
    });
  });

  it('should complete with the work result', async () => {
    const { queue, executor } = setup();
    const records: TaskRecord<string>[] = [];

    const started = executor.executeAsync(() => 'rows', task => records.push({ ...task }));
    assert.strictEqual(started, true);
    assert.strictEqual(executor.isRunning(), true);
    assert.strictEqual(executor.currentTask?.status, 'running');

    await until(() => !executor.isRunning());
    queue.drainAndRun();

    assert.strictEqual(records.length, 1);
    assert.strictEqual(records[0].status, 'completed');
    assert.strictEqual(records[0].result, 'rows');
    assert.strictEqual(records[0].error, undefined);
    assert.ok(records[0].elapsedMs >= 0);
  });

  it('should report a failure with the error description', async () => {
    const { queue, executor } = setup();
    const records: TaskRecord<never>[] = [];

    executor.executeAsync(() => { throw new Error('syntax error near FROM'); }, task => records.push({ ...task }));
    await until(() => !executor.isRunning());
    queue.drainAndRun();

    assert.strictEqual(records[0].status, 'failed');
    assert.strictEqual(records[0].error, 'syntax error near FROM');
    assert.strictEqual(records[0].result, undefined);
  });

  it('should reject a second submission while the first is running', async () => {
    const { queue, channel, executor } = setup();
    const gate = deferred<number>();
    const records: TaskRecord<number>[] = [];

    assert.strictEqual(executor.executeAsync(() => gate.promise, task => records.push({ ...task })), true);
    const before = executor.currentTask;

    let secondRan = false;
    const second = executor.executeAsync(() => { secondRan = true; return 0; }, () => {});
    assert.strictEqual(second, false);
    assert.deepStrictEqual(executor.currentTask, before);
    assert.ok(channel.lines.some(line => line.endsWith('Rejected query: task #1 still running')));

    gate.resolve(7);
    await until(() => !executor.isRunning());
    queue.drainAndRun();

    assert.strictEqual(secondRan, false);
    assert.strictEqual(records.length, 1);
    assert.strictEqual(records[0].id, 1);
    assert.strictEqual(records[0].result, 7);

    assert.strictEqual(executor.executeAsync(() => 8, () => {}), true);
    assert.strictEqual(executor.currentTask?.id, 2);
  });

  it('should cancel before the work starts without invoking it', async () => {
    const { queue, executor } = setup();
    let invocations = 0;
    const records: TaskRecord<number>[] = [];

    executor.executeAsync(() => { invocations++; return 1; }, task => records.push({ ...task }));
    assert.strictEqual(executor.cancelCurrent(), true);

    await until(() => !executor.isRunning());
    queue.drainAndRun();

    assert.strictEqual(invocations, 0);
    assert.strictEqual(records[0].status, 'cancelled');
    assert.strictEqual(records[0].result, undefined);
  });

  it('should report cancelled when cancelled after the work returned', async () => {
    const { queue, executor } = setup();
    const gate = deferred<number>();
    const records: TaskRecord<number>[] = [];
    let observedSignal: AbortSignal | null = null;

    executor.executeAsync(signal => {
      observedSignal = signal;
      return gate.promise;
    }, task => records.push({ ...task }));

    await until(() => observedSignal !== null);
    assert.strictEqual(executor.cancelCurrent(), true);
    gate.resolve(99);

    await until(() => !executor.isRunning());
    queue.drainAndRun();

    assert.strictEqual(records[0].status, 'cancelled');
    assert.strictEqual(records[0].result, undefined);
  });

  it('should treat work that throws after noticing the signal as cancelled', async () => {
    const { queue, executor } = setup();
    const gate = deferred<void>();
    const records: TaskRecord<number>[] = [];

    executor.executeAsync(async signal => {
      await gate.promise;
      if (signal.aborted) {
        throw new Error('aborted by user');
      }
      return 1;
    }, task => records.push({ ...task }));

    await until(() => executor.currentTask !== null);
    executor.cancelCurrent();
    gate.resolve();

    await until(() => !executor.isRunning());
    queue.drainAndRun();

    assert.strictEqual(records[0].status, 'cancelled');
    assert.strictEqual(records[0].error, undefined);
  });

  it('should return false from cancelCurrent when idle', () => {
    const { executor } = setup();
    assert.strictEqual(executor.cancelCurrent(), false);
    assert.strictEqual(executor.isRunning(), false);
    assert.strictEqual(executor.currentTask, null);
  });

  it('should give each task a fresh cancellation signal', async () => {
    const { queue, executor } = setup();
    const records: TaskRecord<number>[] = [];

    executor.executeAsync(() => 1, () => {});
    executor.cancelCurrent();
    await until(() => !executor.isRunning());
    queue.drainAndRun();

    executor.executeAsync(() => 2, task => records.push({ ...task }));
    await until(() => !executor.isRunning());
    queue.drainAndRun();

    assert.strictEqual(records[0].status, 'completed');
    assert.strictEqual(records[0].result, 2);
  });

  it('should deliver progress messages before the completion', async () => {
    const { queue, executor } = setup();
    const events: string[] = [];

    executor.executeAsync(
      () => 5,
      task => events.push(`complete:${task.status}`),
      message => events.push(message)
    );
    await until(() => !executor.isRunning());
    queue.drainAndRun();

    assert.strictEqual(events.length, 3);
    assert.strictEqual(events[0], 'Executing query...');
    assert.match(events[1], /^Query completed in \d+\.\d{2}s$/);
    assert.strictEqual(events[2], 'complete:completed');
  });

  it('should report failure progress text', async () => {
    const { queue, executor } = setup();
    const events: string[] = [];

    executor.executeAsync(
      () => Promise.reject(new Error('no such table: t')),
      task => events.push(`complete:${task.status}`),
      message => events.push(message)
    );
    await until(() => !executor.isRunning());
    queue.drainAndRun();

    assert.deepStrictEqual(events, ['Executing query...', 'Query failed: no such table: t', 'complete:failed']);
  });

  it('should not run continuations outside the drain', async () => {
    const { queue, executor } = setup();
    let completed = false;

    executor.executeAsync(() => 1, () => { completed = true; });
    await until(() => !executor.isRunning());

    assert.strictEqual(completed, false);
    assert.strictEqual(queue.size, 1);
    queue.drainAndRun();
    assert.strictEqual(completed, true);
  });
});
