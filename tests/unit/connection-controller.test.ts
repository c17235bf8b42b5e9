import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DeliveryQueue } from '../../src/core/delivery-queue';
import { TaskDispatcher } from '../../src/core/task-dispatcher';
import { ForegroundPump } from '../../src/core/foreground-pump';
import { ConnectionController, validateConnectionParams } from '../../src/connectionController';
import { StatusReporter } from '../../src/statusReporter';
import { MemoryChannel, TaskLog } from '../../src/outputChannel';
import { FakeConnection } from './fakes';
import { deferred, until } from './helpers';

function setup() {
  const queue = new DeliveryQueue();
  const channel = new MemoryChannel();
  const dispatcher = new TaskDispatcher(queue);
  const pump = new ForegroundPump(queue, new TaskLog(channel, 'pump'));
  const status = new StatusReporter();
  const connection = new FakeConnection();
  const controller = new ConnectionController(connection, dispatcher, status, new TaskLog(channel, 'connection'));
  return { queue, channel, dispatcher, pump, status, connection, controller };
}

describe('validateConnectionParams', () => {
  it('should accept database files and the in-memory database', () => {
    assert.strictEqual(validateConnectionParams({ filename: ':memory:' }), null);
    assert.strictEqual(validateConnectionParams({ filename: 'data/app.SQLITE' }), null);
    assert.strictEqual(validateConnectionParams({ filename: '/tmp/shop.db' }), null);
  });

  it('should reject empty names and unknown extensions', () => {
    assert.strictEqual(validateConnectionParams({ filename: '   ' }), 'Database file is required');
    assert.strictEqual(validateConnectionParams({ filename: 'notes.txt' }), 'Unsupported database file extension: .txt');
    assert.strictEqual(validateConnectionParams({ filename: 'noext' }), 'Unsupported database file extension: (none)');
  });
});

describe('ConnectionController', () => {
  it('should report invalid parameters without starting work', () => {
    const { dispatcher, status, connection, controller } = setup();

    assert.strictEqual(controller.connect({ filename: '' }), false);

    assert.deepStrictEqual(status.current, { text: 'Connection failed:\nDatabase file is required', error: true });
    assert.strictEqual(dispatcher.isBusy(), false);
    assert.strictEqual(controller.isConnecting, false);
    assert.deepStrictEqual(connection.opened, []);
  });

  it('should connect in the background and report success', async () => {
    const { queue, pump, status, connection, controller } = setup();
    const connected: string[] = [];
    controller.onConnected(filename => connected.push(filename));

    assert.strictEqual(controller.connect({ filename: ' shop.db ' }), true);
    assert.strictEqual(controller.isConnecting, true);
    assert.strictEqual(status.current.text, 'Connecting to shop.db... Please wait');

    await until(() => queue.size === 1);
    assert.strictEqual(controller.isConnected, false);
    pump.tick();

    assert.strictEqual(controller.isConnecting, false);
    assert.strictEqual(controller.isConnected, true);
    assert.strictEqual(controller.activeDatabase, 'shop.db');
    assert.deepStrictEqual(status.current, { text: 'Connected to shop.db (3 tables)', error: false });
    assert.deepStrictEqual(connected, ['shop.db']);
    assert.deepStrictEqual(connection.opened, [{ filename: 'shop.db' }]);
  });

  it('should ignore a second connect while one is pending', async () => {
    const { queue, channel, pump, connection, controller } = setup();
    const gate = deferred<number>();
    connection.openHandler = () => gate.promise;

    assert.strictEqual(controller.connect({ filename: 'a.db' }), true);
    assert.strictEqual(controller.connect({ filename: 'b.db' }), false);
    assert.ok(channel.lines[0].endsWith('Ignoring request: a connection attempt is already pending'));

    gate.resolve(1);
    await until(() => queue.size === 1);
    pump.tick();

    assert.strictEqual(controller.activeDatabase, 'a.db');
    assert.strictEqual(connection.opened.length, 1);
    assert.strictEqual(controller.connect({ filename: 'b.db' }), true);
  });

  it('should report a failed connection', async () => {
    const { queue, pump, status, connection, controller } = setup();
    connection.openHandler = async () => {
      throw new Error('file is not a database');
    };

    controller.connect({ filename: 'broken.db' });
    await until(() => queue.size === 1);
    pump.tick();

    assert.strictEqual(controller.isConnected, false);
    assert.strictEqual(controller.activeDatabase, null);
    assert.deepStrictEqual(status.current, { text: 'Connection failed:\nfile is not a database', error: true });
  });

  it('should keep the open database when a reconnect fails', async () => {
    const { queue, pump, status, connection, controller } = setup();
    const connected: string[] = [];
    controller.onConnected(filename => connected.push(filename));

    controller.connect({ filename: 'shop.db' });
    await until(() => queue.size === 1);
    pump.tick();

    connection.openHandler = async () => {
      throw new Error('file is not a database');
    };
    controller.connect({ filename: 'broken.db' });
    await until(() => queue.size === 1);
    pump.tick();

    assert.strictEqual(controller.isConnected, true);
    assert.strictEqual(controller.activeDatabase, 'shop.db');
    assert.deepStrictEqual(connected, ['shop.db']);
    assert.deepStrictEqual(status.current, { text: 'Connection failed:\nfile is not a database', error: true });
  });

  it('should test a connection without connecting', async () => {
    const { queue, pump, status, connection, controller } = setup();

    assert.strictEqual(controller.testConnection({ filename: ':memory:' }), true);
    assert.strictEqual(status.current.text, 'Testing connection... Please wait');
    await until(() => queue.size === 1);
    pump.tick();

    assert.deepStrictEqual(status.current, { text: 'Connection test succeeded for in-memory database', error: false });
    assert.strictEqual(controller.isConnected, false);
    assert.deepStrictEqual(connection.tested, [{ filename: ':memory:' }]);
  });

  it('should report an unresponsive database on test', async () => {
    const { queue, pump, status, connection, controller } = setup();
    connection.testHandler = async () => false;

    controller.testConnection({ filename: 'quiet.db' });
    await until(() => queue.size === 1);
    pump.tick();

    assert.deepStrictEqual(status.current, { text: 'Connection test failed:\nDatabase did not respond', error: true });
    assert.strictEqual(controller.isConnecting, false);
  });
});
