import { DatabaseRuntime } from '../runtime';
import { ConnectionStartupError, DatabaseError } from '../errors';
import { FakeDatabaseClient, silentLogger } from '../../../testing/fakeDatabaseClient';

describe('DatabaseRuntime', () => {
	let client: FakeDatabaseClient;
	let runtime: DatabaseRuntime<FakeDatabaseClient>;

	beforeEach(() => {
		client = new FakeDatabaseClient((text) => (text.startsWith('SELECT 1') ? [{ health: 1 }] : []));
		runtime = new DatabaseRuntime(client, { logger: silentLogger });
	});

	afterEach(async () => {
		await runtime.close();
	});

	it('connects once for concurrent init calls', async () => {
		await Promise.all(Array.from({ length: 5 }, () => runtime.init()));

		expect(runtime.isInitialized).toBe(true);
		expect(client.connectCalls).toBe(1);
		expect(runtime.loop.createdCount).toBe(1);
	});

	it('runs units with the connected client', async () => {
		await runtime.init();

		const rows = await runtime.run(async (db) => (await db.query('SELECT 1 AS health')).rows);

		expect(rows).toEqual([{ health: 1 }]);
	});

	it('reconnects lazily when the driver dropped the connection between calls', async () => {
		await runtime.init();
		client.dropConnection();

		await expect(runtime.run(async (db) => db.isConnected())).resolves.toBe(true);
		expect(client.connectCalls).toBe(2);
	});

	it('disconnects on the running loop before stopping it', async () => {
		await runtime.init();

		await runtime.close();

		expect(client.events).toEqual(['connect', 'disconnect']);
		expect(runtime.loop.createdCount).toBe(1);
		expect(runtime.loop.handle).toBeNull();
		expect(runtime.isInitialized).toBe(false);
	});

	it('can be initialized again after close', async () => {
		await runtime.init();
		await runtime.close();
		await runtime.init();

		expect(client.connectCalls).toBe(2);
		expect(runtime.loop.createdCount).toBe(2);
		expect(client.isConnected()).toBe(true);
	});

	it('does nothing on close when never initialized', async () => {
		await runtime.close();
		await runtime.close();

		expect(client.disconnectCalls).toBe(0);
		expect(runtime.loop.createdCount).toBe(0);
	});

	it('still stops the loop when disconnect fails', async () => {
		const logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
		runtime = new DatabaseRuntime(client, { logger, serviceName: 'tutoring-service' });
		await runtime.init();
		client.failNextDisconnect(new Error('socket already closed'));

		await expect(runtime.close()).resolves.toBeUndefined();

		expect(runtime.loop.handle).toBeNull();
		expect(logger.warn).toHaveBeenCalledWith('Database disconnect during shutdown failed', {
			service: 'tutoring-service',
			error: 'socket already closed',
		});
	});

	it('leaves the runtime uninitialized when the database is unreachable', async () => {
		client.failNextConnect(new Error('refused'), new Error('refused again'));

		await expect(runtime.init()).rejects.toBeInstanceOf(ConnectionStartupError);
		expect(runtime.isInitialized).toBe(false);

		await runtime.init();
		expect(runtime.isInitialized).toBe(true);
	});

	it('reports health through the loop', async () => {
		await expect(runtime.health()).resolves.toBe('ok');

		client.failNextQuery(new DatabaseError('relation does not exist', 'query', { code: '42P01' }));
		await expect(runtime.health()).resolves.toBe('error');
	});
});
