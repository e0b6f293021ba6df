/**
 * Database Runtime
 *
 * The one object a service builds at startup and hands to its domain
 * services: the shared client, the loop that runs all work against it and
 * the guard around every unit. init()/close() are the process-level hooks.
 */

import defaultLogger, { describeError, type DatabaseLogger } from '../../config/logger';
import { AsyncMutex } from '../../utils/asyncMutex';
import type { DatabaseClient, Queryable } from './client';
import { ConnectionGuard } from './connectionGuard';
import { PersistentLoop, type PersistentLoopOptions } from './persistentLoop';

export interface DatabaseRuntimeOptions extends PersistentLoopOptions {
	serviceName?: string;
}

/** The part of the runtime domain services depend on. */
export interface UnitRunner {
	run<T>(body: (client: Queryable) => Promise<T>): Promise<T>;
}

export class DatabaseRuntime<C extends DatabaseClient = DatabaseClient> implements UnitRunner {
	readonly loop: PersistentLoop;
	readonly guard: ConnectionGuard<C>;
	private initialized = false;
	private readonly lifecycle = new AsyncMutex();
	private readonly logger: DatabaseLogger;
	private readonly serviceName: string;

	constructor(
		readonly client: C,
		options: DatabaseRuntimeOptions = {}
	) {
		this.logger = options.logger ?? defaultLogger;
		this.serviceName = options.serviceName ?? 'database';
		this.loop = new PersistentLoop({ ...options, logger: this.logger });
		this.guard = new ConnectionGuard(client, this.logger);
	}

	get isInitialized(): boolean {
		return this.initialized;
	}

	/**
	 * Start the loop and open the connection. Concurrent callers share one
	 * initialization; later calls return immediately.
	 */
	async init(): Promise<void> {
		if (this.initialized) {
			return;
		}

		await this.lifecycle.runExclusive(async () => {
			if (this.initialized) {
				return;
			}
			await this.loop.ensureLoop();
			await this.run(async () => undefined);
			this.initialized = true;
			this.logger.info('Database runtime initialized', { service: this.serviceName });
		});
	}

	/**
	 * Submit a unit of work that runs with the connected client.
	 */
	run<T>(body: (client: C) => Promise<T>): Promise<T> {
		return this.loop.submit(() => this.guard.withConnection(body));
	}

	async health(): Promise<'ok' | 'error'> {
		try {
			const result = await this.run((client) => client.query('SELECT 1 AS health'));
			return result.rows.length > 0 ? 'ok' : 'error';
		} catch (error) {
			this.logger.warn('PostgreSQL health check failed', {
				service: this.serviceName,
				error: describeError(error),
			});
			return 'error';
		}
	}

	/**
	 * Disconnect on the loop, then stop the loop. Safe to call more than once.
	 * A client the driver reported lost is still closed on our side.
	 */
	async close(): Promise<void> {
		await this.lifecycle.runExclusive(async () => {
			if (this.loop.handle !== null) {
				try {
					await this.loop.submit(() => this.client.disconnect());
				} catch (error) {
					this.logger.warn('Database disconnect during shutdown failed', {
						service: this.serviceName,
						error: describeError(error),
					});
				}
			}
			await this.loop.shutdown();
			this.initialized = false;
			this.logger.info('Database runtime closed', { service: this.serviceName });
		});
	}
}
