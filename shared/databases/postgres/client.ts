/**
 * Async Database Client
 *
 * Wraps one pg Client for the lifetime of the process. The connected flag is
 * flipped by connect()/disconnect() and cleared by the driver's own
 * error/end events.
 */

import { Client, type ClientConfig } from 'pg';
import defaultLogger, { describeError, type DatabaseLogger } from '../../config/logger';
import { classifyPostgresError, DatabaseError } from './errors';
import type { Row } from './rows';

export interface QueryRows {
	rows: Row[];
	rowCount: number;
}

export interface Queryable {
	query(text: string, values?: readonly unknown[]): Promise<QueryRows>;
}

export interface DatabaseClient extends Queryable {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	isConnected(): boolean;
}

export class PostgresClient implements DatabaseClient {
	private client: Client | null = null;
	private connected = false;
	private connecting: Promise<void> | null = null;

	constructor(
		private readonly config: ClientConfig,
		private readonly logger: DatabaseLogger = defaultLogger
	) {}

	isConnected(): boolean {
		return this.connected && this.client !== null;
	}

	/**
	 * Concurrent callers share one in-flight connect.
	 */
	connect(): Promise<void> {
		if (this.isConnected()) {
			return Promise.resolve();
		}
		if (!this.connecting) {
			this.connecting = this.open().finally(() => {
				this.connecting = null;
			});
		}
		return this.connecting;
	}

	async disconnect(): Promise<void> {
		if (this.connecting) {
			await this.connecting.catch(() => undefined);
		}

		const client = this.client;
		this.client = null;
		this.connected = false;
		if (!client) {
			return;
		}

		try {
			await client.end();
			this.logger.info('PostgreSQL disconnected');
		} catch (error) {
			throw classifyPostgresError(error);
		}
	}

	async query(text: string, values: readonly unknown[] = []): Promise<QueryRows> {
		const client = this.client;
		if (!client || !this.connected) {
			throw new DatabaseError('PostgreSQL client is not connected', 'connection');
		}

		try {
			const result = await client.query(text, [...values]);
			return { rows: result.rows, rowCount: result.rowCount ?? 0 };
		} catch (error) {
			throw classifyPostgresError(error);
		}
	}

	private async open(): Promise<void> {
		// a client the driver reported lost is still open on our side
		const previous = this.client;
		this.client = null;
		this.connected = false;
		if (previous) {
			await this.discard(previous);
		}

		// pg clients cannot be reused after end(); every connect gets a fresh one
		const client = new Client(this.config);
		client.on('error', (err) => {
			this.markLost(client);
			this.logger.warn('PostgreSQL connection error (will reconnect on next call)', {
				error: err.message,
			});
		});
		client.on('end', () => this.markLost(client));

		try {
			await client.connect();
			await client.query(`SET timezone = 'UTC'`);
		} catch (error) {
			await this.discard(client);
			throw classifyPostgresError(error);
		}

		this.client = client;
		this.connected = true;
		this.logger.info('PostgreSQL connected');
	}

	private async discard(client: Client): Promise<void> {
		await client.end().catch((endError: unknown) => {
			this.logger.debug('Discarding PostgreSQL client failed', { error: describeError(endError) });
		});
	}

	private markLost(client: Client): void {
		if (this.client === client) {
			this.connected = false;
		}
	}
}
