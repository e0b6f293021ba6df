/**
 * Connection Scope Guard
 *
 * Every guarded body sees a connected client. The connection is left open
 * afterwards: it lives as long as the process, not the call.
 */

import defaultLogger, { describeError, type DatabaseLogger } from '../../config/logger';
import type { DatabaseClient } from './client';
import { ConnectionStartupError, isConnectionError } from './errors';

export class ConnectionGuard<C extends DatabaseClient = DatabaseClient> {
	private repairs = 0;
	// bumped on every connection this guard opens
	private generation = 0;
	private opening: Promise<void> | null = null;

	constructor(
		private readonly client: C,
		private readonly logger: DatabaseLogger = defaultLogger
	) {}

	/** Disconnect + reconnect cycles performed so far. */
	get repairCount(): number {
		return this.repairs;
	}

	/**
	 * Run body with the connected client. A connection-class failure triggers
	 * one disconnect + reconnect before the original failure is rethrown;
	 * any other failure is rethrown as is.
	 *
	 * Units failing together share one repair. A unit whose connection was
	 * already replaced by another repair does not reset the new one.
	 */
	async withConnection<T>(body: (client: C) => Promise<T>): Promise<T> {
		await this.ensureConnected();
		const generation = this.generation;

		try {
			return await body(this.client);
		} catch (error) {
			if (isConnectionError(error)) {
				this.logger.warn('Connection lost during database operation, reconnecting', {
					error: error.message,
					code: error.code,
				});
				if (generation === this.generation) {
					await this.open(true).catch((repairError: unknown) => {
						// next call retries through ensureConnected()
						this.logger.error('Reconnect after connection failure did not succeed', {
							error: describeError(repairError),
						});
					});
				}
			}
			throw error;
		}
	}

	private async ensureConnected(): Promise<void> {
		if (this.client.isConnected() && !this.opening) {
			return;
		}

		try {
			await this.open(false);
		} catch (firstError) {
			if (this.client.isConnected() && !this.opening) {
				// a concurrent caller's retry already got through
				return;
			}
			this.logger.warn('Database connect failed, retrying once', { error: describeError(firstError) });
			try {
				await this.open(true);
			} catch (secondError) {
				throw new ConnectionStartupError(`Could not connect to the database: ${describeError(secondError)}`, {
					cause: secondError,
				});
			}
		}
	}

	/** Callers arriving while a connect or repair is pending await that one. */
	private open(reset: boolean): Promise<void> {
		if (!this.opening) {
			this.opening = (reset ? this.reconnect() : this.connect()).finally(() => {
				this.opening = null;
			});
		}
		return this.opening;
	}

	private async connect(): Promise<void> {
		if (!this.client.isConnected()) {
			await this.client.connect();
			this.generation++;
		}
	}

	private async reconnect(): Promise<void> {
		this.repairs++;
		try {
			await this.client.disconnect();
		} catch (error) {
			this.logger.debug('Ignoring disconnect failure while resetting the connection', {
				error: describeError(error),
			});
		}
		await this.client.connect();
		this.generation++;
	}
}
