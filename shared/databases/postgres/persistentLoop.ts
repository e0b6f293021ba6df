/**
 * Persistent Loop Manager
 *
 * Owns the one long-lived loop context that runs every database unit of work
 * for the process. Request handlers never touch the client directly: they
 * call submit(), the unit is queued on the context, dispatched on the
 * context's own tick, and its outcome (value or the very same error object)
 * is handed back to the caller.
 *
 * The context is created lazily, at most once at a time (check-and-create
 * runs under a mutex), and can be recreated after shutdown().
 */

import defaultLogger, { describeError, type DatabaseLogger } from '../../config/logger';
import { AsyncMutex } from '../../utils/asyncMutex';
import { LoopStartupError, ShutdownTimeoutError } from './errors';

export type UnitOfWork<T> = () => Promise<T>;

export interface LoopHandle {
	readonly id: number;
	readonly createdAt: Date;
	readonly running: boolean;
}

export interface PersistentLoopOptions {
	/** Bound on waiting for a new context to report ready. */
	startupTimeoutMs?: number;
	/** Bound on waiting for queued and in-flight units during shutdown. */
	shutdownTimeoutMs?: number;
	/** Runs inside a new context before it reports ready. */
	onStart?: (handle: LoopHandle) => void | Promise<void>;
	logger?: DatabaseLogger;
}

export const DEFAULT_LOOP_STARTUP_TIMEOUT_MS = 5000;
export const DEFAULT_LOOP_SHUTDOWN_TIMEOUT_MS = 2000;

interface PendingCall {
	readonly id: number;
	readonly submittedAt: number;
	execute(): Promise<void>;
}

type LoopState = 'starting' | 'running' | 'stopping' | 'stopped';

type Settled<T> = { settled: true; value: T } | { settled: false };

function settleWithin<T>(promise: Promise<T>, timeoutMs: number): Promise<Settled<T>> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<Settled<T>>((resolve) => {
		timer = setTimeout(() => resolve({ settled: false }), timeoutMs);
	});
	const settled = promise.then((value): Settled<T> => ({ settled: true, value }));
	return Promise.race([settled, timeout]).finally(() => clearTimeout(timer));
}

function createDeferred<T>() {
	let resolve: (value: T) => void = () => undefined;
	let reject: (reason: unknown) => void = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

class LoopContext implements LoopHandle {
	readonly createdAt = new Date();
	private state: LoopState = 'starting';
	private readonly queue: PendingCall[] = [];
	private readonly inFlight = new Set<Promise<void>>();
	private tick: NodeJS.Immediate | null = null;

	constructor(
		readonly id: number,
		private readonly logger: DatabaseLogger
	) {}

	get running(): boolean {
		return this.state === 'running';
	}

	get pending(): number {
		return this.queue.length + this.inFlight.size;
	}

	/**
	 * Resolves on the context's first tick, once onStart has completed.
	 */
	start(onStart?: (handle: LoopHandle) => void | Promise<void>): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			setImmediate(() => {
				Promise.resolve()
					.then(() => onStart?.(this))
					.then(() => {
						if (this.state !== 'starting') {
							reject(new LoopStartupError(`Database loop #${this.id} was abandoned before it became ready`));
							return;
						}
						this.state = 'running';
						resolve();
					}, reject);
			});
		});
	}

	abandon(): void {
		this.state = 'stopped';
	}

	/**
	 * Returns false when the context no longer accepts work.
	 */
	enqueue(call: PendingCall): boolean {
		if (this.state === 'running') {
			this.queue.push(call);
			if (!this.tick) {
				this.tick = setImmediate(() => this.drain());
			}
			return true;
		}
		if (this.state === 'stopping') {
			// Already draining for shutdown: dispatch right away so stop() waits for it
			this.queue.push(call);
			this.drain();
			return true;
		}
		return false;
	}

	async stop(timeoutMs: number): Promise<void> {
		if (this.state === 'stopped') {
			return;
		}
		this.state = 'stopping';
		if (this.tick) {
			clearImmediate(this.tick);
		}
		this.drain();

		const deadline = Date.now() + timeoutMs;
		while (this.inFlight.size > 0) {
			const remaining = deadline - Date.now();
			const outcome = remaining > 0 ? await settleWithin(Promise.all(this.inFlight), remaining) : { settled: false };
			if (!outcome.settled) {
				const pendingCalls = this.pending;
				this.state = 'stopped';
				throw new ShutdownTimeoutError(
					`Database loop #${this.id} still had ${pendingCalls} unit(s) of work after ${timeoutMs}ms`,
					pendingCalls
				);
			}
		}
		this.state = 'stopped';
	}

	private drain(): void {
		this.tick = null;
		let call = this.queue.shift();
		while (call) {
			this.logger.debug('Dispatching unit of work', {
				loopId: this.id,
				callId: call.id,
				queuedMs: Date.now() - call.submittedAt,
			});
			// execute() settles its caller's promise itself and never rejects
			const task: Promise<void> = call.execute().finally(() => {
				this.inFlight.delete(task);
			});
			this.inFlight.add(task);
			call = this.queue.shift();
		}
	}
}

export class PersistentLoop {
	private current: LoopContext | null = null;
	private readonly mutex = new AsyncMutex();
	private generation = 0;
	private callSequence = 0;
	private readonly startupTimeoutMs: number;
	private readonly shutdownTimeoutMs: number;
	private readonly onStart?: (handle: LoopHandle) => void | Promise<void>;
	private readonly logger: DatabaseLogger;

	constructor(options: PersistentLoopOptions = {}) {
		this.startupTimeoutMs = options.startupTimeoutMs ?? DEFAULT_LOOP_STARTUP_TIMEOUT_MS;
		this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_LOOP_SHUTDOWN_TIMEOUT_MS;
		this.onStart = options.onStart;
		this.logger = options.logger ?? defaultLogger;
	}

	/** Number of loop contexts this manager has created. */
	get createdCount(): number {
		return this.generation;
	}

	/** The live handle, if any. Never creates one. */
	get handle(): LoopHandle | null {
		return this.current;
	}

	async ensureLoop(): Promise<LoopHandle> {
		return this.acquireContext();
	}

	/**
	 * Run one unit of work on the loop context and hand back its outcome.
	 * A failure reaches the caller as the same object the unit threw.
	 */
	async submit<T>(work: UnitOfWork<T>): Promise<T> {
		const deferred = createDeferred<T>();
		const call: PendingCall = {
			id: ++this.callSequence,
			submittedAt: Date.now(),
			execute: async () => {
				try {
					deferred.resolve(await work());
				} catch (error) {
					deferred.reject(error);
				}
			},
		};

		let context = await this.acquireContext();
		while (!context.enqueue(call)) {
			context = await this.acquireContext();
		}
		return deferred.promise;
	}

	/**
	 * Stop the loop after what is already queued has run. Work that outlives
	 * the bound is reported, not thrown. No-op when no loop exists.
	 */
	async shutdown(): Promise<void> {
		await this.mutex.runExclusive(async () => {
			const context = this.current;
			if (!context) {
				return;
			}
			this.current = null;

			try {
				await context.stop(this.shutdownTimeoutMs);
				this.logger.info('Database loop stopped', { loopId: context.id });
			} catch (error) {
				if (!(error instanceof ShutdownTimeoutError)) {
					throw error;
				}
				this.logger.warn('Database loop shutdown timed out', {
					loopId: context.id,
					pendingCalls: error.pendingCalls,
					error: error.message,
				});
			}
		});
	}

	private async acquireContext(): Promise<LoopContext> {
		const live = this.current;
		if (live && live.running) {
			return live;
		}

		return this.mutex.runExclusive(async () => {
			if (this.current && this.current.running) {
				return this.current;
			}
			this.current = null;

			const context = new LoopContext(++this.generation, this.logger);
			const startedAt = Date.now();
			this.logger.debug('Starting database loop', { loopId: context.id });

			let outcome: Settled<void>;
			try {
				outcome = await settleWithin(context.start(this.onStart), this.startupTimeoutMs);
			} catch (error) {
				context.abandon();
				throw new LoopStartupError(`Database loop #${context.id} failed to start: ${describeError(error)}`, {
					cause: error,
				});
			}

			if (!outcome.settled) {
				context.abandon();
				throw new LoopStartupError(
					`Database loop #${context.id} did not become ready within ${this.startupTimeoutMs}ms`
				);
			}

			this.current = context;
			this.logger.info('Database loop ready', {
				loopId: context.id,
				startupMs: Date.now() - startedAt,
			});
			return context;
		});
	}
}
