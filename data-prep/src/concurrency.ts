/**
 * Bounded concurrency and scoped task groups for the fetch graph.
 *
 * A limiter caps how many leaf operations (one request, one file write) run
 * at once. A task group runs sibling tasks under one AbortSignal: the first
 * real failure aborts the rest, the group waits for every sibling to settle,
 * then rejects with that first failure.
 */

import { CancelledError, describeError } from './errors.js';
import type { Logger } from './types.js';

export interface Limiter {
	run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T>;
	readonly active: number;
	readonly pending: number;
}

interface Waiter {
	start(): void;
}

/**
 * Create a FIFO limiter allowing `limit` concurrent tasks.
 *
 * Only wrap leaf work with it: a task that waits on the same limiter while
 * holding a slot can starve the queue.
 */
export function createLimiter(limit: number): Limiter {
	if (!Number.isInteger(limit) || limit < 1) {
		throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
	}

	let active = 0;
	const queue: Waiter[] = [];

	function acquire(signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) {
			return Promise.reject(new CancelledError());
		}
		if (active < limit) {
			active++;
			return Promise.resolve();
		}

		return new Promise<void>((resolve, reject) => {
			const onAbort = (): void => {
				const index = queue.indexOf(waiter);
				if (index !== -1) queue.splice(index, 1);
				reject(new CancelledError());
			};
			const waiter: Waiter = {
				start: () => {
					signal?.removeEventListener('abort', onAbort);
					active++;
					resolve();
				},
			};
			queue.push(waiter);
			signal?.addEventListener('abort', onAbort, { once: true });
		});
	}

	function release(): void {
		active--;
		queue.shift()?.start();
	}

	return {
		async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
			await acquire(signal);
			try {
				return await task();
			} finally {
				release();
			}
		},
		get active() {
			return active;
		},
		get pending() {
			return queue.length;
		},
	};
}

export type GroupTask = (signal: AbortSignal) => Promise<unknown>;
export type Spawn = (task: GroupTask) => void;

/**
 * Run `body`, which spawns sibling tasks, and wait for all of them.
 *
 * Tasks may spawn more tasks into the same group while it is running. A
 * CancelledError raised after the group aborted is the abort's own echo and is
 * not counted as a failure. When only the parent was aborted the group
 * rejects with CancelledError.
 */
export async function runTaskGroup(
	parentSignal: AbortSignal | undefined,
	body: (spawn: Spawn, signal: AbortSignal) => void | Promise<void>,
	logger: Logger = console
): Promise<void> {
	const controller = new AbortController();
	const onParentAbort = (): void => controller.abort();
	if (parentSignal?.aborted) {
		controller.abort();
	} else {
		parentSignal?.addEventListener('abort', onParentAbort, { once: true });
	}

	const failures: unknown[] = [];
	const tasks: Promise<void>[] = [];

	const fail = (error: unknown): void => {
		if (error instanceof CancelledError && controller.signal.aborted) return;
		if (failures.length > 0) {
			logger.warn(`[TaskGroup] further failure after abort: ${describeError(error)}`);
		}
		failures.push(error);
		controller.abort();
	};

	const spawn: Spawn = (task) => {
		tasks.push(
			Promise.resolve()
				.then(() => task(controller.signal))
				.then(() => undefined, fail)
		);
	};

	try {
		await body(spawn, controller.signal);
	} catch (error) {
		fail(error);
	}

	let settled = 0;
	while (settled < tasks.length) {
		const batch = tasks.slice(settled);
		settled = tasks.length;
		await Promise.all(batch);
	}
	parentSignal?.removeEventListener('abort', onParentAbort);

	if (failures.length > 0) {
		throw failures[0];
	}
	if (controller.signal.aborted) {
		throw new CancelledError();
	}
}
