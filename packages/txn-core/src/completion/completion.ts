import { TransactionError } from '../errors.js'

/**
 * A pending asynchronous outcome.
 *
 * Every protocol exchange in this package (link attach, declare, discharge,
 * transactional sends) reports through one of these, exactly once.
 */
export interface CompletionToken<T = void> {
	onSuccess(value: T): void
	onFailure(cause: Error): void
	isComplete(): boolean
}

export type CompletionOutcome<T> =
	| { status: 'pending' }
	| { status: 'succeeded', value: T }
	| { status: 'failed', cause: Error }

export type CompletionHandlers<T> = {
	onSuccess?: (value: T) => void
	onFailure?: (cause: Error) => void
}

type Waiter<T> = {
	resolve: (value: T) => void
	reject: (cause: Error) => void
}

/**
 * Single-resolution completion token.
 *
 * Optional handlers run when the outcome arrives, which is how continuation
 * steps are chained. A second resolution is a caller bug and throws.
 * `result()` exposes the outcome as a promise for callers outside the
 * protocol loop.
 */
export class Completion<T = void> implements CompletionToken<T> {
	private outcome: CompletionOutcome<T> = { status: 'pending' }
	private waiters: Waiter<T>[] = []

	constructor(private readonly handlers: CompletionHandlers<T> = {}) {}

	onSuccess(value: T): void {
		this.settle({ status: 'succeeded', value })
		for (const waiter of this.takeWaiters()) waiter.resolve(value)
		this.handlers.onSuccess?.(value)
	}

	onFailure(cause: Error): void {
		this.settle({ status: 'failed', cause })
		for (const waiter of this.takeWaiters()) waiter.reject(cause)
		this.handlers.onFailure?.(cause)
	}

	isComplete(): boolean {
		return this.outcome.status !== 'pending'
	}

	get status(): CompletionOutcome<T>['status'] {
		return this.outcome.status
	}

	/** The failure cause, once failed */
	get error(): Error | undefined {
		return this.outcome.status === 'failed' ? this.outcome.cause : undefined
	}

	getOutcome(): CompletionOutcome<T> {
		return this.outcome
	}

	result(): Promise<T> {
		const outcome = this.outcome
		switch (outcome.status) {
			case 'succeeded': return Promise.resolve(outcome.value)
			case 'failed': return Promise.reject(outcome.cause)
			case 'pending': return new Promise<T>((resolve, reject) => { this.waiters.push({ resolve, reject }) })
		}
	}

	private settle(outcome: CompletionOutcome<T>): void {
		if (this.outcome.status !== 'pending') {
			throw TransactionError.illegalState(`Completion already ${this.outcome.status}`)
		}
		this.outcome = outcome
	}

	private takeWaiters(): Waiter<T>[] {
		const waiters = this.waiters
		this.waiters = []
		return waiters
	}
}
