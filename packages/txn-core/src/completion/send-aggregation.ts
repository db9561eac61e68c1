import type { CompletionToken } from './completion.js'
import { TransactionError } from '../errors.js'

/** Invoked once, after the last outstanding send resolves */
export type DischargeDecision = (commit: boolean, firstFailure: Error | undefined) => void

/**
 * Folds the acknowledgments of N outstanding transactional sends into a single
 * commit-or-rollback decision.
 *
 * Each send resolves this token exactly once. Any failure flips the intent to
 * rollback; the decision is handed off when the last resolution arrives, so a
 * transaction commits only if every enrolled send was acknowledged.
 */
export class SendAggregationCompletion implements CompletionToken {
	private pending: number
	private commit: boolean
	private firstFailure: Error | undefined

	constructor(
		pendingSends: number,
		commit: boolean,
		private readonly decide: DischargeDecision
	) {
		if (!Number.isInteger(pendingSends) || pendingSends < 0) {
			throw new RangeError(`pendingSends must be a non-negative integer, got ${pendingSends}`)
		}
		this.pending = pendingSends
		this.commit = commit
	}

	onSuccess(): void {
		this.resolveOne()
	}

	onFailure(cause: Error): void {
		this.commit = false
		this.firstFailure ??= cause
		this.resolveOne()
	}

	isComplete(): boolean {
		return this.pending === 0
	}

	/** Current intent; false once any send has failed */
	isCommitIntended(): boolean {
		return this.commit
	}

	getPending(): number {
		return this.pending
	}

	private resolveOne(): void {
		if (this.pending === 0) {
			throw TransactionError.illegalState('All aggregated sends have already resolved')
		}
		if (--this.pending === 0) {
			this.decide(this.commit, this.firstFailure)
		}
	}
}
