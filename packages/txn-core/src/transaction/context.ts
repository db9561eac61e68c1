import { Completion, type CompletionToken } from '../completion/completion.js'
import { SendAggregationCompletion } from '../completion/send-aggregation.js'
import { CoordinatorLink } from '../coordinator/coordinator-link.js'
import type { CoordinatorEndpoint } from '../coordinator/struct.js'
import { createTransactionInfo, type ConsumerId, type ProducerId, type SessionId, type TransactionId, type TransactionInfo } from '../meta/ids.js'
import { createAcceptedState, createEnrolledState, type TransactionalState } from '../meta/transactional-state.js'
import { TransactionError, toError } from '../errors.js'
import { createLogger, formatTxnId } from '../logger.js'
import { EnrollmentRegistry, type TransactionalConsumer, type TransactionalProducer } from './registry.js'

const log = createLogger('context')

/**
 * Explicit lifecycle of the context. The failed (in-doubt) condition is not a
 * state of its own: it is an `active` or `discharging` transaction whose
 * coordinator link has closed.
 */
export type TransactionState = 'idle' | 'declaring' | 'active' | 'discharging'

type Operation = 'Commit' | 'Rollback'

type ConsumerHook = 'preCommit' | 'postCommit' | 'preRollback' | 'postRollback'

/**
 * Drives transaction control for one session against the remote coordinator.
 *
 * A transaction id is bound while a declared transaction is open and cleared
 * when its discharge completes, whatever the outcome. The coordinator link is
 * built lazily on the first begin, and rebuilt by a later begin once closed.
 *
 * Usage:
 *   const context = new TransactionContext(sessionId, endpoint);
 *   context.begin(txId, new Completion({ onSuccess: () => ... }));
 *   context.registerTxProducer(producer);
 *   context.commit(createTransactionInfo(txId), completion);
 */
export class TransactionContext {
	private readonly registry = new EnrollmentRegistry()
	private state: TransactionState = 'idle'
	private current: TransactionId | undefined
	private cachedAcceptedState: TransactionalState | undefined
	private cachedEnrolledState: TransactionalState | undefined
	private coordinator: CoordinatorLink | undefined
	private linkSequence = 0

	constructor(
		readonly sessionId: SessionId,
		private readonly endpoint: CoordinatorEndpoint
	) {}

	begin(txId: TransactionId, request: CompletionToken): void {
		if (this.state !== 'idle') {
			request.onFailure(TransactionError.illegalState(`Begin called while a transaction is still ${this.state}`))
			return
		}
		this.state = 'declaring'

		const declared = new Completion({
			onSuccess: () => {
				const txnId = txId.providerHint
				if (!txnId) {
					this.reset()
					request.onFailure(TransactionError.protocol(`Coordinator declared ${txId.toString()} without a transaction id`))
					return
				}
				this.bind(txId, txnId)
				request.onSuccess()
			},
			onFailure: cause => {
				this.reset()
				request.onFailure(cause)
			}
		})

		const coordinator = this.coordinator
		if (coordinator && !coordinator.isClosed()) {
			coordinator.declare(txId, declared)
			return
		}

		const link = new CoordinatorLink(this.endpoint, `${this.sessionId.toString()}:coordinator:${++this.linkSequence}`)
		log('%s building coordinator link %s', this.toString(), link.name)
		link.open(new Completion<CoordinatorLink>({
			onSuccess: opened => {
				this.coordinator = opened
				opened.declare(txId, declared)
			},
			onFailure: cause => {
				this.reset()
				request.onFailure(cause)
			}
		}))
	}

	commit(transactionInfo: TransactionInfo, request: CompletionToken): void {
		if (!this.verifyCurrent(transactionInfo, 'Commit', request)) return

		if (this.isTransactionFailed()) {
			if (!transactionInfo.inDoubt) {
				request.onFailure(TransactionError.illegalState(
					`Commit of ${transactionInfo.id.toString()} requested while its coordinator link is closed; the transaction is in doubt`))
				return
			}
			this.abandon()
			request.onFailure(TransactionError.rolledBack('Transaction in doubt and cannot be committed'))
			return
		}

		this.discharge(true, request)
	}

	rollback(transactionInfo: TransactionInfo, request: CompletionToken): void {
		if (!this.verifyCurrent(transactionInfo, 'Rollback', request)) return

		if (this.isTransactionFailed()) {
			this.abandon()
			request.onSuccess()
			return
		}

		this.discharge(false, request)
	}

	/**
	 * Discharges once `pendingSends` outstanding transactional sends resolve the
	 * returned token. A single failed send turns a commit into a rollback,
	 * reported to `request` as a rolled-back error. A coordinator link that closed
	 * while sends were outstanding resolves the transaction as in doubt.
	 */
	aggregateSends(
		transactionInfo: TransactionInfo,
		pendingSends: number,
		request: CompletionToken,
		commit = true
	): SendAggregationCompletion {
		const aggregate = new SendAggregationCompletion(pendingSends, commit, (decision, firstFailure) => {
			const info = this.isTransactionFailed() && !transactionInfo.inDoubt
				? createTransactionInfo(transactionInfo.id, true)
				: transactionInfo
			if (decision) {
				this.commit(info, request)
			} else if (commit) {
				log('%s send failed, rolling back %s', this.toString(), transactionInfo.id.toString())
				this.rollback(info, new Completion({
					onSuccess: () => request.onFailure(TransactionError.rolledBack('Transaction rolled back: a transactional send failed', firstFailure)),
					onFailure: cause => request.onFailure(cause)
				}))
			} else {
				this.rollback(info, request)
			}
		})
		if (pendingSends === 0) {
			if (commit) this.commit(transactionInfo, request)
			else this.rollback(transactionInfo, request)
		}
		return aggregate
	}

	// ----- enrolment

	registerTxConsumer(consumer: TransactionalConsumer): void {
		this.registry.registerConsumer(consumer)
	}

	registerTxProducer(producer: TransactionalProducer): void {
		this.registry.registerProducer(producer)
	}

	isInTransaction(id: ConsumerId | ProducerId): boolean {
		return this.registry.has(id)
	}

	// ----- state queries

	getState(): TransactionState {
		return this.state
	}

	getTransactionId(): TransactionId | undefined {
		return this.current
	}

	/** Protocol-level id of the bound transaction */
	getProtocolTransactionId(): Uint8Array | undefined {
		return this.current?.providerHint
	}

	/** Accepted outcome tagged with the transaction, for acknowledging deliveries */
	getTxnAcceptState(): TransactionalState | undefined {
		return this.cachedAcceptedState
	}

	/** State tag marking outgoing transfers as part of the transaction */
	getTxnEnrolledState(): TransactionalState | undefined {
		return this.cachedEnrolledState
	}

	/** True once a coordinator link has existed and closed; the bound transaction is then in doubt */
	isTransactionFailed(): boolean {
		return this.coordinator ? this.coordinator.isClosed() : false
	}

	getCoordinator(): CoordinatorLink | undefined {
		return this.coordinator
	}

	toString(): string {
		return `${this.sessionId.toString()}: txContext`
	}

	// ----- internals

	/** Returns false, having failed `request`, unless the info names the bound transaction */
	private verifyCurrent(transactionInfo: TransactionInfo, operation: Operation, request: CompletionToken): boolean {
		if (!transactionInfo.id.equals(this.current)) {
			if (!transactionInfo.inDoubt && !this.current) {
				request.onFailure(TransactionError.illegalState(`${operation} called with no active transaction`))
			} else if (!transactionInfo.inDoubt) {
				request.onFailure(TransactionError.illegalState(`Attempt to ${operation.toLowerCase()} a transaction other than the current one`))
			} else if (operation === 'Commit') {
				request.onFailure(TransactionError.rolledBack('Transaction in doubt and cannot be committed'))
			} else {
				request.onSuccess()
			}
			return false
		}

		if (this.state === 'discharging') {
			request.onFailure(TransactionError.illegalState(`${operation} called while ${transactionInfo.id.toString()} is already being discharged`))
			return false
		}
		return true
	}

	private discharge(commit: boolean, request: CompletionToken): void {
		const txId = this.current
		const coordinator = this.coordinator
		if (!txId || !coordinator) {
			request.onFailure(TransactionError.illegalState('Discharge requested with no bound transaction'))
			return
		}

		if (!commit) {
			this.runHooks('preRollback')
			this.sendDischarge(txId, coordinator, false, request)
			return
		}

		const prepareFailure = this.runHooks('preCommit')
		if (!prepareFailure) {
			this.sendDischarge(txId, coordinator, true, request)
			return
		}

		log('%s consumer failed to prepare TX[%s], rolling back', this.toString(), txId.toString())
		this.runHooks('preRollback')
		this.sendDischarge(txId, coordinator, false, new Completion({
			onSuccess: () => request.onFailure(TransactionError.rolledBack('Transaction rolled back: a consumer failed to prepare for commit', prepareFailure)),
			onFailure: cause => request.onFailure(cause)
		}))
	}

	private sendDischarge(txId: TransactionId, coordinator: CoordinatorLink, commit: boolean, request: CompletionToken): void {
		this.state = 'discharging'
		log('%s %s current TX[%s]', this.toString(), commit ? 'committing' : 'rolling back', txId.toString())
		coordinator.discharge(txId, new Completion({
			onSuccess: () => {
				this.completeDischarge(commit)
				request.onSuccess()
			},
			onFailure: cause => {
				this.completeDischarge(commit)
				request.onFailure(cause)
			}
		}), commit)
	}

	/** Resolves an in-doubt transaction locally; the remote state is already gone */
	private abandon(): void {
		log('%s abandoning in-doubt TX[%s]', this.toString(), this.current?.toString())
		this.runHooks('preRollback')
		this.completeDischarge(false)
	}

	private completeDischarge(commit: boolean): void {
		this.reset()
		this.runHooks(commit ? 'postCommit' : 'postRollback')
		this.registry.clear()
	}

	/**
	 * Runs `hook` on every enrolled consumer. A consumer that throws does not
	 * stop the others; the first failure is returned.
	 */
	private runHooks(hook: ConsumerHook): Error | undefined {
		let failure: Error | undefined
		for (const consumer of this.registry.enrolledConsumers()) {
			try {
				consumer[hook]()
			} catch (err) {
				log('%s %s of %s failed - %o', this.toString(), hook, consumer.consumerId.toString(), err)
				failure ??= toError(err)
			}
		}
		return failure
	}

	private bind(txId: TransactionId, txnId: Uint8Array): void {
		this.current = txId
		this.cachedAcceptedState = createAcceptedState(txnId)
		this.cachedEnrolledState = createEnrolledState(txnId)
		this.state = 'active'
		log('%s began TX[%s] as txn %s', this.toString(), txId.toString(), formatTxnId(txnId))
	}

	private reset(): void {
		this.current = undefined
		this.cachedAcceptedState = undefined
		this.cachedEnrolledState = undefined
		this.state = 'idle'
	}
}
