import {
	Completion,
	ConsumerId,
	PresettlePolicy,
	ProducerId,
	SessionId,
	TransactionContext,
	TransactionError,
	TransactionId,
	createTransactionInfo
} from '@ferry/txn-core'
import type {
	Destination,
	SendAggregationCompletion,
	SessionDescriptor,
	TransactionalConsumer,
	TransactionalProducer
} from '@ferry/txn-core'
import type { Delivery, LoopbackCoordinator } from './loopback-coordinator.js'
import { createLogger } from './logger.js'

const log = createLogger('session')

export type TransactedSessionOptions = {
	sessionId?: SessionId
	presettlePolicy?: PresettlePolicy
}

export class SessionProducer implements TransactionalProducer {
	constructor(
		private readonly session: TransactedSession,
		readonly producerId: ProducerId,
		readonly destination: Destination | undefined
	) {}

	/** Sends `body`; an anonymous producer names the destination per send */
	send(body: string, destination: Destination | undefined = this.destination): Completion {
		if (!destination) {
			const completion = new Completion()
			completion.onFailure(TransactionError.illegalState(`Producer ${this.producerId.toString()} has no destination`))
			return completion
		}
		return this.session.send(this, destination, body)
	}
}

/**
 * Buffers received deliveries and acknowledges them as part of the
 * transaction when it commits; on rollback they go back to the queue.
 */
export class SessionConsumer implements TransactionalConsumer {
	private pending: Delivery[] = []
	private acknowledged: Delivery[] = []
	private consumed = 0

	constructor(
		private readonly context: TransactionContext,
		private readonly remote: LoopbackCoordinator,
		readonly consumerId: ConsumerId,
		readonly destination: Destination
	) {}

	receive(): string | undefined {
		if (this.context.getState() !== 'active' || this.context.isTransactionFailed()) {
			throw TransactionError.illegalState(`Consumer ${this.consumerId.toString()} cannot receive outside an active transaction`)
		}
		const delivery = this.remote.fetch(this.destination.name)
		if (!delivery) return undefined
		this.context.registerTxConsumer(this)
		this.pending.push(delivery)
		return delivery.body
	}

	/** Deliveries consumed by committed transactions */
	getConsumed(): number {
		return this.consumed
	}

	preCommit(): void {
		const state = this.context.getTxnAcceptState()
		for (const delivery of this.pending) {
			if (state) this.remote.acknowledge(delivery.tag, state)
			else this.remote.release(delivery.tag)
		}
		if (state) this.acknowledged.push(...this.pending)
		this.pending = []
	}

	postCommit(): void {
		this.consumed += this.acknowledged.length
		this.acknowledged = []
	}

	preRollback(): void {
		for (const delivery of this.pending) {
			this.remote.release(delivery.tag)
		}
		this.pending = []
	}

	postRollback(): void {
		// the coordinator has already returned acknowledged deliveries to their queue
		this.acknowledged = []
	}
}

/**
 * A transacted session: always inside a transaction, beginning the next one
 * as soon as the previous commit or rollback completes.
 *
 * Commit and rollback wait for the session's outstanding sends; a send that
 * failed turns the commit into a rollback.
 */
export class TransactedSession implements SessionDescriptor {
	readonly sessionId: SessionId
	readonly context: TransactionContext
	private readonly policy: PresettlePolicy
	private sequence = 0
	private current: TransactionId | undefined
	private beginning: Completion | undefined
	private pendingSends = 0
	private sendFailure: Error | undefined
	private discharging = false
	private aggregate: SendAggregationCompletion | undefined
	private nextProducer = 1
	private nextConsumer = 1

	constructor(
		private readonly remote: LoopbackCoordinator,
		options: TransactedSessionOptions = {}
	) {
		this.sessionId = options.sessionId ?? new SessionId('loopback', 1)
		this.policy = options.presettlePolicy ?? new PresettlePolicy()
		this.context = new TransactionContext(this.sessionId, remote)
	}

	/** Begins the first transaction, or retries after a failed begin */
	start(): Completion {
		if (this.current || this.beginning?.isComplete() === false) {
			const request = new Completion()
			request.onFailure(TransactionError.illegalState(`Session ${this.sessionId.toString()} already started`))
			return request
		}
		return this.beginNext()
	}

	/** The begin of the current (or upcoming) transaction */
	get ready(): Completion | undefined {
		return this.beginning
	}

	isTransacted(): boolean {
		return true
	}

	getTransactionId(): TransactionId | undefined {
		return this.current
	}

	createProducer(destination?: Destination): SessionProducer {
		return new SessionProducer(this, new ProducerId(this.sessionId, this.nextProducer++), destination)
	}

	createConsumer(destination: Destination): SessionConsumer {
		return new SessionConsumer(this.context, this.remote, new ConsumerId(this.sessionId, this.nextConsumer++), destination)
	}

	send(producer: SessionProducer, destination: Destination, body: string): Completion {
		const completion = new Completion()
		if (this.discharging) {
			completion.onFailure(TransactionError.illegalState('Send attempted while the transaction is completing'))
			return completion
		}
		if (this.context.isTransactionFailed()) {
			completion.onFailure(TransactionError.rolledBack('Transaction in doubt; send discarded'))
			return completion
		}
		const state = this.context.getTxnEnrolledState()
		if (!state) {
			completion.onFailure(TransactionError.illegalState('Send attempted with no active transaction'))
			return completion
		}

		this.context.registerTxProducer(producer)
		if (this.policy.isProducerPresettled(destination, this)) {
			this.remote.transfer(destination.name, body, state)
			completion.onSuccess()
			return completion
		}

		this.pendingSends++
		this.remote.transfer(destination.name, body, state, new Completion({
			onSuccess: () => {
				this.sendSettled(undefined)
				completion.onSuccess()
			},
			onFailure: cause => {
				this.sendSettled(cause)
				completion.onFailure(cause)
			}
		}))
		return completion
	}

	commit(): Completion {
		return this.complete(true)
	}

	rollback(): Completion {
		return this.complete(false)
	}

	private complete(commit: boolean): Completion {
		const request = new Completion()
		const txId = this.current
		if (!txId || this.discharging) {
			request.onFailure(TransactionError.illegalState(
				`${commit ? 'Commit' : 'Rollback'} called ${this.discharging ? 'while the transaction is completing' : 'with no active transaction'}`))
			return request
		}

		this.discharging = true
		const failure = this.sendFailure
		const info = createTransactionInfo(txId, this.context.isTransactionFailed())
		const outcome = new Completion({
			onSuccess: () => this.finish(() => request.onSuccess()),
			onFailure: cause => this.finish(() => request.onFailure(cause))
		})
		log('%s %s %s with %d sends outstanding', this.sessionId.toString(), commit ? 'committing' : 'rolling back', txId.toString(), this.pendingSends)

		const aggregate = this.context.aggregateSends(info, this.pendingSends + (failure ? 1 : 0), outcome, commit)
		if (this.discharging) this.aggregate = aggregate
		if (failure) aggregate.onFailure(failure)
		return request
	}

	private sendSettled(failure: Error | undefined): void {
		this.pendingSends--
		const aggregate = this.aggregate
		if (aggregate) {
			if (failure) aggregate.onFailure(failure)
			else aggregate.onSuccess()
		} else if (failure) {
			this.sendFailure ??= failure
		}
	}

	private finish(forward: () => void): void {
		this.discharging = false
		this.aggregate = undefined
		this.sendFailure = undefined
		this.current = undefined
		forward()
		this.beginNext()
	}

	private beginNext(): Completion {
		const txId = new TransactionId(this.sessionId, ++this.sequence)
		const begun = new Completion({
			onSuccess: () => { this.current = txId },
			onFailure: cause => log('%s failed to begin %s - %o', this.sessionId.toString(), txId.toString(), cause)
		})
		this.beginning = begun
		this.context.begin(txId, begun)
		return begun
	}
}
