import type { CompletionToken } from '../completion/completion.js'
import type { TransactionId } from '../meta/ids.js'
import { describeCondition, type ErrorCondition } from '../meta/transactional-state.js'
import { TransactionError, toError } from '../errors.js'
import { createLogger, formatTxnId } from '../logger.js'
import type {
	CoordinatorEndpoint,
	CoordinatorLinkEvents,
	CoordinatorLinkState,
	CoordinatorOutcome,
	CoordinatorRequest,
	CoordinatorSender
} from './struct.js'

const log = createLogger('coordinator')

type PendingExchange =
	| { kind: 'declare', txId: TransactionId, request: CompletionToken }
	| { kind: 'discharge', txId: TransactionId, request: CompletionToken, commit: boolean }

/**
 * Link to the remote transaction coordinator.
 *
 * Declare and discharge are transmitted as deliveries and answered by their
 * settlement. Closure can arrive at any time; it fails whatever is outstanding
 * and is otherwise only observable through `isClosed()`.
 */
export class CoordinatorLink implements CoordinatorLinkEvents {
	private state: CoordinatorLinkState = 'building'
	private sender: CoordinatorSender | undefined
	private opening: CompletionToken<CoordinatorLink> | undefined
	private nextDeliveryId = 0
	private readonly pending = new Map<number, PendingExchange>()
	private remoteError: ErrorCondition | undefined

	constructor(
		private readonly endpoint: CoordinatorEndpoint,
		readonly name: string
	) {}

	/** Attaches the link; `request` receives this link once the remote opens it */
	open(request: CompletionToken<CoordinatorLink>): void {
		if (this.sender || this.state !== 'building') {
			request.onFailure(TransactionError.illegalState(`Coordinator link ${this.name} has already been attached`))
			return
		}
		this.opening = request
		try {
			this.sender = this.endpoint.attach(this.name, this)
		} catch (err) {
			this.opening = undefined
			this.state = 'closed'
			request.onFailure(TransactionError.protocol(`Failed to attach coordinator link ${this.name}`, toError(err)))
		}
	}

	declare(txId: TransactionId, request: CompletionToken): void {
		log('link[%s] declaring %s', this.name, txId.toString())
		this.transmit({ type: 'declare' }, { kind: 'declare', txId, request })
	}

	discharge(txId: TransactionId, request: CompletionToken, commit: boolean): void {
		const txnId = txId.providerHint
		if (!txnId) {
			request.onFailure(TransactionError.illegalState(`Transaction ${txId.toString()} has not been declared`))
			return
		}
		log('link[%s] discharging %s (txn %s, %s)', this.name, txId.toString(), formatTxnId(txnId), commit ? 'commit' : 'rollback')
		this.transmit({ type: 'discharge', txnId, fail: !commit }, { kind: 'discharge', txId, request, commit })
	}

	isClosed(): boolean {
		return this.state === 'closed'
	}

	getState(): CoordinatorLinkState {
		return this.state
	}

	/** Error condition the remote closed the link with, if any */
	getRemoteError(): ErrorCondition | undefined {
		return this.remoteError
	}

	/** Closes the link locally, failing anything outstanding */
	close(): void {
		if (this.state === 'closed') return
		this.sender?.detach()
		this.closed(TransactionError.protocol(`Coordinator link ${this.name} closed locally`))
	}

	// ----- CoordinatorLinkEvents

	onOpen(): void {
		if (this.state !== 'building') {
			log('link[%s] ignoring open while %s', this.name, this.state)
			return
		}
		this.state = 'open'
		log('link[%s] opened', this.name)
		const opening = this.opening
		this.opening = undefined
		opening?.onSuccess(this)
	}

	onClose(error?: ErrorCondition): void {
		if (this.state === 'closed') return
		this.remoteError = error
		this.closed(TransactionError.protocol(`Coordinator link ${this.name} closed by remote (${describeCondition(error)})`))
	}

	onSettled(deliveryId: number, outcome: CoordinatorOutcome): void {
		const exchange = this.pending.get(deliveryId)
		if (!exchange) {
			log('link[%s] settlement for unknown delivery %d', this.name, deliveryId)
			return
		}
		this.pending.delete(deliveryId)

		if (exchange.kind === 'declare') {
			this.declared(exchange.txId, exchange.request, outcome)
		} else {
			this.discharged(exchange.txId, exchange.request, exchange.commit, outcome)
		}
	}

	// ----- internals

	private transmit(request: CoordinatorRequest, exchange: PendingExchange): void {
		if (this.state !== 'open' || !this.sender) {
			exchange.request.onFailure(TransactionError.protocol(`Coordinator link ${this.name} is ${this.state}`))
			return
		}
		const deliveryId = this.nextDeliveryId++
		this.pending.set(deliveryId, exchange)
		try {
			this.sender.send(deliveryId, request)
		} catch (err) {
			this.pending.delete(deliveryId)
			exchange.request.onFailure(TransactionError.protocol(`Failed to send ${request.type} on ${this.name}`, toError(err)))
		}
	}

	private declared(txId: TransactionId, request: CompletionToken, outcome: CoordinatorOutcome): void {
		switch (outcome.type) {
			case 'declared':
				txId.providerHint = outcome.txnId
				log('link[%s] declared %s as txn %s', this.name, txId.toString(), formatTxnId(outcome.txnId))
				request.onSuccess()
				break
			case 'rejected':
				request.onFailure(TransactionError.protocol(`Declare of ${txId.toString()} rejected (${describeCondition(outcome.error)})`))
				break
			default:
				request.onFailure(TransactionError.protocol(`Unexpected '${outcome.type}' outcome for declare of ${txId.toString()}`))
		}
	}

	private discharged(txId: TransactionId, request: CompletionToken, commit: boolean, outcome: CoordinatorOutcome): void {
		switch (outcome.type) {
			case 'accepted':
				request.onSuccess()
				break
			case 'rejected': {
				const reason = describeCondition(outcome.error)
				request.onFailure(commit
					? TransactionError.rolledBack(`Commit of ${txId.toString()} rejected, transaction rolled back (${reason})`)
					: TransactionError.protocol(`Rollback of ${txId.toString()} rejected (${reason})`))
				break
			}
			default:
				request.onFailure(TransactionError.protocol(`Unexpected '${outcome.type}' outcome for discharge of ${txId.toString()}`))
		}
	}

	private closed(cause: TransactionError): void {
		this.state = 'closed'
		log('link[%s] closed with %d outstanding - %s', this.name, this.pending.size, cause.message)

		const opening = this.opening
		this.opening = undefined
		opening?.onFailure(cause)

		const outstanding = [...this.pending.values()]
		this.pending.clear()
		for (const exchange of outstanding) {
			exchange.request.onFailure(cause)
		}
	}
}
