import { toString as uint8ArrayToString } from 'uint8arrays/to-string'
import { TransactionError } from '@ferry/txn-core'
import type {
	CompletionToken,
	CoordinatorEndpoint,
	CoordinatorLinkEvents,
	CoordinatorOutcome,
	CoordinatorRequest,
	CoordinatorSender,
	DischargeRequest,
	ErrorCondition,
	TransactionalState
} from '@ferry/txn-core'
import type { ProtocolLoop } from './protocol-loop.js'
import { createLogger } from './logger.js'

const log = createLogger('coordinator')

export type Delivery = {
	readonly tag: number
	readonly address: string
	readonly body: string
}

type TxnRecord = {
	txnId: Uint8Array
	link: LoopbackLink
	/** Transfers published on commit */
	staged: Delivery[]
	/** Deliveries consumed on commit, returned to their queue on rollback */
	acknowledged: Delivery[]
}

export type LoopbackCoordinatorOptions = {
	/** Answer every attach by closing the link */
	refuseAttach?: boolean
}

export class LoopbackLink implements CoordinatorSender {
	private opened = false
	private closed = false

	constructor(
		private readonly coordinator: LoopbackCoordinator,
		readonly name: string,
		readonly events: CoordinatorLinkEvents
	) {}

	send(deliveryId: number, request: CoordinatorRequest): void {
		if (!this.isActive()) {
			throw new Error(`Link ${this.name} is not open`)
		}
		this.coordinator.receive(this, deliveryId, request)
	}

	detach(): void {
		if (this.closed) return
		this.closed = true
		this.coordinator.detached(this)
	}

	remoteOpen(): void {
		if (this.closed) return
		this.opened = true
		this.events.onOpen()
	}

	remoteClose(error?: ErrorCondition): void {
		if (this.closed) return
		this.closed = true
		this.coordinator.detached(this)
		this.events.onClose(error)
	}

	isActive(): boolean {
		return this.opened && !this.closed
	}
}

function hex(txnId: Uint8Array): string {
	return uint8ArrayToString(txnId, 'base16')
}

/**
 * In-process remote: a transaction coordinator and a handful of queues.
 *
 * Every answer is scheduled on the protocol loop, so nothing settles until
 * the loop is drained. Transactions belong to the link that declared them
 * and are rolled back when it goes away.
 */
export class LoopbackCoordinator implements CoordinatorEndpoint {
	readonly requests: CoordinatorRequest[] = []
	private readonly links: LoopbackLink[] = []
	private readonly transactions = new Map<string, TxnRecord>()
	private readonly queues = new Map<string, Delivery[]>()
	private readonly inflight = new Map<number, Delivery>()
	private readonly failingTransfers = new Set<number>()
	private nextTxn = 1
	private nextTag = 1
	private transferCount = 0
	private declareRejections = 0
	private dischargeRejections = 0

	constructor(
		private readonly loop: ProtocolLoop,
		private readonly options: LoopbackCoordinatorOptions = {}
	) {}

	// ----- CoordinatorEndpoint

	attach(name: string, events: CoordinatorLinkEvents): CoordinatorSender {
		const link = new LoopbackLink(this, name, events)
		this.links.push(link)
		if (this.options.refuseAttach) {
			this.loop.schedule(`refuse ${name}`, () => link.remoteClose({ condition: 'amqp:not-allowed', description: 'coordinator unavailable' }))
		} else {
			this.loop.schedule(`open ${name}`, () => link.remoteOpen())
		}
		return link
	}

	receive(link: LoopbackLink, deliveryId: number, request: CoordinatorRequest): void {
		this.requests.push(request)
		this.loop.schedule(`${request.type} ${link.name}#${deliveryId}`, () => {
			if (!link.isActive()) return
			const outcome = request.type === 'declare' ? this.declare(link) : this.discharge(request)
			link.events.onSettled(deliveryId, outcome)
		})
	}

	detached(link: LoopbackLink): void {
		for (const [key, record] of this.transactions) {
			if (record.link === link) {
				log('link %s detached, rolling back txn %s', link.name, key)
				this.transactions.delete(key)
				this.rollbackRecord(record)
			}
		}
	}

	// ----- message traffic

	/** Transfer from a producer; `state` enrols it in a transaction. Presettled sends pass no completion */
	transfer(address: string, body: string, state: TransactionalState | undefined, completion?: CompletionToken): void {
		const index = this.transferCount++
		this.loop.schedule(`transfer ${address}#${index}`, () => {
			if (this.failingTransfers.delete(index)) {
				completion?.onFailure(TransactionError.protocol(`Transfer ${index} to ${address} rejected`))
				return
			}
			const message: Delivery = { tag: this.nextTag++, address, body }
			if (!state) {
				this.queue(address).push(message)
				completion?.onSuccess()
				return
			}
			const record = this.transactions.get(hex(state.txnId))
			if (!record) {
				completion?.onFailure(TransactionError.protocol(`Transfer ${index} names unknown transaction ${hex(state.txnId)}`))
				return
			}
			record.staged.push(message)
			completion?.onSuccess()
		})
	}

	/** Hands the next message on `address` to a consumer */
	fetch(address: string): Delivery | undefined {
		const message = this.queue(address).shift()
		if (message) this.inflight.set(message.tag, message)
		return message
	}

	/** Transactional acknowledgment of a delivery */
	acknowledge(tag: number, state: TransactionalState): void {
		const message = this.takeInflight(tag)
		const record = this.transactions.get(hex(state.txnId))
		if (!record || state.outcome?.type !== 'accepted') {
			log('acknowledgment of %d outside a live transaction, releasing', tag)
			this.queue(message.address).unshift(message)
			return
		}
		record.acknowledged.push(message)
	}

	/** Returns an unacknowledged delivery to the head of its queue */
	release(tag: number): void {
		const message = this.takeInflight(tag)
		this.queue(message.address).unshift(message)
	}

	// ----- fault injection

	rejectNextDeclare(): void {
		this.declareRejections++
	}

	rejectNextDischarge(): void {
		this.dischargeRejections++
	}

	/** Rejects the transfer with this zero-based index */
	failTransfer(index: number): void {
		this.failingTransfers.add(index)
	}

	/** Schedules a remote close of every live coordinator link */
	closeLinks(error?: ErrorCondition): void {
		for (const link of this.links) {
			if (link.isActive()) {
				this.loop.schedule(`close ${link.name}`, () => link.remoteClose(error))
			}
		}
	}

	// ----- inspection

	queued(address: string): string[] {
		return this.queue(address).map(message => message.body)
	}

	activeTransactions(): number {
		return this.transactions.size
	}

	// ----- internals

	private declare(link: LoopbackLink): CoordinatorOutcome {
		if (this.declareRejections > 0) {
			this.declareRejections--
			return { type: 'rejected', error: { condition: 'amqp:resource-limit-exceeded', description: 'declare refused' } }
		}
		const txnId = new Uint8Array(4)
		new DataView(txnId.buffer).setUint32(0, this.nextTxn++)
		this.transactions.set(hex(txnId), { txnId, link, staged: [], acknowledged: [] })
		log('declared txn %s on %s', hex(txnId), link.name)
		return { type: 'declared', txnId }
	}

	private discharge(request: DischargeRequest): CoordinatorOutcome {
		const key = hex(request.txnId)
		const record = this.transactions.get(key)
		if (!record) {
			return { type: 'rejected', error: { condition: 'amqp:transaction:unknown-id', description: key } }
		}
		this.transactions.delete(key)

		if (this.dischargeRejections > 0) {
			this.dischargeRejections--
			this.rollbackRecord(record)
			return { type: 'rejected', error: { condition: 'amqp:transaction:rollback', description: 'discharge refused' } }
		}

		if (request.fail) {
			this.rollbackRecord(record)
		} else {
			for (const message of record.staged) this.queue(message.address).push(message)
			log('committed txn %s: %d published, %d consumed', key, record.staged.length, record.acknowledged.length)
		}
		return { type: 'accepted' }
	}

	private rollbackRecord(record: TxnRecord): void {
		for (const message of [...record.acknowledged].reverse()) {
			this.queue(message.address).unshift(message)
		}
		log('rolled back txn %s: %d dropped, %d returned', hex(record.txnId), record.staged.length, record.acknowledged.length)
	}

	private takeInflight(tag: number): Delivery {
		const message = this.inflight.get(tag)
		if (!message) throw new Error(`Unknown delivery ${tag}`)
		this.inflight.delete(tag)
		return message
	}

	private queue(address: string): Delivery[] {
		let queue = this.queues.get(address)
		if (!queue) {
			queue = []
			this.queues.set(address, queue)
		}
		return queue
	}
}
