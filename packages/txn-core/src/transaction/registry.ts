import type { ConsumerId, ProducerId } from '../meta/ids.js'

/** Consumer lifecycle hooks run around a discharge */
export interface TransactionalConsumer {
	readonly consumerId: ConsumerId
	preCommit(): void
	postCommit(): void
	preRollback(): void
	postRollback(): void
}

/** Producers only enrol; their outcome is decided by the send aggregation */
export interface TransactionalProducer {
	readonly producerId: ProducerId
}

/**
 * Consumers and producers that took part in the current transaction.
 * Owned and mutated by the transaction context alone.
 */
export class EnrollmentRegistry {
	private readonly consumers = new Map<string, TransactionalConsumer>()
	private readonly producers = new Map<string, TransactionalProducer>()

	registerConsumer(consumer: TransactionalConsumer): void {
		this.consumers.set(consumer.consumerId.toString(), consumer)
	}

	registerProducer(producer: TransactionalProducer): void {
		this.producers.set(producer.producerId.toString(), producer)
	}

	has(id: ConsumerId | ProducerId): boolean {
		return id.kind === 'consumer'
			? this.consumers.has(id.toString())
			: this.producers.has(id.toString())
	}

	enrolledConsumers(): TransactionalConsumer[] {
		return [...this.consumers.values()]
	}

	enrolledProducers(): TransactionalProducer[] {
		return [...this.producers.values()]
	}

	isEmpty(): boolean {
		return this.consumers.size === 0 && this.producers.size === 0
	}

	clear(): void {
		this.consumers.clear()
		this.producers.clear()
	}
}
