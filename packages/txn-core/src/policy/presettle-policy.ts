export type DestinationKind = 'queue' | 'topic'

export interface Destination {
	readonly name: string
	readonly kind: DestinationKind
	readonly temporary?: boolean
}

/** The part of a session the policy looks at */
export interface SessionDescriptor {
	isTransacted(): boolean
}

export type PresettlePolicyOptions = {
	/** Every producer sends presettled and every consumer asks for presettled deliveries */
	presettleAll: boolean
	presettleProducers: boolean
	presettleTopicProducers: boolean
	presettleQueueProducers: boolean
	/** Producers of a transacted session send presettled */
	presettleTransactedProducers: boolean
	presettleConsumers: boolean
	presettleTopicConsumers: boolean
	presettleQueueConsumers: boolean
}

const OPTION_NAMES = [
	'presettleAll',
	'presettleProducers',
	'presettleTopicProducers',
	'presettleQueueProducers',
	'presettleTransactedProducers',
	'presettleConsumers',
	'presettleTopicConsumers',
	'presettleQueueConsumers'
] as const satisfies readonly (keyof PresettlePolicyOptions)[]

export type PresettleOptionName = typeof OPTION_NAMES[number]

export const defaultPresettlePolicyOptions: Readonly<PresettlePolicyOptions> = Object.freeze({
	presettleAll: false,
	presettleProducers: false,
	presettleTopicProducers: false,
	presettleQueueProducers: false,
	presettleTransactedProducers: false,
	presettleConsumers: false,
	presettleTopicConsumers: false,
	presettleQueueConsumers: false
})

function isPresettleOptionName(name: string): name is PresettleOptionName {
	const names: readonly string[] = OPTION_NAMES
	return names.includes(name)
}

function parseFlag(key: string, value: string): boolean {
	switch (value.trim().toLowerCase()) {
		case 'true': return true
		case 'false': return false
		default: throw new TypeError(`Property ${key} expects true or false, got '${value}'`)
	}
}

/**
 * Decides when producers send presettled and when consumers request
 * presettled deliveries. Stateless apart from its options.
 */
export class PresettlePolicy {
	private readonly options: PresettlePolicyOptions

	constructor(options: Partial<PresettlePolicyOptions> = {}) {
		this.options = { ...defaultPresettlePolicyOptions, ...options }
	}

	copy(): PresettlePolicy {
		return new PresettlePolicy(this.options)
	}

	getOptions(): Readonly<PresettlePolicyOptions> {
		return { ...this.options }
	}

	set(name: PresettleOptionName, value: boolean): void {
		this.options[name] = value
	}

	/**
	 * Applies `prefix`-qualified string properties (as found on a connection URI)
	 * and returns those that name no policy option.
	 */
	applyProperties(properties: Record<string, string>, prefix = 'presettlePolicy.'): Record<string, string> {
		const unused: Record<string, string> = {}
		for (const [key, value] of Object.entries(properties)) {
			const name = key.startsWith(prefix) ? key.slice(prefix.length) : undefined
			if (name !== undefined && isPresettleOptionName(name)) {
				this.options[name] = parseFlag(key, value)
			} else {
				unused[key] = value
			}
		}
		return unused
	}

	/**
	 * Called when a producer is created, and for an anonymous producer on each
	 * send with the destination of that message.
	 */
	isProducerPresettled(destination: Destination | undefined, session: SessionDescriptor): boolean {
		const o = this.options
		if (o.presettleAll || o.presettleProducers) {
			return true
		} else if (session.isTransacted() && o.presettleTransactedProducers) {
			return true
		} else if (destination?.kind === 'queue' && o.presettleQueueProducers) {
			return true
		} else if (destination?.kind === 'topic' && o.presettleTopicProducers) {
			return true
		}
		return false
	}

	/** Transacted sessions never consume presettled */
	isConsumerPresettled(destination: Destination | undefined, session: SessionDescriptor): boolean {
		const o = this.options
		if (session.isTransacted()) {
			return false
		} else if (o.presettleAll || o.presettleConsumers) {
			return true
		} else if (destination?.kind === 'queue' && o.presettleQueueConsumers) {
			return true
		} else if (destination?.kind === 'topic' && o.presettleTopicConsumers) {
			return true
		}
		return false
	}
}
