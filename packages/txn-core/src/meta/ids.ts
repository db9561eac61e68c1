export class SessionId {
	constructor(
		readonly connectionId: string,
		readonly value: number
	) {}

	equals(other: SessionId | undefined): boolean {
		return other !== undefined && other.connectionId === this.connectionId && other.value === this.value
	}

	toString(): string {
		return `${this.connectionId}:${this.value}`
	}
}

export class ConsumerId {
	readonly kind = 'consumer' as const

	constructor(
		readonly sessionId: SessionId,
		readonly value: number
	) {}

	toString(): string {
		return `${this.sessionId.toString()}:c${this.value}`
	}
}

export class ProducerId {
	readonly kind = 'producer' as const

	constructor(
		readonly sessionId: SessionId,
		readonly value: number
	) {}

	toString(): string {
		return `${this.sessionId.toString()}:p${this.value}`
	}
}

/**
 * Client-side name of a transaction.
 *
 * Before declare completes it is only a request; the coordinator link binds
 * the protocol-level id (the provider hint) when the remote declares it.
 */
export class TransactionId {
	private hint: Uint8Array | undefined

	constructor(
		readonly sessionId: SessionId,
		readonly sequence: number
	) {}

	get providerHint(): Uint8Array | undefined {
		return this.hint
	}

	set providerHint(txnId: Uint8Array | undefined) {
		this.hint = txnId
	}

	equals(other: TransactionId | undefined): boolean {
		return other !== undefined && other.sequence === this.sequence && other.sessionId.equals(this.sessionId)
	}

	toString(): string {
		return `${this.sessionId.toString()}:t${this.sequence}`
	}
}

/** What callers hand to commit and rollback */
export interface TransactionInfo {
	readonly sessionId: SessionId
	readonly id: TransactionId
	/** Set when the caller already observed the coordinator link failing */
	inDoubt: boolean
}

export function createTransactionInfo(id: TransactionId, inDoubt = false): TransactionInfo {
	return { sessionId: id.sessionId, id, inDoubt }
}
