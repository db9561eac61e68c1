export type ErrorCondition = {
	condition: string
	description?: string
}

export type Accepted = { type: 'accepted' }
export type Rejected = { type: 'rejected', error?: ErrorCondition }

/** Terminal delivery outcomes this layer produces or inspects */
export type Outcome = Accepted | Rejected

export const ACCEPTED: Readonly<Accepted> = Object.freeze({ type: 'accepted' })

/**
 * Delivery state tagging a transfer or disposition as part of a transaction.
 * With an outcome it acknowledges a delivery; without one it enrols an outgoing send.
 */
export type TransactionalState = {
	readonly type: 'transactional-state'
	readonly txnId: Uint8Array
	readonly outcome?: Outcome
}

export function createAcceptedState(txnId: Uint8Array): TransactionalState {
	return Object.freeze({ type: 'transactional-state', txnId, outcome: ACCEPTED })
}

export function createEnrolledState(txnId: Uint8Array): TransactionalState {
	return Object.freeze({ type: 'transactional-state', txnId })
}

export function describeCondition(error: ErrorCondition | undefined): string {
	if (!error) return 'no error condition'
	return error.description ? `${error.condition}: ${error.description}` : error.condition
}
