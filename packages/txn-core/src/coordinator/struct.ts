import type { ErrorCondition } from '../meta/transactional-state.js'

export type DeclareRequest = { type: 'declare' }
export type DischargeRequest = { type: 'discharge', txnId: Uint8Array, fail: boolean }

/** Bodies sent on the coordinator link */
export type CoordinatorRequest = DeclareRequest | DischargeRequest

export type DeclaredOutcome = { type: 'declared', txnId: Uint8Array }
export type AcceptedOutcome = { type: 'accepted' }
export type RejectedOutcome = { type: 'rejected', error?: ErrorCondition }

/** Remote settlement of a coordinator request */
export type CoordinatorOutcome = DeclaredOutcome | AcceptedOutcome | RejectedOutcome

export type CoordinatorLinkState = 'building' | 'open' | 'closed'

/**
 * Link lifecycle and settlement events, raised by the session machinery on
 * the protocol thread.
 */
export interface CoordinatorLinkEvents {
	onOpen(): void
	onClose(error?: ErrorCondition): void
	onSettled(deliveryId: number, outcome: CoordinatorOutcome): void
}

/** Sender half of an attached coordinator link */
export interface CoordinatorSender {
	send(deliveryId: number, request: CoordinatorRequest): void
	detach(): void
}

/**
 * The session-side machinery able to attach a link to the remote
 * transaction coordinator. Encoding and framing live behind it.
 *
 * Events for the attached link are raised later on the protocol loop,
 * never from within `attach` itself.
 */
export interface CoordinatorEndpoint {
	attach(name: string, events: CoordinatorLinkEvents): CoordinatorSender
}
