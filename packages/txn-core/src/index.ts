export { Completion } from './completion/completion.js'
export type { CompletionToken, CompletionOutcome, CompletionHandlers } from './completion/completion.js'
export { SendAggregationCompletion } from './completion/send-aggregation.js'
export type { DischargeDecision } from './completion/send-aggregation.js'

export { CoordinatorLink } from './coordinator/coordinator-link.js'
export type {
	CoordinatorEndpoint,
	CoordinatorSender,
	CoordinatorLinkEvents,
	CoordinatorLinkState,
	CoordinatorRequest,
	CoordinatorOutcome,
	DeclareRequest,
	DischargeRequest,
	DeclaredOutcome,
	AcceptedOutcome,
	RejectedOutcome
} from './coordinator/struct.js'

export { SessionId, ConsumerId, ProducerId, TransactionId, createTransactionInfo } from './meta/ids.js'
export type { TransactionInfo } from './meta/ids.js'
export { ACCEPTED, createAcceptedState, createEnrolledState, describeCondition } from './meta/transactional-state.js'
export type { TransactionalState, Outcome, Accepted, Rejected, ErrorCondition } from './meta/transactional-state.js'

export { TransactionContext } from './transaction/context.js'
export type { TransactionState } from './transaction/context.js'
export { EnrollmentRegistry } from './transaction/registry.js'
export type { TransactionalConsumer, TransactionalProducer } from './transaction/registry.js'

export { PresettlePolicy, defaultPresettlePolicyOptions } from './policy/presettle-policy.js'
export type { PresettlePolicyOptions, PresettleOptionName, Destination, DestinationKind, SessionDescriptor } from './policy/presettle-policy.js'

export { TransactionError, isTransactionError, toError } from './errors.js'
export type { TransactionErrorKind } from './errors.js'
export { createLogger, formatTxnId } from './logger.js'
