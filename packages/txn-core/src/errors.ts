export type TransactionErrorKind = 'illegal-state' | 'rolled-back' | 'protocol'

/**
 * Failure reported through a completion token.
 *
 * The `kind` tag separates caller bugs (`illegal-state`), definitive rollbacks
 * (`rolled-back`) and failures reported by the remote coordinator or the link
 * (`protocol`), so callers branch on the tag rather than on subclasses.
 */
export class TransactionError extends Error {
	constructor(
		readonly kind: TransactionErrorKind,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = 'TransactionError'
	}

	static illegalState(message: string): TransactionError {
		return new TransactionError('illegal-state', message)
	}

	static rolledBack(message: string, cause?: unknown): TransactionError {
		return new TransactionError('rolled-back', message, cause === undefined ? undefined : { cause })
	}

	static protocol(message: string, cause?: unknown): TransactionError {
		return new TransactionError('protocol', message, cause === undefined ? undefined : { cause })
	}
}

export function isTransactionError(error: unknown, kind?: TransactionErrorKind): error is TransactionError {
	return error instanceof TransactionError && (kind === undefined || error.kind === kind)
}

/** Normalizes a thrown value so it can travel through a completion's failure channel */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value))
}
