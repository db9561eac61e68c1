import debug from 'debug'
import { toString as uint8ArrayToString } from 'uint8arrays/to-string'

const BASE_NAMESPACE = 'ferry:txn-core'

export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`)
}

/** Renders a protocol-level transaction id for log lines */
export function formatTxnId(txnId: Uint8Array | undefined): string {
	return txnId ? uint8ArrayToString(txnId, 'base16') : '-'
}
