import debug from 'debug'

const BASE_NAMESPACE = 'ferry:test-peer'

export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`)
}
