import { isTransactionError } from '@ferry/txn-core'
import type { Destination } from '@ferry/txn-core'
import { ProtocolLoop } from './protocol-loop.js'
import { LoopbackCoordinator } from './loopback-coordinator.js'
import { TransactedSession } from './transacted-session.js'

export type ScenarioOptions = {
	address: string
	sends: number
	/** Zero-based index of a send the remote rejects */
	failSend?: number
	/** Close the coordinator link after sending, before completing */
	dropLink?: boolean
	rejectDischarge?: boolean
	rollback?: boolean
}

export type ScenarioReport = {
	outcome: 'committed' | 'rolled-back' | 'failed'
	error?: { kind: string, message: string }
	/** Messages visible on the queue afterwards */
	published: string[]
	/** Fail flag of every discharge the coordinator received */
	discharges: boolean[]
	/** Transaction the session moved on to, if its begin completed */
	nextTransaction?: string
}

/** Runs one transaction through a transacted session against a loopback coordinator */
export function runScenario(options: ScenarioOptions): ScenarioReport {
	const loop = new ProtocolLoop()
	const remote = new LoopbackCoordinator(loop)
	const session = new TransactedSession(remote)
	const destination: Destination = { name: options.address, kind: 'queue' }

	const started = session.start()
	loop.drain()
	if (started.error) {
		return { outcome: 'failed', error: describe(started.error), published: [], discharges: [] }
	}

	const producer = session.createProducer(destination)
	for (let i = 0; i < options.sends; i++) {
		if (i === options.failSend) remote.failTransfer(i)
		producer.send(`message-${i + 1}`)
	}
	if (options.dropLink) {
		remote.closeLinks({ condition: 'amqp:connection:forced' })
		loop.drain()
	}
	if (options.rejectDischarge) remote.rejectNextDischarge()

	const completed = options.rollback ? session.rollback() : session.commit()
	loop.drain()

	const discharges: boolean[] = []
	for (const request of remote.requests) {
		if (request.type === 'discharge') discharges.push(request.fail)
	}
	const report: ScenarioReport = {
		outcome: 'committed',
		published: remote.queued(options.address),
		discharges,
		nextTransaction: session.getTransactionId()?.toString()
	}

	if (completed.error) {
		report.outcome = isTransactionError(completed.error, 'rolled-back') ? 'rolled-back' : 'failed'
		report.error = describe(completed.error)
	} else if (options.rollback) {
		report.outcome = 'rolled-back'
	}
	return report
}

function describe(error: Error): { kind: string, message: string } {
	return { kind: isTransactionError(error) ? error.kind : error.name, message: error.message }
}
