#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander'
import { runScenario } from './scenario.js'

type RunOptions = {
	sends: number
	address: string
	failSend?: number
	dropLink?: boolean
	rejectDischarge?: boolean
	rollback?: boolean
}

function parseCount(value: string): number {
	const parsed = Number(value)
	if (!Number.isInteger(parsed) || parsed < 0) {
		throw new InvalidArgumentError('must be a non-negative integer')
	}
	return parsed
}

const program = new Command()

program
	.name('ferry-test-peer')
	.description('Runs a transacted session against an in-process transaction coordinator')
	.version('0.1.0')

program
	.command('run', { isDefault: true })
	.description('Send messages in one transaction, then commit or roll back')
	.option('-n, --sends <number>', 'Messages to send', parseCount, 3)
	.option('-a, --address <name>', 'Queue to send to', 'orders')
	.option('-f, --fail-send <index>', 'Zero-based index of a send the coordinator rejects', parseCount)
	.option('--drop-link', 'Close the coordinator link before completing the transaction')
	.option('--reject-discharge', 'Have the coordinator reject the discharge')
	.option('--rollback', 'Roll back instead of committing')
	.action((options: RunOptions) => {
		const report = runScenario(options)
		console.log(JSON.stringify(report, null, 2))
		if (report.outcome === 'failed') process.exitCode = 1
	})

program.parse()
