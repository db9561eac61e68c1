export type ProtocolTask = {
	label: string
	run: () => void
}

/**
 * Single-threaded driving loop. Remote responses and link events are queued
 * here and run one at a time, in order, when the owner drains the loop.
 */
export class ProtocolLoop {
	private tasks: ProtocolTask[] = []
	private executed = 0

	schedule(label: string, run: () => void): void {
		this.tasks.push({ label, run })
	}

	/** Runs the oldest queued task; false when nothing was queued */
	runNext(): boolean {
		const task = this.tasks.shift()
		if (!task) return false
		this.executed++
		task.run()
		return true
	}

	/** Runs tasks, including ones scheduled while draining, until the queue is empty */
	drain(limit = 10_000): number {
		let ran = 0
		while (this.tasks.length > 0) {
			if (ran >= limit) {
				throw new Error(`Protocol loop did not settle within ${limit} tasks (next: ${this.peek() ?? 'none'})`)
			}
			this.runNext()
			ran++
		}
		return ran
	}

	pending(): number {
		return this.tasks.length
	}

	peek(): string | undefined {
		return this.tasks[0]?.label
	}

	getExecuted(): number {
		return this.executed
	}
}
