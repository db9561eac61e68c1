import { expect } from 'chai'
import { PresettlePolicy, TransactionError, isTransactionError } from '@ferry/txn-core'
import type { Destination } from '@ferry/txn-core'
import { LoopbackCoordinator } from '../src/loopback-coordinator.js'
import { ProtocolLoop } from '../src/protocol-loop.js'
import { TransactedSession } from '../src/transacted-session.js'
import type { TransactedSessionOptions } from '../src/transacted-session.js'

const orders: Destination = { name: 'orders', kind: 'queue' }

function setup(options?: TransactedSessionOptions): { loop: ProtocolLoop, remote: LoopbackCoordinator, session: TransactedSession } {
	const loop = new ProtocolLoop()
	const remote = new LoopbackCoordinator(loop)
	const session = new TransactedSession(remote, options)
	return { loop, remote, session }
}

function started(options?: TransactedSessionOptions): { loop: ProtocolLoop, remote: LoopbackCoordinator, session: TransactedSession } {
	const fixture = setup(options)
	fixture.session.start()
	fixture.loop.drain()
	return fixture
}

describe('TransactedSession', () => {
	describe('start', () => {
		it('begins the first transaction once the coordinator declares it', () => {
			const { loop, session } = setup()
			const begun = session.start()
			expect(begun.isComplete()).to.equal(false)

			loop.drain()
			expect(begun.status).to.equal('succeeded')
			expect(session.getTransactionId()?.toString()).to.equal('loopback:1:t1')
			expect(session.context.getProtocolTransactionId()).to.deep.equal(Uint8Array.from([0, 0, 0, 1]))
		})

		it('rejects a second start', () => {
			const { session } = started()
			const again = session.start()
			expect(isTransactionError(again.error, 'illegal-state')).to.equal(true)
			expect(again.error?.message).to.equal('Session loopback:1 already started')
		})

		it('reports a rejected declare and can be started again', () => {
			const { loop, remote, session } = setup()
			remote.rejectNextDeclare()
			const first = session.start()
			loop.drain()

			expect(isTransactionError(first.error, 'protocol')).to.equal(true)
			expect(first.error?.message).to.equal('Declare of loopback:1:t1 rejected (amqp:resource-limit-exceeded: declare refused)')
			expect(session.getTransactionId()).to.equal(undefined)

			const second = session.start()
			loop.drain()
			expect(second.status).to.equal('succeeded')
			expect(session.getTransactionId()?.toString()).to.equal('loopback:1:t2')
		})

		it('fails to start when the coordinator refuses the link', () => {
			const loop = new ProtocolLoop()
			const session = new TransactedSession(new LoopbackCoordinator(loop, { refuseAttach: true }))
			const begun = session.start()
			loop.drain()

			expect(begun.error?.message).to.equal('Coordinator link loopback:1:coordinator:1 closed by remote (amqp:not-allowed: coordinator unavailable)')
			expect(session.context.getState()).to.equal('idle')
		})
	})

	describe('sends', () => {
		it('publishes sends when the transaction commits and moves on to the next one', () => {
			const { loop, remote, session } = started()
			const producer = session.createProducer(orders)
			const first = producer.send('a')
			const second = producer.send('b')
			const committed = session.commit()
			loop.drain()

			expect(first.status).to.equal('succeeded')
			expect(second.status).to.equal('succeeded')
			expect(committed.status).to.equal('succeeded')
			expect(remote.queued('orders')).to.deep.equal(['a', 'b'])
			expect(session.getTransactionId()?.toString()).to.equal('loopback:1:t2')
		})

		it('drops sends when the transaction rolls back', () => {
			const { loop, remote, session } = started()
			session.createProducer(orders).send('a')
			const rolledBack = session.rollback()
			loop.drain()

			expect(rolledBack.status).to.equal('succeeded')
			expect(remote.queued('orders')).to.deep.equal([])
			expect(remote.requests.filter(request => request.type === 'discharge')).to.deep.equal([
				{ type: 'discharge', txnId: Uint8Array.from([0, 0, 0, 1]), fail: true }
			])
		})

		it('turns a commit into a rollback when a send settled as failed before it', () => {
			const { loop, remote, session } = started()
			remote.failTransfer(0)
			const sent = session.createProducer(orders).send('a')
			loop.drain()
			expect(sent.error?.message).to.equal('Transfer 0 to orders rejected')

			const committed = session.commit()
			loop.drain()

			expect(isTransactionError(committed.error, 'rolled-back')).to.equal(true)
			expect(committed.error?.message).to.equal('Transaction rolled back: a transactional send failed')
			expect(committed.error?.cause).to.equal(sent.error)
			expect(remote.queued('orders')).to.deep.equal([])
		})

		it('waits for outstanding sends before discharging', () => {
			const { loop, remote, session } = started()
			session.createProducer(orders).send('a')
			session.commit()

			expect(remote.requests.map(request => request.type)).to.deep.equal(['declare'])
			loop.runNext()
			expect(remote.requests.map(request => request.type)).to.deep.equal(['declare', 'discharge'])
		})

		it('completes a presettled send at once', () => {
			const { loop, remote, session } = started({ presettlePolicy: new PresettlePolicy({ presettleTransactedProducers: true }) })
			const sent = session.createProducer(orders).send('a')
			expect(sent.status).to.equal('succeeded')

			session.commit()
			loop.drain()
			expect(remote.queued('orders')).to.deep.equal(['a'])
		})

		it('takes the destination per send on an anonymous producer', () => {
			const { session } = started()
			const producer = session.createProducer()

			const unnamed = producer.send('a')
			expect(unnamed.error?.message).to.equal('Producer loopback:1:p1 has no destination')
			expect(producer.send('b', orders).isComplete()).to.equal(false)
		})

		it('refuses a send before the first transaction is declared', () => {
			const { session } = setup()
			const sent = session.createProducer(orders).send('a')
			expect(isTransactionError(sent.error, 'illegal-state')).to.equal(true)
			expect(sent.error?.message).to.equal('Send attempted with no active transaction')
		})

		it('refuses a send while the transaction is completing', () => {
			const { session } = started()
			const producer = session.createProducer(orders)
			session.commit()

			expect(producer.send('a').error?.message).to.equal('Send attempted while the transaction is completing')
		})

		it('refuses a second commit while the first is outstanding', () => {
			const { session } = started()
			session.commit()
			const again = session.commit()
			expect(again.error?.message).to.equal('Commit called while the transaction is completing')
		})
	})

	describe('in doubt', () => {
		it('discards sends and reports the commit as rolled back once the coordinator link drops', () => {
			const { loop, remote, session } = started()
			remote.closeLinks()
			loop.drain()

			const sent = session.createProducer(orders).send('a')
			expect(isTransactionError(sent.error, 'rolled-back')).to.equal(true)

			const committed = session.commit()
			expect(isTransactionError(committed.error, 'rolled-back')).to.equal(true)
			expect(committed.error?.message).to.equal('Transaction in doubt and cannot be committed')

			loop.drain()
			expect(session.getTransactionId()?.toString()).to.equal('loopback:1:t2')
			expect(session.context.getCoordinator()?.name).to.equal('loopback:1:coordinator:2')
		})

		it('rolls back locally without a discharge', () => {
			const { loop, remote, session } = started()
			remote.closeLinks()
			loop.drain()

			const rolledBack = session.rollback()
			expect(rolledBack.status).to.equal('succeeded')
			expect(remote.requests.map(request => request.type)).to.deep.equal(['declare'])
		})
	})

	describe('consumers', () => {
		function withQueued(...bodies: string[]): { loop: ProtocolLoop, remote: LoopbackCoordinator, session: TransactedSession } {
			const fixture = setup()
			for (const body of bodies) fixture.remote.transfer('orders', body, undefined)
			fixture.session.start()
			fixture.loop.drain()
			return fixture
		}

		it('consumes received deliveries when the transaction commits', () => {
			const { loop, remote, session } = withQueued('a', 'b')
			const consumer = session.createConsumer(orders)
			expect(consumer.receive()).to.equal('a')
			expect(session.context.isInTransaction(consumer.consumerId)).to.equal(true)

			session.commit()
			loop.drain()

			expect(consumer.getConsumed()).to.equal(1)
			expect(remote.queued('orders')).to.deep.equal(['b'])
			expect(session.context.isInTransaction(consumer.consumerId)).to.equal(false)
		})

		it('returns received deliveries to the queue when the transaction rolls back', () => {
			const { loop, remote, session } = withQueued('a', 'b')
			const consumer = session.createConsumer(orders)
			consumer.receive()

			session.rollback()
			expect(remote.queued('orders')).to.deep.equal(['a', 'b'])
			loop.drain()

			expect(consumer.getConsumed()).to.equal(0)
			expect(remote.queued('orders')).to.deep.equal(['a', 'b'])
		})

		it('returns nothing from an empty queue', () => {
			const { session } = withQueued()
			expect(session.createConsumer(orders).receive()).to.equal(undefined)
		})

		it('cannot receive outside an active transaction', () => {
			const { session } = setup()
			const consumer = session.createConsumer(orders)
			expect(() => consumer.receive()).to.throw(TransactionError, 'Consumer loopback:1:c1 cannot receive outside an active transaction')
		})
	})
})
