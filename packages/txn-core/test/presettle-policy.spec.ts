import { expect } from 'chai'
import { PresettlePolicy, type Destination, type SessionDescriptor } from '../src/index.js'

const queue: Destination = { name: 'orders', kind: 'queue' }
const topic: Destination = { name: 'prices', kind: 'topic' }
const transacted: SessionDescriptor = { isTransacted: () => true }
const plain: SessionDescriptor = { isTransacted: () => false }

describe('PresettlePolicy', () => {
	it('presettles nothing by default', () => {
		const policy = new PresettlePolicy()
		for (const destination of [queue, topic, undefined]) {
			expect(policy.isProducerPresettled(destination, plain)).to.equal(false)
			expect(policy.isConsumerPresettled(destination, plain)).to.equal(false)
		}
	})

	describe('producers', () => {
		it('presettles every send with presettleAll or presettleProducers', () => {
			expect(new PresettlePolicy({ presettleAll: true }).isProducerPresettled(undefined, transacted)).to.equal(true)
			expect(new PresettlePolicy({ presettleProducers: true }).isProducerPresettled(queue, plain)).to.equal(true)
		})

		it('presettles transacted sends only in a transacted session', () => {
			const policy = new PresettlePolicy({ presettleTransactedProducers: true })
			expect(policy.isProducerPresettled(queue, transacted)).to.equal(true)
			expect(policy.isProducerPresettled(queue, plain)).to.equal(false)
		})

		it('applies queue and topic rules by destination kind', () => {
			const queues = new PresettlePolicy({ presettleQueueProducers: true })
			expect(queues.isProducerPresettled(queue, plain)).to.equal(true)
			expect(queues.isProducerPresettled(topic, plain)).to.equal(false)
			expect(queues.isProducerPresettled(undefined, plain)).to.equal(false)

			const topics = new PresettlePolicy({ presettleTopicProducers: true })
			expect(topics.isProducerPresettled(topic, plain)).to.equal(true)
			expect(topics.isProducerPresettled(queue, plain)).to.equal(false)
		})
	})

	describe('consumers', () => {
		it('never presettles in a transacted session', () => {
			const policy = new PresettlePolicy({ presettleAll: true, presettleConsumers: true })
			expect(policy.isConsumerPresettled(queue, transacted)).to.equal(false)
			expect(policy.isConsumerPresettled(queue, plain)).to.equal(true)
		})

		it('applies queue and topic rules by destination kind', () => {
			const policy = new PresettlePolicy({ presettleTopicConsumers: true })
			expect(policy.isConsumerPresettled(topic, plain)).to.equal(true)
			expect(policy.isConsumerPresettled(queue, plain)).to.equal(false)
			expect(new PresettlePolicy({ presettleQueueConsumers: true }).isConsumerPresettled(queue, plain)).to.equal(true)
		})
	})

	it('copies options into an independent policy', () => {
		const policy = new PresettlePolicy({ presettleConsumers: true })
		const copy = policy.copy()
		policy.set('presettleConsumers', false)
		expect(copy.getOptions().presettleConsumers).to.equal(true)
		expect(policy.getOptions().presettleConsumers).to.equal(false)
	})

	describe('applyProperties', () => {
		it('sets prefixed options and returns the rest', () => {
			const policy = new PresettlePolicy()
			const unused = policy.applyProperties({
				'presettlePolicy.presettleAll': 'TRUE',
				'presettlePolicy.presettleQueueConsumers': 'true',
				'presettlePolicy.unknown': 'true',
				'prefetchPolicy.all': '10'
			})
			expect(policy.getOptions().presettleAll).to.equal(true)
			expect(policy.getOptions().presettleQueueConsumers).to.equal(true)
			expect(unused).to.deep.equal({ 'presettlePolicy.unknown': 'true', 'prefetchPolicy.all': '10' })
		})

		it('rejects values that are not booleans', () => {
			const policy = new PresettlePolicy()
			expect(() => policy.applyProperties({ 'presettlePolicy.presettleAll': 'yes' }))
				.to.throw(TypeError, "Property presettlePolicy.presettleAll expects true or false, got 'yes'")
		})
	})
})
