export { ProtocolLoop } from './protocol-loop.js'
export type { ProtocolTask } from './protocol-loop.js'
export { LoopbackCoordinator, LoopbackLink } from './loopback-coordinator.js'
export type { Delivery, LoopbackCoordinatorOptions } from './loopback-coordinator.js'
export { TransactedSession, SessionProducer, SessionConsumer } from './transacted-session.js'
export type { TransactedSessionOptions } from './transacted-session.js'
export { runScenario } from './scenario.js'
export type { ScenarioOptions, ScenarioReport } from './scenario.js'
