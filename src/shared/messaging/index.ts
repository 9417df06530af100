export * from './message-dispatcher.service'
export * from './messaging.errors'
export * from './messaging.module'
export * from './queue-client'
export * from './queue-consumer.service'
export * from './queue-message'
