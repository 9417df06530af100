export * from './task-message-handlers.service'
export * from './tasks.service'
