export * from './database.health'
export * from './health.controller'
export * from './health.module'
export * from './queue.health'
