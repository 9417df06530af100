export * from './queue.controller'
