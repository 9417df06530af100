export * from './queue.module'
