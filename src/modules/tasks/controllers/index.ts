export * from './tasks.controller'
