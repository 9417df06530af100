export * from './monitoring.controller'
