export * from './monitoring.module'
