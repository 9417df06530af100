export * from './tasks.module'
