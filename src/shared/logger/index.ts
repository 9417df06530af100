export * from './logger.module'
export * from './logger.service'
