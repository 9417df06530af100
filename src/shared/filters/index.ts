export * from './global-exception.filter'
