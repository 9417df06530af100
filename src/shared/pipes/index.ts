export * from './global-validation.pipe'
