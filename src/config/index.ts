export { default as environmentConfig } from './environment'
export { validate } from './validation'
