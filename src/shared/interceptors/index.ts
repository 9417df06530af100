export * from './request-id.interceptor'
export * from './response-time.interceptor'
