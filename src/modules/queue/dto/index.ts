export * from './send-message.dto'
