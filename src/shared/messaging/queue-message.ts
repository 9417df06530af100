/**
 * Body of a delivered message.
 *
 * JSON payloads are decoded; anything else is kept verbatim so handlers
 * and logs can still inspect it.
 */
export type MessageBody =
  | { format: 'json'; value: unknown }
  | { format: 'raw'; text: string }

/**
 * One delivery received from the queue.
 *
 * The receipt proves entitlement to delete this specific delivery; it
 * changes on every redelivery of the same message id.
 */
export interface QueueMessage {
  id: string
  body: MessageBody
  receipt: string
  attributes: Record<string, string>
}

/**
 * Typed view of a message body.
 *
 * Producers are expected to send `{ type, data }`. Anything else, including
 * raw bodies and objects without a string `type`, is unrecognized.
 */
export type MessageEnvelope =
  | { kind: 'envelope'; type: string; data: unknown }
  | { kind: 'unrecognized'; type: typeof UNKNOWN_MESSAGE_TYPE; payload: unknown }

export const UNKNOWN_MESSAGE_TYPE = 'unknown'

export type AttributeValue = string | number | boolean

export const decodeBody = (text: string): MessageBody => {
  try {
    const value: unknown = JSON.parse(text)
    return { format: 'json', value }
  } catch {
    return { format: 'raw', text }
  }
}

export const toEnvelope = (body: MessageBody): MessageEnvelope => {
  if (body.format === 'raw') {
    return { kind: 'unrecognized', type: UNKNOWN_MESSAGE_TYPE, payload: body.text }
  }

  const value = body.value
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    const type: unknown = Reflect.get(value, 'type')
    if (typeof type === 'string' && type.length > 0) {
      return { kind: 'envelope', type, data: Reflect.get(value, 'data') }
    }
  }

  return { kind: 'unrecognized', type: UNKNOWN_MESSAGE_TYPE, payload: value }
}
