import { decodeBody, toEnvelope } from './queue-message'

describe('queue messages', () => {
  describe('decodeBody', () => {
    it('should decode JSON bodies', () => {
      expect(decodeBody('{"type":"delete_task","data":{"id":"1"}}')).toEqual({
        format: 'json',
        value: { type: 'delete_task', data: { id: '1' } },
      })
    })

    it('should keep anything else as raw text', () => {
      expect(decodeBody('hello {')).toEqual({ format: 'raw', text: 'hello {' })
      expect(decodeBody('')).toEqual({ format: 'raw', text: '' })
    })
  })

  describe('toEnvelope', () => {
    it('should read type and data', () => {
      expect(toEnvelope({ format: 'json', value: { type: 'create_task', data: { title: 'a' } } })).toEqual({
        kind: 'envelope',
        type: 'create_task',
        data: { title: 'a' },
      })
    })

    it('should leave data undefined when absent', () => {
      expect(toEnvelope({ format: 'json', value: { type: 'ping' } })).toEqual({
        kind: 'envelope',
        type: 'ping',
        data: undefined,
      })
    })

    it.each([
      ['a missing type', { data: {} }],
      ['an empty type', { type: '', data: {} }],
      ['a numeric type', { type: 7 }],
      ['an array', [{ type: 'create_task' }]],
      ['a scalar', 42],
      ['null', null],
    ])('should not recognize %s', (_label, value) => {
      expect(toEnvelope({ format: 'json', value })).toEqual({
        kind: 'unrecognized',
        type: 'unknown',
        payload: value,
      })
    })

    it('should not recognize raw bodies', () => {
      expect(toEnvelope({ format: 'raw', text: 'plain' })).toEqual({
        kind: 'unrecognized',
        type: 'unknown',
        payload: 'plain',
      })
    })
  })
})
