import { FrameParseError } from '../src/lib/errors.js';
import { failure, parseFrame, serializeResponse, success } from '../src/lib/frame.js';

describe('parseFrame', () => {
  test('skips blank and whitespace-only lines', () => {
    expect(parseFrame('')).toBeUndefined();
    expect(parseFrame('   \t ')).toBeUndefined();
  });

  test('decodes id, method and params', () => {
    expect(parseFrame('{"jsonrpc":"2.0","id":7,"method":"tools/call","params":{"name":"weather_info"}}')).toEqual({
      id: 7,
      method: 'tools/call',
      params: { name: 'weather_info' }
    });
  });

  test('keeps string and null ids, leaves an absent id absent', () => {
    expect(parseFrame('{"id":"abc","method":"ping"}')).toEqual({ id: 'abc', method: 'ping' });
    expect(parseFrame('{"id":null,"method":"ping"}')).toEqual({ id: null, method: 'ping' });
    const notification = parseFrame('{"method":"notifications/initialized"}');
    expect(notification).toEqual({ method: 'notifications/initialized' });
    expect(notification && 'id' in notification).toBe(false);
  });

  test('accepts a frame without a method as the empty method', () => {
    expect(parseFrame('{"id":1}')).toEqual({ id: 1, method: '' });
    expect(parseFrame('{"id":2,"method":42}')).toEqual({ id: 2, method: '' });
  });

  test('drops params that are not an object', () => {
    expect(parseFrame('{"id":3,"method":"ping","params":[1,2]}')).toEqual({ id: 3, method: 'ping' });
  });

  test('rejects invalid JSON', () => {
    expect(() => parseFrame('{not json')).toThrow(FrameParseError);
    expect(() => parseFrame('{not json')).toThrow(/^Invalid JSON: /);
  });

  test('rejects batches, scalars and unusable ids', () => {
    expect(() => parseFrame('[{"id":1,"method":"ping"}]')).toThrow('Invalid request: expected a single JSON object per line');
    expect(() => parseFrame('42')).toThrow(FrameParseError);
    expect(() => parseFrame('{"id":{"x":1},"method":"ping"}')).toThrow('Invalid request: id must be a string, number or null');
  });
});

describe('serializeResponse', () => {
  test('writes a success response on one line', () => {
    expect(serializeResponse(success(1, {}))).toBe('{"jsonrpc":"2.0","id":1,"result":{}}');
  });

  test('writes an error response and omits an absent id', () => {
    expect(serializeResponse(failure(undefined, -32601, 'Method not found: x'))).toBe(
      '{"jsonrpc":"2.0","error":{"code":-32601,"message":"Method not found: x"}}'
    );
    expect(serializeResponse(failure(null, 404, 'city not found'))).toBe(
      '{"jsonrpc":"2.0","id":null,"error":{"code":404,"message":"city not found"}}'
    );
  });
});
