import axios from 'axios';

import { ToolServerClient } from '../../src/client/ToolServerClient';
import { stubAxios, type StubReply } from '../support/axiosStub';

function clientFor(replies: StubReply[]) {
  const stub = stubAxios(replies, { resolveAllStatuses: true });
  const http = axios.create({ baseURL: 'http://tools.test', adapter: stub.adapter });
  return { client: new ToolServerClient({ http }), calls: stub.calls };
}

describe('ToolServerClient', () => {
  describe('listTools', () => {
    it('decodes the discovery listing and skips unusable entries', async () => {
      const { client, calls } = clientFor([
        {
          status: 200,
          data: {
            tools: [
              {
                name: 'get_weather',
                description: 'Current weather',
                input_schema: {
                  city: { type: 'string', required: false, description: 'City name' },
                  units: { type: 'kelvin', required: true },
                },
              },
              { description: 'no name' },
            ],
          },
        },
      ]);

      const tools = await client.listTools();

      expect(tools).toEqual([
        {
          name: 'get_weather',
          description: 'Current weather',
          inputSchema: { city: { type: 'string', required: false, description: 'City name' } },
        },
      ]);
      expect(calls[0]?.url).toBe('/tools/list');
    });

    it('rejects a listing without a tools array', async () => {
      const { client } = clientFor([{ status: 200, data: { items: [] } }]);

      await expect(client.listTools()).rejects.toThrow('Malformed tool listing: expected { "tools": [...] }');
    });
  });

  describe('isAvailable', () => {
    it.each<[StubReply, boolean]>([
      [{ status: 200, data: { tools: [] } }, true],
      [{ status: 503 }, false],
      [{ networkError: 'ECONNREFUSED' }, false],
    ])('maps %p to %p', async (reply, expected) => {
      const { client } = clientFor([reply]);

      await expect(client.isAvailable()).resolves.toBe(expected);
    });
  });

  describe('callTool', () => {
    it('posts the call envelope and returns the payload', async () => {
      const payload = {
        city: 'Oslo',
        temperature_celsius: 2.5,
        condition: 'snow',
        humidity_percent: 88,
        source: 'mock',
        timestamp: '2026-03-14T00:00:00.000Z',
      };
      const { client, calls } = clientFor([{ status: 200, data: payload }]);

      const result = await client.callTool('get_weather', { city: 'Oslo' }, { correlationId: 'corr-9' });

      expect(result).toEqual({ ok: true, toolName: 'get_weather', payload });
      expect(calls[0]?.method).toBe('post');
      expect(calls[0]?.url).toBe('/tools/call');
      expect(JSON.parse(String(calls[0]?.data))).toEqual({ tool_name: 'get_weather', arguments: { city: 'Oslo' } });
      expect(calls[0]?.headers.get('x-correlation-id')).toBe('corr-9');
    });

    it('decodes a failure envelope', async () => {
      const { client } = clientFor([
        {
          status: 400,
          data: {
            error: {
              kind: 'ValidationError',
              message: '"city" must be of type string.',
              field: 'city',
              correlationId: 'corr-1',
            },
          },
        },
      ]);

      const result = await client.callTool('get_weather', { city: 42 });

      expect(result).toEqual({
        ok: false,
        toolName: 'get_weather',
        error: { kind: 'ValidationError', message: '"city" must be of type string.', field: 'city' },
      });
    });

    it('reports an unreadable error body as a handler failure', async () => {
      const { client } = clientFor([{ status: 502, data: '<html>Bad Gateway</html>' }]);

      const result = await client.callTool('get_weather');

      expect(result).toEqual({
        ok: false,
        toolName: 'get_weather',
        error: { kind: 'HandlerError', message: 'Tool server returned 502 with an unreadable body' },
      });
    });

    it.each<[string, string]>([
      ['ECONNREFUSED', 'Cannot connect to tool server'],
      ['ETIMEDOUT', 'Tool server timed out'],
      ['ECONNABORTED', 'Tool server timed out'],
      ['ERR_NETWORK', 'Tool server request failed: stub ERR_NETWORK'],
    ])('maps transport error %s to a handler failure', async (code, message) => {
      const { client } = clientFor([{ networkError: code }]);

      const result = await client.callTool('get_weather', {});

      expect(result).toEqual({ ok: false, toolName: 'get_weather', error: { kind: 'HandlerError', message } });
    });

    it('reports cancellation when the caller aborts', async () => {
      const { client } = clientFor([{ hang: true }]);
      const controller = new AbortController();

      const pending = client.callTool('get_weather', {}, { signal: controller.signal });
      setTimeout(() => controller.abort(), 5);

      await expect(pending).resolves.toEqual({
        ok: false,
        toolName: 'get_weather',
        error: { kind: 'HandlerError', message: 'Tool call was cancelled' },
      });
    });
  });
});
