import request from 'supertest';

import { createApp } from '../../src/app';
import { buildRuntimeDeps } from '../../src/bootstrap/buildDeps';
import { Gazetteer } from '../../src/query/infrastructure/Gazetteer';
import { loadConfig } from '../../src/shared/config/Config';
import { ToolRegistry } from '../../src/tools/application/ToolRegistry';
import { ToolServer } from '../../src/tools/application/ToolServer';
import { MockWeatherGenerator } from '../../src/weather/application/MockWeatherGenerator';
import { toWeatherPayload } from '../../src/weather/domain/WeatherReading';
import { getWeatherDefinition } from '../../src/weather/tools/getWeatherTool';

const FIXED_NOW = new Date('2026-03-14T15:30:00.000Z');
const mock = new MockWeatherGenerator();

function mockOnlyApp() {
  const deps = buildRuntimeDeps(loadConfig({}), {
    gazetteer: new Gazetteer(['London', 'Tokyo']),
    now: () => FIXED_NOW,
  });
  return createApp({ toolServer: deps.toolServer, queryService: deps.queryService });
}

describe('Tool protocol endpoints', () => {
  describe('GET /tools/list', () => {
    it('lists get_weather with its input schema', async () => {
      const res = await request(mockOnlyApp()).get('/tools/list').expect(200);

      expect(res.body).toEqual({
        tools: [
          {
            name: 'get_weather',
            description: getWeatherDefinition.description,
            input_schema: {
              city: { type: 'string', required: false, description: 'City name, e.g. "Hyderabad" or "New York".' },
            },
          },
        ],
      });
    });
  });

  describe('POST /tools/call', () => {
    it('returns the weather payload for a city', async () => {
      const res = await request(mockOnlyApp())
        .post('/tools/call')
        .send({ tool_name: 'get_weather', arguments: { city: 'tokyo' } })
        .expect(200);

      expect(res.body).toEqual(toWeatherPayload(mock.generate('Tokyo', FIXED_NOW)));
      expect(res.body.source).toBe('mock');
    });

    it('uses the default city when arguments are omitted', async () => {
      const res = await request(mockOnlyApp()).post('/tools/call').send({ tool_name: 'get_weather' }).expect(200);

      expect(res.body.city).toBe('Hyderabad');
    });

    it('accepts "name" as an alias of "tool_name"', async () => {
      const res = await request(mockOnlyApp())
        .post('/tools/call')
        .send({ name: 'get_weather', arguments: { city: 'London' } })
        .expect(200);

      expect(res.body.city).toBe('London');
    });

    it('returns 404 with UnknownTool for an unregistered tool', async () => {
      const res = await request(mockOnlyApp())
        .post('/tools/call')
        .set('x-correlation-id', 'corr-abc')
        .send({ tool_name: 'get_stock_price', arguments: { symbol: 'ACME' } })
        .expect(404);

      expect(res.body).toEqual({
        error: { kind: 'UnknownTool', message: 'Tool not available: get_stock_price', correlationId: 'corr-abc' },
      });
    });

    it('returns 400 naming the offending argument', async () => {
      const res = await request(mockOnlyApp())
        .post('/tools/call')
        .send({ tool_name: 'get_weather', arguments: { city: 42 } })
        .expect(400);

      expect(res.body.error.kind).toBe('ValidationError');
      expect(res.body.error.field).toBe('city');
      expect(res.body.error.message).toBe('"city" must be of type string.');
    });

    it('returns 400 when tool_name is missing', async () => {
      const res = await request(mockOnlyApp()).post('/tools/call').send({ arguments: {} }).expect(400);

      expect(res.body.error.kind).toBe('ValidationError');
      expect(res.body.error.message).toBe('Invalid tool call payload');
      expect(res.body.error.issues).toEqual(['"tool_name" must be a non-empty string.']);
    });

    it('returns 400 naming "arguments" when they are not an object', async () => {
      const res = await request(mockOnlyApp())
        .post('/tools/call')
        .set('x-correlation-id', 'corr-args')
        .send({ tool_name: 'get_weather', arguments: ['London'] })
        .expect(400);

      expect(res.body).toEqual({
        error: {
          kind: 'ValidationError',
          message: '"arguments" must be a JSON object.',
          correlationId: 'corr-args',
          field: 'arguments',
        },
      });
    });

    it('reports an unknown tool before looking at its arguments', async () => {
      const res = await request(mockOnlyApp())
        .post('/tools/call')
        .send({ tool_name: 'get_stock_price', arguments: 'ACME' })
        .expect(404);

      expect(res.body.error.kind).toBe('UnknownTool');
      expect(res.body.error.message).toBe('Tool not available: get_stock_price');
    });

    it('returns 500 with HandlerError when the handler throws', async () => {
      const registry = new ToolRegistry()
        .register(getWeatherDefinition, async () => {
          throw new Error('upstream exploded');
        })
        .freeze();
      const app = createApp({ toolServer: new ToolServer({ registry }) });

      const res = await request(app)
        .post('/tools/call')
        .set('x-correlation-id', 'corr-h')
        .send({ tool_name: 'get_weather', arguments: {} })
        .expect(500);

      expect(res.body).toEqual({
        error: {
          kind: 'HandlerError',
          message: 'Tool "get_weather" failed: upstream exploded',
          correlationId: 'corr-h',
        },
      });
    });
  });
});
