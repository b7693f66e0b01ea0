// src/weather/tools/getWeatherTool.ts

import type { ToolDefinition, ToolHandler } from '../../tools/domain/Tool';
import type { WeatherResolverPort } from '../application/WeatherResolver';
import { toWeatherPayload } from '../domain/WeatherReading';

export const GET_WEATHER_TOOL = 'get_weather';

export const getWeatherDefinition: ToolDefinition = {
  name: GET_WEATHER_TOOL,
  description:
    'Get current weather for a city. Falls back to the default city when none is given; ' +
    'readings tagged source "mock" are synthetic.',
  inputSchema: {
    city: {
      type: 'string',
      required: false,
      description: 'City name, e.g. "Hyderabad" or "New York".',
    },
  },
};

export function createGetWeatherHandler(resolver: WeatherResolverPort): ToolHandler {
  return async (args, context) => {
    const city = typeof args.city === 'string' ? args.city : undefined;
    const reading = await resolver.resolve(city, { signal: context.signal });
    return toWeatherPayload(reading);
  };
}
