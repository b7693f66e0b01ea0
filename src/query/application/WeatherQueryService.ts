// src/query/application/WeatherQueryService.ts

/**
 * End-to-end query pipeline:
 * free text -> ExtractedQuery -> get_weather invocation -> tagged result.
 *
 * Turning the result into prose is left to an external text-generation
 * collaborator; this service only hands back the structured pieces.
 */

import type { ExtractedQuery, QueryInterpreter } from '../domain/ExtractedQuery';
import type { ToolInvocationResult } from '../../tools/domain/Tool';
import type { InvokeOptions, ToolServerPort } from '../../tools/application/ToolServer';
import { GET_WEATHER_TOOL } from '../../weather/tools/getWeatherTool';
import { logger as rootLogger, type AppLogger } from '../../shared/logging/Logger';

export type WeatherQueryServiceDeps = {
  interpreter: QueryInterpreter;
  toolServer: ToolServerPort;
  logger?: AppLogger;
};

export interface WeatherQueryAnswer {
  query: ExtractedQuery;
  result: ToolInvocationResult;
}

export class WeatherQueryService {
  private readonly logger: AppLogger;

  public constructor(private readonly deps: WeatherQueryServiceDeps) {
    this.logger = (deps.logger ?? rootLogger).child({ component: 'WeatherQueryService' });
  }

  public async answer(text: string, options: InvokeOptions = {}): Promise<WeatherQueryAnswer> {
    const query = this.deps.interpreter.interpret(text);

    this.logger.debug(
      {
        correlationId: options.correlationId,
        candidateCity: query.candidateCity,
        intent: query.intent,
        confidence: query.confidence,
      },
      'Interpreted weather query',
    );

    // No recognisable city: call without arguments so the resolver's default applies.
    const result = await this.deps.toolServer.invoke(
      {
        toolName: GET_WEATHER_TOOL,
        arguments: query.candidateCity ? { city: query.candidateCity } : {},
      },
      options,
    );

    return { query, result };
  }
}
