/**
 * Result of interpreting one free-text user message.
 * Created per message, consumed immediately by the pipeline, then discarded.
 */

export type QueryIntent = 'current_weather' | 'forecast_precipitation' | 'unknown';

export type ExtractionConfidence = 'high' | 'low';

/**
 * Which rule produced the city candidate.
 */
export type CityMatchSource = 'preposition' | 'gazetteer' | 'none';

export interface ExtractedQuery {
  rawText: string;

  /**
   * Absent when no city could be recognised; the resolver then uses its default.
   */
  candidateCity?: string;

  intent: QueryIntent;
  confidence: ExtractionConfidence;
  matchedBy: CityMatchSource;
}

/**
 * Swappable extraction boundary. A model-backed implementation can replace
 * the rule-based one without touching the resolver or the server.
 */
export interface QueryInterpreter {
  interpret(text: string): ExtractedQuery;
}
