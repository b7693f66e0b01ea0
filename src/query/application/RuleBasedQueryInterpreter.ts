// src/query/application/RuleBasedQueryInterpreter.ts

/**
 * Rule-based query interpreter.
 *
 * Deterministic, no model involved:
 * 1) Intent by keyword presence, in fixed priority (precipitation before general weather).
 * 2) City from "in <Capitalised Words>" / "for <Capitalised Words>" in the
 *    original casing; the last such phrase in the text wins.
 * 3) Otherwise the last gazetteer city mentioned anywhere in the text.
 *
 * interpret() is total: unrecognisable input yields no city and low confidence.
 */

import type { ExtractedQuery, QueryIntent, QueryInterpreter } from '../domain/ExtractedQuery';
import type { Gazetteer, GazetteerMatch } from '../infrastructure/Gazetteer';
import { normalizeQueryText } from '../domain/QueryText';

const PRECIPITATION_KEYWORDS = ['rain', 'precipitation', 'snow'];
const CURRENT_WEATHER_KEYWORDS = ['weather', 'temperature', 'climate', 'hot', 'cold'];

const PREPOSITIONS = new Set(['in', 'for']);
const TEMPORAL_WORDS = new Set(['today', 'tomorrow', 'now']);

// Token ends a sentence or clause, optionally followed by closing quotes/brackets.
const CLAUSE_END = /[.?!,;:]["'’”)\]]*$/;
const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;
const POSSESSIVE = /['’]s$/u;
const CAPITALISED = /^\p{Lu}/u;

/**
 * Keyword presence in the normalised text, precipitation first.
 */
export function classifyIntent(normalizedText: string): QueryIntent {
  if (PRECIPITATION_KEYWORDS.some((keyword) => normalizedText.includes(keyword))) {
    return 'forecast_precipitation';
  }
  if (CURRENT_WEATHER_KEYWORDS.some((keyword) => normalizedText.includes(keyword))) {
    return 'current_weather';
  }
  return 'unknown';
}

/**
 * City named after the last "in"/"for" that is followed by at least one
 * capitalised word. Returns undefined when there is none.
 */
export function extractPrepositionalCity(text: string): string | undefined {
  const tokens = text.split(/\s+/).filter((t) => t.length > 0);
  let lastMatch: string | undefined;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';
    if (!PREPOSITIONS.has(stripEdges(token).toLowerCase()) || CLAUSE_END.test(token)) {
      continue;
    }

    const run: string[] = [];
    for (let j = i + 1; j < tokens.length; j++) {
      const raw = tokens[j] ?? '';
      const word = stripEdges(raw).replace(POSSESSIVE, '');

      if (word.length === 0 || TEMPORAL_WORDS.has(word.toLowerCase()) || !CAPITALISED.test(word)) {
        break;
      }

      run.push(word);
      if (CLAUSE_END.test(raw)) break;
    }

    if (run.length > 0) {
      lastMatch = run.join(' ');
    }
  }

  return lastMatch;
}

function stripEdges(token: string): string {
  return token.replace(EDGE_PUNCTUATION, '');
}

/**
 * Last gazetteer city in the text, by the word it ends on. Of two names ending
 * on the same word the longer wins, so "new delhi" beats "delhi".
 */
function pickGazetteerCity(matches: GazetteerMatch[]): string | undefined {
  let best: GazetteerMatch | undefined;
  let bestEnd = -1;

  for (const match of matches) {
    const end = match.wordIndex + match.wordCount;
    if (!best || end > bestEnd || (end === bestEnd && match.wordCount > best.wordCount)) {
      best = match;
      bestEnd = end;
    }
  }

  return best?.city;
}

export class RuleBasedQueryInterpreter implements QueryInterpreter {
  public constructor(private readonly gazetteer: Gazetteer) {}

  public interpret(text: string): ExtractedQuery {
    const normalized = normalizeQueryText(text);
    const intent = classifyIntent(normalized);

    const prepositional = extractPrepositionalCity(text);
    if (prepositional) {
      return { rawText: text, candidateCity: prepositional, intent, confidence: 'high', matchedBy: 'preposition' };
    }

    const known = pickGazetteerCity(this.gazetteer.findAll(normalized));
    if (known) {
      return { rawText: text, candidateCity: known, intent, confidence: 'high', matchedBy: 'gazetteer' };
    }

    return { rawText: text, intent, confidence: 'low', matchedBy: 'none' };
  }
}
