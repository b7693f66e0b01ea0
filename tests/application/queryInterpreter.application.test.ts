import {
  classifyIntent,
  extractPrepositionalCity,
  RuleBasedQueryInterpreter,
} from '../../src/query/application/RuleBasedQueryInterpreter';
import { normalizeQueryText } from '../../src/query/domain/QueryText';
import { Gazetteer } from '../../src/query/infrastructure/Gazetteer';

const gazetteer = new Gazetteer(['Hyderabad', 'Delhi', 'New Delhi', 'London', 'Paris', 'Tokyo', 'New York']);
const interpreter = new RuleBasedQueryInterpreter(gazetteer);

describe('normalizeQueryText', () => {
  it('lowercases, strips punctuation and collapses whitespace', () => {
    expect(normalizeQueryText("  What's   the WEATHER -- in São-Paulo?! ")).toBe(
      'what s the weather in são-paulo',
    );
  });
});

describe('classifyIntent', () => {
  it.each<[string, string]>([
    ['is it raining', 'forecast_precipitation'],
    ['any snowfall expected', 'forecast_precipitation'],
    ['chance of precipitation', 'forecast_precipitation'],
    ['rainy and cold', 'forecast_precipitation'],
    ['is it colder than yesterday', 'current_weather'],
    ['hottest day', 'current_weather'],
    ['weather report', 'current_weather'],
    ['will there be snowflakes', 'forecast_precipitation'],
    ['do i need a raincoat', 'forecast_precipitation'],
    ['raindrops on the window', 'forecast_precipitation'],
    ['is the tent weatherproof', 'current_weather'],
    ['a hot and rainy afternoon', 'forecast_precipitation'],
    ['tell me a joke', 'unknown'],
  ])('classifies %p as %s', (text, intent) => {
    expect(classifyIntent(text)).toBe(intent);
  });
});

describe('extractPrepositionalCity', () => {
  it('takes the last prepositional phrase', () => {
    expect(extractPrepositionalCity('Will it rain in Paris or in Berlin?')).toBe('Berlin');
  });

  it('collects multi-word names and stops at temporal words', () => {
    expect(extractPrepositionalCity("What's the weather in New York City today?")).toBe('New York City');
  });

  it('skips a preposition followed only by a temporal word', () => {
    expect(extractPrepositionalCity('Forecast for Tomorrow in Paris')).toBe('Paris');
  });

  it('keeps hyphenated names and drops the possessive', () => {
    expect(extractPrepositionalCity('Any snowfall in Winston-Salem?')).toBe('Winston-Salem');
    expect(extractPrepositionalCity("How's the weather in London's parks")).toBe('London');
  });

  it('stops the name at a comma', () => {
    expect(extractPrepositionalCity('Rainy in Rome, then Milan?')).toBe('Rome');
  });

  it('ignores a preposition that ends a clause', () => {
    expect(extractPrepositionalCity('What is it like in, Tokyo')).toBeUndefined();
  });

  it('requires a capitalised word after the preposition', () => {
    expect(extractPrepositionalCity('is it hot in new delhi')).toBeUndefined();
  });
});

describe('RuleBasedQueryInterpreter', () => {
  it('extracts city and intent from a prepositional phrase', () => {
    expect(interpreter.interpret('Is it raining in London today?')).toEqual({
      rawText: 'Is it raining in London today?',
      candidateCity: 'London',
      intent: 'forecast_precipitation',
      confidence: 'high',
      matchedBy: 'preposition',
    });
  });

  it('prefers the prepositional city over gazetteer mentions', () => {
    const query = interpreter.interpret('Flying from London, how is the weather in Oslo?');

    expect(query.candidateCity).toBe('Oslo');
    expect(query.matchedBy).toBe('preposition');
  });

  it('falls back to the gazetteer for lowercase text', () => {
    expect(interpreter.interpret('weather hyderabad')).toEqual({
      rawText: 'weather hyderabad',
      candidateCity: 'Hyderabad',
      intent: 'current_weather',
      confidence: 'high',
      matchedBy: 'gazetteer',
    });
  });

  it('prefers the longer gazetteer name ending on the same word', () => {
    expect(interpreter.interpret('is it hot in new delhi').candidateCity).toBe('New Delhi');
  });

  it('takes the last gazetteer city mentioned', () => {
    expect(interpreter.interpret('compare london and paris weather').candidateCity).toBe('Paris');
  });

  it('uses the gazetteer when the preposition ends a clause', () => {
    const query = interpreter.interpret('What is it like in, Tokyo');

    expect(query.candidateCity).toBe('Tokyo');
    expect(query.matchedBy).toBe('gazetteer');
  });

  it('classifies intent by keyword presence anywhere in the text', () => {
    expect(interpreter.interpret('Will there be snowflakes in Oslo?').intent).toBe('forecast_precipitation');
    expect(interpreter.interpret('Do I need a raincoat in London?').intent).toBe('forecast_precipitation');
    expect(interpreter.interpret('Is Oslo weatherproof').intent).toBe('current_weather');
  });

  it('returns low confidence and no city for unrelated text', () => {
    expect(interpreter.interpret('tell me a joke')).toEqual({
      rawText: 'tell me a joke',
      intent: 'unknown',
      confidence: 'low',
      matchedBy: 'none',
    });
  });
});
