// src/query/infrastructure/Gazetteer.ts

/**
 * Static list of known city names, loaded once at startup.
 *
 * Names are normalised the same way as query text (lowercase,
 * punctuation-free, single-spaced), so "St. Louis" matches "st louis".
 * Matches are whole-word, and multi-word names such as "new york" are
 * supported.
 */

import fs from 'fs';
import path from 'path';

import { normalizeQueryText } from '../domain/QueryText';

export class GazetteerLoadError extends Error {
  public readonly filePath: string;

  public constructor(filePath: string, reason: string) {
    super(`Failed to load gazetteer from ${filePath}: ${reason}`);
    this.name = 'GazetteerLoadError';
    this.filePath = filePath;
  }
}

export interface GazetteerMatch {
  /**
   * Display form from the gazetteer file, e.g. "New York".
   */
  city: string;

  /**
   * Index of the first matched word in the normalised text.
   */
  wordIndex: number;

  wordCount: number;
}

type Entry = { display: string; words: string[] };

export class Gazetteer {
  private readonly entries: Entry[];

  public constructor(cities: readonly string[]) {
    const seen = new Set<string>();
    this.entries = [];

    for (const city of cities) {
      const display = city.trim().replace(/\s+/g, ' ');
      const key = normalizeQueryText(display);
      if (key.length === 0 || seen.has(key)) continue;
      seen.add(key);
      this.entries.push({ display, words: key.split(' ') });
    }
  }

  /**
   * Read a JSON file of the form `{ "cities": ["Hyderabad", ...] }`.
   * Relative paths are resolved against the working directory.
   */
  public static fromFile(filePath: string): Gazetteer {
    const resolved = path.resolve(filePath);

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(resolved, 'utf8'));
    } catch (err) {
      throw new GazetteerLoadError(resolved, err instanceof Error ? err.message : String(err));
    }

    if (typeof parsed !== 'object' || parsed === null || !('cities' in parsed)) {
      throw new GazetteerLoadError(resolved, 'expected an object with a "cities" array');
    }

    const cities = parsed.cities;
    if (!isStringArray(cities)) {
      throw new GazetteerLoadError(resolved, '"cities" must be an array of strings');
    }

    return new Gazetteer(cities);
  }

  public get size(): number {
    return this.entries.length;
  }

  public has(city: string): boolean {
    const key = normalizeQueryText(city);
    return this.entries.some((entry) => entry.words.join(' ') === key);
  }

  /**
   * Every occurrence of a known city in the normalised text, in text order.
   */
  public findAll(normalizedText: string): GazetteerMatch[] {
    const words = normalizedText.split(' ').filter((w) => w.length > 0);
    const matches: GazetteerMatch[] = [];

    for (let i = 0; i < words.length; i++) {
      for (const entry of this.entries) {
        if (entry.words.every((word, offset) => words[i + offset] === word)) {
          matches.push({ city: entry.display, wordIndex: i, wordCount: entry.words.length });
        }
      }
    }

    return matches;
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
