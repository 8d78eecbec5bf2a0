import { readFileSync } from 'node:fs';
import { TextDecoder } from 'node:util';
import { UTF8 } from './const.js';
import { WordlistError } from './errors.js';

interface LoadedWordlist {
  words: readonly string[];
  lookup: ReadonlySet<string>;
}

/**
 * Loads newline-delimited wordlists and keeps them for the lifetime of the store.
 * A path is read once; later edits to the file are not picked up.
 */
export class WordlistStore {
  private readonly lists = new Map<string, LoadedWordlist>();

  load(path: string): readonly string[] {
    return this.get(path).words;
  }

  contains(path: string, candidate: string): boolean {
    return this.get(path).lookup.has(candidate);
  }

  isLoaded(path: string): boolean {
    return this.lists.has(path);
  }

  get size(): number {
    return this.lists.size;
  }

  private get(path: string): LoadedWordlist {
    const cached = this.lists.get(path);
    if (cached) return cached;

    const words = Object.freeze(splitLines(readText(path)));
    const loaded: LoadedWordlist = { words, lookup: new Set(words) };
    this.lists.set(path, loaded);
    return loaded;
  }
}

function readText(path: string): string {
  let raw: Buffer;
  try {
    raw = readFileSync(path);
  } catch (e) {
    if (errorCode(e) === 'ENOENT') throw new WordlistError('NotFound', path, e);
    throw new WordlistError('LoadFailure', path, e);
  }
  try {
    return new TextDecoder(UTF8, { fatal: true }).decode(raw);
  } catch (e) {
    throw new WordlistError('LoadFailure', path, e);
  }
}

export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r\n|\r|\n/);
  // a terminator on the last line does not start another entry
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map(line => line.trim());
}

function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}
