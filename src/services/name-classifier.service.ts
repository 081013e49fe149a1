import { PatternCompileError } from '../errors.js';
import type { NamePattern } from '../types/models.js';

// Leading inline flag group as written in pattern files, e.g. "(?i)bot"
const INLINE_FLAGS = /^\(\?([a-zA-Z]+)\)/;
const SUPPORTED_FLAGS = new Set(['i', 'm', 's']);

/**
 * Compile one pattern line. A leading `(?i)`-style group becomes RegExp flags.
 */
export function compilePattern(source: string): NamePattern {
  let body = source;
  let flags = '';

  const inline = INLINE_FLAGS.exec(source);
  if (inline) {
    const requested = [...new Set(inline[1].split(''))];
    const unsupported = requested.filter((f) => !SUPPORTED_FLAGS.has(f));
    if (unsupported.length > 0) {
      throw new PatternCompileError(source, new Error(`unsupported inline flag(s): ${unsupported.join('')}`));
    }
    flags = requested.join('');
    body = source.slice(inline[0].length);
  }

  // Unicode mode, so `\p{...}` classes work and stray escapes are errors
  try {
    return { source, regex: new RegExp(body, `${flags}u`) };
  } catch (error) {
    throw new PatternCompileError(source, error);
  }
}

/**
 * Ordered list of display-name patterns. The first match wins.
 */
export class NameClassifier {
  private list: NamePattern[] = [];

  get size(): number {
    return this.list.length;
  }

  patterns(): readonly NamePattern[] {
    return this.list;
  }

  match(name: string): NamePattern | null {
    return this.list.find((pattern) => pattern.regex.test(name)) ?? null;
  }

  add(source: string): NamePattern {
    const pattern = compilePattern(source);
    this.list.push(pattern);
    return pattern;
  }

  /**
   * Compile every non-empty line. Lines that fail to compile are returned
   * as warnings and the rest are appended.
   */
  addLines(contents: string): { added: NamePattern[]; warnings: PatternCompileError[] } {
    const added: NamePattern[] = [];
    const warnings: PatternCompileError[] = [];

    for (const line of contents.split(/\r?\n/)) {
      const text = line.trim();
      if (text === '') {
        continue;
      }
      try {
        added.push(compilePattern(text));
      } catch (error) {
        if (!(error instanceof PatternCompileError)) {
          throw error;
        }
        warnings.push(error);
      }
    }

    this.list.push(...added);
    return { added, warnings };
  }

  remove(index: number): NamePattern | null {
    if (index < 0 || index >= this.list.length) {
      return null;
    }
    const [removed] = this.list.splice(index, 1);
    return removed;
  }

  serialize(): string {
    return this.list.map((p) => `${p.source}\n`).join('');
  }
}
