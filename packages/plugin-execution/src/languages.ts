/**
 * @module @sprig/plugin-execution/languages
 *
 * Language identifiers: aliases, file patterns and content detection.
 * The table lives in data/languages.json.
 */

import { readFileSync } from 'node:fs';
import { minimatch } from 'minimatch';
import { z } from 'zod';

export const languageEntrySchema = z.object({
  id: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  /** Glob patterns matched against a file's base name */
  patterns: z.array(z.string()).default([]),
  /** Interpreter names recognised in a shebang line */
  interpreters: z.array(z.string()).default([]),
  /** Regular expressions (multiline) that identify the language */
  signatures: z.array(z.string()).default([]),
});

export const languageTableSchema = z.object({
  languages: z.array(languageEntrySchema),
});

export type LanguageEntry = z.infer<typeof languageEntrySchema>;

/** Only the start of a source is inspected for signatures */
const DETECTION_WINDOW = 4096;

function loadLanguageTable(): LanguageEntry[] {
  const raw = readFileSync(new URL('../data/languages.json', import.meta.url), 'utf8');
  return languageTableSchema.parse(JSON.parse(raw)).languages;
}

const LANGUAGES = loadLanguageTable();

const CANONICAL = new Map<string, string>();
for (const entry of LANGUAGES) {
  CANONICAL.set(entry.id, entry.id);
  for (const alias of entry.aliases) {
    CANONICAL.set(alias, entry.id);
  }
}

const SIGNATURES = LANGUAGES.map((entry) => ({
  id: entry.id,
  patterns: entry.signatures.map((source) => new RegExp(source, 'm')),
}));

/**
 * Canonical IDs of every language in the table.
 */
export function knownLanguages(): string[] {
  return LANGUAGES.map((entry) => entry.id);
}

/**
 * Map an alias to its canonical ID. Unknown names are lowercased and
 * returned as they are.
 *
 * @example normalizeLanguage('JS') // 'javascript'
 */
export function normalizeLanguage(language: string): string {
  const key = language.trim().toLowerCase();
  return CANONICAL.get(key) ?? key;
}

/**
 * Pull a language from a `class` attribute (`language-rust`, `lang-go`).
 */
export function extractLanguageFromClass(className: string): string | undefined {
  for (const token of className.split(/\s+/)) {
    const match = /^(?:language|lang)-(.+)$/.exec(token);
    if (match?.[1]) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Language for a file path, by base name.
 *
 * @example languageForPath('src/main.rs') // 'rust'
 */
export function languageForPath(path: string): string | undefined {
  const base = path.split(/[\\/]/).pop() ?? path;
  for (const entry of LANGUAGES) {
    if (entry.patterns.some((pattern) => minimatch(base, pattern, { nocase: true, dot: true }))) {
      return entry.id;
    }
  }
  return undefined;
}

function interpreterFromShebang(line: string): string | undefined {
  const match = /^#!\s*(\S+)(?:\s+(\S+))?/.exec(line);
  if (!match?.[1]) {
    return undefined;
  }
  const program = match[1].split('/').pop() ?? match[1];
  // #!/usr/bin/env python3
  const name = program === 'env' ? match[2] : program;
  // python3.11 -> python3
  return name?.replace(/\.\d+$/, '');
}

/**
 * Guess a language from source text: shebang first, then signatures in
 * table order.
 */
export function detectLanguage(source: string): string | undefined {
  const head = source.slice(0, DETECTION_WINDOW);

  if (head.startsWith('#!')) {
    const interpreter = interpreterFromShebang(head.split('\n', 1)[0] ?? '');
    const entry = interpreter ? LANGUAGES.find((lang) => lang.interpreters.includes(interpreter)) : undefined;
    if (entry) {
      return entry.id;
    }
  }

  for (const { id, patterns } of SIGNATURES) {
    if (patterns.some((pattern) => pattern.test(head))) {
      return id;
    }
  }
  return undefined;
}
