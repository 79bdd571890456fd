/**
 * @module @sprig/plugin-contracts/wire
 *
 * Data exchanged between the host and a grammar plugin.
 * These types are the CONTRACT - do not change without bumping WIRE_VERSION.
 *
 * All offsets are UTF-16 code unit indices into the source text, so they can
 * be used with `String.prototype.slice()` directly.
 */

import { z } from 'zod';

/**
 * Wire protocol version.
 * Increment when making breaking changes to Capture or the entry point.
 */
export const WIRE_VERSION = 1 as const;

/**
 * Check if a wire version is compatible with this host.
 * Exact match only.
 */
export function isVersionCompatible(version: number): boolean {
  return version === WIRE_VERSION;
}

/**
 * A region of source text annotated by a plugin.
 */
export interface Capture {
  /** UTF-16 offset where the capture starts */
  start: number;
  /** UTF-16 offset where the capture ends (exclusive) */
  end: number;
  /** Capture name, e.g. "keyword", "function.method", "string.special" */
  capture: string;
}

/**
 * A capture that passed host validation against its source text.
 */
export type Span = Capture;

/**
 * A region the plugin wants highlighted with another language.
 */
export interface Injection {
  start: number;
  end: number;
  /** Language ID to inject (e.g. "javascript" inside an HTML script tag) */
  language: string;
  includeChildren: boolean;
}

/**
 * Result of one highlight call.
 */
export interface ParseResult {
  spans: Capture[];
  injections: Injection[];
}

const offsetSchema = z.number().int().nonnegative();

export const captureSchema: z.ZodType<Capture, z.ZodTypeDef, unknown> = z.object({
  start: offsetSchema,
  end: offsetSchema,
  capture: z.string(),
});

export const injectionSchema: z.ZodType<Injection, z.ZodTypeDef, unknown> = z.object({
  start: offsetSchema,
  end: offsetSchema,
  language: z.string().min(1),
  includeChildren: z.boolean().default(false),
});

export const parseResultSchema = z.object({
  spans: z.array(z.unknown()),
  injections: z.array(z.unknown()).default([]),
});

/**
 * Outcome of decoding a raw plugin payload.
 */
export interface DecodedParseResult {
  spans: Capture[];
  injections: Injection[];
  /** Entries present in the payload but rejected by the schema */
  rejected: number;
  /** Set when the payload itself is not a ParseResult */
  error?: string;
}

/**
 * Decode a raw payload, keeping every well-formed entry.
 *
 * A broken plugin yields partial output rather than a failure: entries that
 * do not match the schema are counted in `rejected` and skipped. Bounds are
 * not checked here; that needs the source text (see the invoker).
 */
export function decodeParseResult(raw: unknown): DecodedParseResult {
  const envelope = parseResultSchema.safeParse(raw);
  if (!envelope.success) {
    return {
      spans: [],
      injections: [],
      rejected: 0,
      error: envelope.error.issues.map((issue) => issue.message).join('; '),
    };
  }

  const spans: Capture[] = [];
  const injections: Injection[] = [];
  let rejected = 0;

  for (const entry of envelope.data.spans) {
    const parsed = captureSchema.safeParse(entry);
    if (parsed.success) {
      spans.push(parsed.data);
    } else {
      rejected++;
    }
  }

  for (const entry of envelope.data.injections) {
    const parsed = injectionSchema.safeParse(entry);
    if (parsed.success) {
      injections.push(parsed.data);
    } else {
      rejected++;
    }
  }

  return { spans, injections, rejected };
}
