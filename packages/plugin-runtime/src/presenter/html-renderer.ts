/**
 * Span renderer
 *
 * Turns source text plus untrusted, possibly overlapping spans into tagged
 * HTML. Offsets address the unescaped source; escaping happens only when a
 * segment is emitted.
 */

import type { Span } from '@sprig/plugin-contracts';
import { tagForCapture, type CaptureTag } from './capture-tags.js';

/**
 * A contiguous piece of the output. Segments partition the source: joining
 * their `text` reproduces it exactly.
 */
export interface Segment {
  start: number;
  end: number;
  text: string;
  /** Absent for plain text and unmapped captures */
  tag?: CaptureTag;
  /** Capture name the segment came from */
  capture?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

/**
 * Escape `& < > "`. Nothing else is touched.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Resolve spans into segments.
 *
 * Spans are ordered by start (stable, so emission order breaks ties). A span
 * starting inside text already emitted is dropped whole: first writer wins.
 * A zero-width span still yields an empty tagged segment.
 */
export function toSegments(source: string, spans: readonly Span[]): Segment[] {
  // Array.prototype.sort is stable
  const ordered = [...spans].sort((a, b) => a.start - b.start);
  const segments: Segment[] = [];
  let pos = 0;

  for (const span of ordered) {
    if (span.start < pos || span.end > source.length || span.start > span.end) {
      continue;
    }
    if (span.start > pos) {
      segments.push({ start: pos, end: span.start, text: source.slice(pos, span.start) });
    }
    segments.push({
      start: span.start,
      end: span.end,
      text: source.slice(span.start, span.end),
      tag: tagForCapture(span.capture),
      capture: span.capture,
    });
    pos = span.end;
  }

  if (pos < source.length) {
    segments.push({ start: pos, end: source.length, text: source.slice(pos) });
  }

  return segments;
}

/**
 * Render spans over source as `<a-TAG>` elements.
 *
 * @example
 * spansToHtml('hello', [{ start: 0, end: 5, capture: 'string' }]) // '<a-s>hello</a-s>'
 */
export function spansToHtml(source: string, spans: readonly Span[]): string {
  let html = '';
  for (const segment of toSegments(source, spans)) {
    const text = escapeHtml(segment.text);
    html += segment.tag ? `<a-${segment.tag}>${text}</a-${segment.tag}>` : text;
  }
  return html;
}
