/**
 * Capture name to presentation tag classification
 *
 * Shared vocabulary across all grammar plugins. Rules are checked in order;
 * the first match wins.
 */

export type CaptureTag = 'k' | 'f' | 's' | 'c' | 't' | 'v' | 'n' | 'o' | 'p' | 'tg' | 'at';

interface TagRule {
  tag: CaptureTag;
  /** Names starting with any of these */
  prefixes: readonly string[];
  /** Names equal to any of these */
  exact?: readonly string[];
}

const TAG_RULES: readonly TagRule[] = [
  { tag: 'k', prefixes: ['keyword'], exact: ['include', 'conditional'] },
  { tag: 'f', prefixes: ['function', 'method'] },
  { tag: 's', prefixes: ['string'], exact: ['character'] },
  { tag: 'c', prefixes: ['comment'] },
  { tag: 't', prefixes: ['type'] },
  { tag: 'v', prefixes: ['variable'] },
  { tag: 'n', prefixes: ['number'], exact: ['float'] },
  { tag: 'o', prefixes: ['operator'] },
  { tag: 'p', prefixes: ['punctuation'] },
  { tag: 'tg', prefixes: ['tag'] },
  { tag: 'at', prefixes: ['attribute'] },
];

/**
 * Tag for a capture name, or undefined when the name is not part of the
 * vocabulary (rendered as plain text).
 *
 * @example tagForCapture('keyword.return') // 'k'
 */
export function tagForCapture(capture: string): CaptureTag | undefined {
  for (const rule of TAG_RULES) {
    if (rule.exact?.includes(capture) || rule.prefixes.some((prefix) => capture.startsWith(prefix))) {
      return rule.tag;
    }
  }
  return undefined;
}
