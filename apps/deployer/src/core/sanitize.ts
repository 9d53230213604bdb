export const TAIL_LIMIT = 2000;
export const REDACTION_MARKER = '***';

/**
 * `KEY: value` / `KEY=value` lines whose key looks sensitive. Key-name
 * matching is heuristic: a secret printed under an innocuous key passes
 * through unless its value is also listed in `knownSecrets`.
 */
const SENSITIVE_LINE = /^([ \t]*)([^\s:=]*(?:secret|token|password|passwd|pwd|key)[^:=\r\n]*?)[ \t]*[:=][ \t]*([^\r\n]+)/gim;

const MIN_KNOWN_SECRET_LENGTH = 4;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export function redactSensitiveLines(text: string): string {
  return text.replace(SENSITIVE_LINE, (_match, indent: string, key: string) => `${indent}${key}: ${REDACTION_MARKER}`);
}

export function redactKnownValues(text: string, knownSecrets: Iterable<string>): string {
  const values = [...new Set(knownSecrets)]
    .filter((value) => value.length >= MIN_KNOWN_SECRET_LENGTH)
    // Longest first so a secret containing another one is replaced whole.
    .sort((a, b) => b.length - a.length);

  if (values.length === 0) {
    return text;
  }

  const pattern = new RegExp(values.map(escapeRegExp).join('|'), 'g');
  return text.replace(pattern, REDACTION_MARKER);
}

export function sanitizeOutput(text: string, knownSecrets: Iterable<string> = []): string {
  return redactKnownValues(redactSensitiveLines(text), knownSecrets);
}

const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

/**
 * Redacts first, then keeps the last `limit` UTF-16 units. A cut through a
 * surrogate pair drops the orphaned half.
 */
export function sanitizeTail(text: string, knownSecrets: Iterable<string> = [], limit = TAIL_LIMIT): string {
  const sanitized = sanitizeOutput(text, knownSecrets);
  if (sanitized.length <= limit) {
    return sanitized;
  }

  const tail = sanitized.slice(-limit);
  return isLowSurrogate(tail.charCodeAt(0)) ? tail.slice(1) : tail;
}
