/**
 * Pull a human-readable message out of a verbose provider error string.
 */

const BYTES_JSON_PATTERN = /b(['"])(\{.*\})\1/s;
const LIBRARY_PREFIX_PATTERN = /^(?:[\w.]+\.)?\w+:\s*\w*Exception\s*-\s*/;
const BARE_PREFIX_PATTERN = /^\w*Exception\s*-\s*/;

/**
 * Extract a readable message, preferring in order:
 * 1. `error.message` / `message` of a JSON object inside a `b'...'` fragment
 * 2. the same fields when the whole string is JSON
 * 3. the text after a `<lib>.<Kind>: <Provider>Exception - ` prefix
 * 4. the raw string
 */
export function extractErrorMessage(error: unknown): string {
  const raw = error instanceof Error ? error.message : String(error);

  const bytesMatch = BYTES_JSON_PATTERN.exec(raw);
  if (bytesMatch?.[2]) {
    const fromBytes = messageFromJson(bytesMatch[2]);
    if (fromBytes !== null) {
      return fromBytes;
    }
  }

  const fromWhole = messageFromJson(raw);
  if (fromWhole !== null) {
    return fromWhole;
  }

  // Provider error messages carry `<Provider>Exception - <body>`; the body may itself be JSON
  for (const pattern of [LIBRARY_PREFIX_PATTERN, BARE_PREFIX_PATTERN]) {
    if (pattern.test(raw)) {
      const rest = raw.replace(pattern, '');
      return messageFromJson(rest) ?? rest;
    }
  }

  return raw;
}

function messageFromJson(text: string): string | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{')) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }

  if ('error' in parsed) {
    const inner = parsed.error;
    if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
      return inner.message;
    }
    if (typeof inner === 'string') {
      return inner;
    }
  }
  if ('message' in parsed && typeof parsed.message === 'string') {
    return parsed.message;
  }
  return null;
}
