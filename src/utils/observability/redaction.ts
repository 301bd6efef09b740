const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential|access[_-]?key)/i;
const CONTENT_KEY_PATTERN = /^(prompt|content|html|currentHtml|generatedHtml|body|messages|systemPrompt|text)$/i;

const DATA_URL_PATTERN = /data:([a-z]+\/[a-z0-9.+-]+)?;base64,[A-Za-z0-9+/=]+/gi;
const BEARER_PATTERN = /\b(Bearer|Client-ID)\s+[A-Za-z0-9._~+/=-]+/g;

type RedactOptions = {
  depth?: number;
};

function maskDataUrl(match: string, mime: string | undefined): string {
  return `[DATA_URL ${mime ?? 'unknown'} len=${match.length}]`;
}

function redactFreeText(value: string): string {
  return value
    .replace(DATA_URL_PATTERN, maskDataUrl)
    .replace(BEARER_PATTERN, (_match, scheme: string) => `${scheme} [REDACTED]`);
}

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  return redactFreeText(value);
}

function redactUnknown(
  value: unknown,
  key?: string,
  options: RedactOptions = {},
): unknown {
  const depth = options.depth ?? 0;
  if (depth > 6) return '[TRUNCATED]';

  if (value === null || value === undefined) return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactFreeText(value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (typeof value === 'string') {
    return redactStringByKey(key, value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return `[REDACTED_ARRAY len=${value.length}]`;
    }
    return value.map((item) => redactUnknown(item, key, { depth: depth + 1 }));
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      if (SECRET_KEY_PATTERN.test(childKey)) {
        result[childKey] = '[REDACTED]';
        continue;
      }
      result[childKey] = redactUnknown(childValue, childKey, { depth: depth + 1 });
    }
    return result;
  }

  return String(value);
}

export function redactSecrets(value: Record<string, unknown>): Record<string, unknown>;
export function redactSecrets(value: string): string;
export function redactSecrets(value: Record<string, unknown> | string): Record<string, unknown> | string {
  if (typeof value === 'string') {
    return redactFreeText(value);
  }
  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    result[key] = SECRET_KEY_PATTERN.test(key) ? '[REDACTED]' : redactUnknown(child, key, { depth: 1 });
  }
  return result;
}

/**
 * Shorten a value for logs, e.g. the first characters of a generated page.
 */
export function safeSnippet(value: string, maxLength = 140): string {
  const cleaned = redactFreeText(value);
  if (cleaned.length <= maxLength) return cleaned;
  return `${cleaned.slice(0, maxLength)}...(truncated)`;
}
