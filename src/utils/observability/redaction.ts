const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential|encryption[_-]?key|auth[_-]?tag|client[_-]?secret)/i;
const ADDRESS_KEY_PATTERN = /^(from|to|sender|recipient|email|accountEmail)$/i;
const CONTENT_KEY_PATTERN = /^(body|content|emailBody|prompt|rawText|response|summary|snippet)$/i;

const EMAIL_ADDRESS_PATTERN = /([A-Za-z0-9._%+-])[A-Za-z0-9._%+-]*@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g;

type RedactOptions = {
  depth?: number;
};

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  if (key && ADDRESS_KEY_PATTERN.test(key)) {
    return redactEmailAddress(value);
  }
  return value;
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
      message: redactStringByKey(key, value.message),
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

/**
 * Mask every email address in `value` to its first character and domain,
 * e.g. `"Alice <alice@example.com>"` becomes `"Alice <a***@example.com>"`.
 */
export function redactEmailAddress(value: string): string {
  return value.replace(EMAIL_ADDRESS_PATTERN, (_match, first: string, domain: string) => `${first}***@${domain}`);
}

export function redactSecrets<T extends Record<string, unknown>>(value: T): Record<string, unknown> {
  const redacted = redactUnknown(value);
  return redacted !== null && typeof redacted === 'object' && !Array.isArray(redacted)
    ? Object.fromEntries(Object.entries(redacted))
    : {};
}

export function safeSnippet(value: string, maxLength = 140): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}...(truncated)`;
}
