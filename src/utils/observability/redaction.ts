const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential|encryption[_-]?key|auth[_-]?tag|client[_-]?secret)/i;
const ADDRESS_KEY_PATTERN = /^(account|accountId|sender|senderEmail|recipient|recipients|to|cc|from|userEmail|member|members|createdBy|creator)$/i;
const CONTENT_KEY_PATTERN = /^(body|subject|snippet|message|text|content|description|sourceQuote|query)$/i;

const EMAIL_PATTERN = /([A-Za-z0-9._%+-])[A-Za-z0-9._%+-]*@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g;

type RedactOptions = {
  depth?: number;
};

/**
 * Mask the local part of an e-mail address, keeping its first character and domain.
 * Values that are not addresses are masked entirely.
 */
export function redactAddress(value: string): string {
  const at = value.lastIndexOf('@');
  if (at <= 0) return '***';
  const local = value.slice(0, at).replace(/^.*</, '').trim();
  const domain = value.slice(at + 1).replace(/>.*$/, '').trim();
  if (!local || !domain) return '***';
  return `${local[0]}***@${domain}`;
}

function maskEmailsInText(value: string): string {
  return value.replace(EMAIL_PATTERN, (_match, first: string, domain: string) => `${first}***@${domain}`);
}

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  if (key && ADDRESS_KEY_PATTERN.test(key)) {
    return redactAddress(value);
  }
  return maskEmailsInText(value);
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
      message: maskEmailsInText(value.message),
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
 * Redact a log payload. Record-shaped input always yields a record.
 */
export function redactSecrets(value: Record<string, unknown>): Record<string, unknown>;
export function redactSecrets(value: string): string;
export function redactSecrets(value: Record<string, unknown> | string): Record<string, unknown> | string {
  if (typeof value === 'string') {
    return maskEmailsInText(value);
  }
  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    result[key] = SECRET_KEY_PATTERN.test(key) ? '[REDACTED]' : redactUnknown(child, key, { depth: 1 });
  }
  return result;
}
