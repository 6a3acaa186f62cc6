// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /basic\s+[A-Za-z0-9+/=]{8,}/gi,
  /authorization:\s*\S+/gi,
  /token['":\s=]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /secret['":\s=]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /(password|pass)['":\s=]+['"]?\S+['"]?/gi,
  /\/\/[^/\s:@]+:[^/\s@]+@/g,
];

const SECRET_KEYS = /^(token|secret|password|pass|key|authorization|bearer)$/i;

/**
 * Redact potential secret values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, (match) =>
      match.startsWith('//') ? '//[REDACTED]@' : '[REDACTED]',
    );
  }
  return output;
}

/**
 * Safely stringify an object, redacting known secret keys.
 */
export function safeStringify(obj: unknown, space?: number): string {
  const seen = new WeakSet();
  return JSON.stringify(
    obj,
    (key, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (typeof value === 'string' && value.length > 0 && SECRET_KEYS.test(key)) {
        return '[REDACTED]';
      }
      return value;
    },
    space,
  );
}
