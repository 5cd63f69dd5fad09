// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /authorization:\s*\S+/gi,
  /token['":\s]+['"]?[A-Za-z0-9_\-./]{20,}['"]?/gi,
  /secret['":\s]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /password['":\s]+['"]?\S+['"]?/gi,
  /key['":\s]+['"]?[A-Za-z0-9_\-./]{16,}['"]?/gi,
];

const SECRET_KEY = /^(token|secret|password|key|apikey|api_key|authorization|bearer)$/i;

/**
 * Redact potential secret values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}

/**
 * Safely stringify a value for log output. Secret-looking keys are masked,
 * cycles become "[Circular]" and errors are reduced to name and message.
 * An object reached twice along different paths is written both times.
 */
export function safeStringify(obj: unknown, space?: number): string {
  // Objects on the path from the root to the value being written.
  const ancestors: unknown[] = [];
  return JSON.stringify(
    obj,
    function (this: unknown, key: string, value: unknown) {
      while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
        ancestors.pop();
      }
      if (value instanceof Error) {
        const reduced = { name: value.name, message: redact(value.message) };
        ancestors.push(reduced);
        return reduced;
      }
      if (typeof value === 'bigint') return value.toString();
      if (typeof value === 'object' && value !== null) {
        if (ancestors.includes(value)) return '[Circular]';
        ancestors.push(value);
      }
      if (typeof value === 'string' && SECRET_KEY.test(key)) {
        return '[REDACTED]';
      }
      return value;
    },
    space,
  );
}
