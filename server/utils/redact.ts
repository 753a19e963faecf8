const SECRET_KEY_PATTERN = /token|secret|apikey|api_key|password|authorization/i;

export function maskSecret(value: string): string {
  return value.length > 6 ? `${value.slice(0, 3)}***${value.slice(-2)}` : '***';
}

export function redactSecrets(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (typeof value !== 'object') return value;

  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      out[key] = typeof entry === 'string' ? maskSecret(entry) : '***';
    } else if (typeof entry === 'object') {
      out[key] = redactSecrets(entry);
    } else {
      out[key] = entry;
    }
  }
  return out;
}
