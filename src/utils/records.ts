export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Keys an agent or caller may use to claim an identity; the principal wins
const IDENTITY_KEYS = new Set(['user_id', 'userid', 'userId']);

export function withoutIdentityFields(args: Record<string, unknown>): Record<string, unknown> {
  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    if (!IDENTITY_KEYS.has(key)) {
      cleaned[key] = value;
    }
  }
  return cleaned;
}
