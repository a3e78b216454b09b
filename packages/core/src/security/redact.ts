export const REDACTED = 'REDACTED';

export const redactSecrets = (value: string) =>
  value
    .replace(/sk-[A-Za-z0-9_-]{20,}/g, `sk-${REDACTED}`)
    .replace(/\bBearer\s+[A-Za-z0-9._-]+\b/gi, `Bearer ${REDACTED}`);
