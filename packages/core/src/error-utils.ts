/** Extract a human-readable message from an unknown caught value. */
export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Show only the tail of a secret, e.g. "...5678abcd". */
export function maskSecret(secret: string, visible = 8): string {
  if (secret.length <= visible) return "*".repeat(secret.length);
  return `...${secret.slice(-visible)}`;
}
