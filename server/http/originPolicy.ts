/**
 * Requests without an Origin header are same-origin and always allowed;
 * anything else must appear on the allow-list exactly.
 */
export function isOriginAllowed(
  origin: string | undefined,
  allowedOrigins: readonly string[]
): boolean {
  if (!origin) {
    return true;
  }
  return allowedOrigins.includes(origin);
}
