export interface IdentitySource {
  readonly remoteAddress?: string;
  readonly forwardedFor?: string;
  readonly trustForwardedFor: boolean;
}

/**
 * The first X-Forwarded-For hop wins over the socket address when proxies
 * are trusted. Returns "" when neither yields an address.
 */
export function resolveIdentity(source: IdentitySource): string {
  if (source.trustForwardedFor && source.forwardedFor) {
    const first = source.forwardedFor.split(",")[0]?.trim();
    if (first) return first;
  }
  return source.remoteAddress?.trim() ?? "";
}
