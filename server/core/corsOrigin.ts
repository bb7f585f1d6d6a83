function compile(item: string): string | RegExp | undefined {
  if (item.startsWith('/') && item.endsWith('/') && item.length > 2) {
    try {
      return new RegExp(item.slice(1, -1));
    } catch {
      return undefined;
    }
  }
  return item;
}

/**
 * Check if origin is allowed by a comma-separated list of exact origins and
 * `/regex/` patterns. An empty list allows every origin.
 */
export function isOriginAllowed(origin: string | undefined, allowed?: string): boolean {
  if (!allowed) return true;
  if (!origin) return false;

  return allowed
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .map(compile)
    .some((item) => (item instanceof RegExp ? item.test(origin) : item === origin));
}
