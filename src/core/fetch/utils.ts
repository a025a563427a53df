// src/core/fetch/utils.ts
export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Key used for visited-URL tracking: fragment and trailing slashes dropped,
 * query kept.
 */
export function normalizeUrl(urlString: string): string {
  const url = new URL(urlString);
  let normalized = `${url.protocol}//${url.host}${url.pathname}`;
  normalized = normalized.replace(/\/+$/, '');

  if (url.search.length > 1) {
    normalized += url.search;
  }

  return normalized;
}

/** The URL to request: fragment dropped, everything else as given. */
export function stripFragment(urlString: string): string {
  const url = new URL(urlString);
  url.hash = '';
  return url.toString();
}

export function resolveUrl(href: string, base: string): string | undefined {
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}

export function isSameHost(a: string, b: string): boolean {
  return new URL(a).hostname.toLowerCase() === new URL(b).hostname.toLowerCase();
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
