/**
 * Decoded pathname of a request URL, without the query string. Falls back to
 * the raw pathname when it is not valid percent-encoding.
 */
export function normalizePath(url: string): string {
  const [pathname] = url.split('?');
  try {
    return decodeURIComponent(pathname || '/');
  } catch {
    return pathname || '/';
  }
}
