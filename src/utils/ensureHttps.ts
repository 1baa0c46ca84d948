/**
 * Absolute base URL for the webhook: adds a scheme when missing (plain HTTP
 * for localhost) and drops trailing slashes.
 */
export const ensureHttps = (url: string): string => {
  const trimmed = url.trim().replace(/\/+$/, '');
  if (/^https?:\/\//.test(trimmed)) {
    return trimmed;
  }

  const host = trimmed.replace(/^\/+/, '');
  if (host.startsWith('localhost') || host.startsWith('127.0.0.1')) {
    return `http://${host}`;
  }
  return `https://${host}`;
};
