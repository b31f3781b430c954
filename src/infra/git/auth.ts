/**
 * Authenticated clone URL construction
 */

/** `user@host:path` (scp-like syntax, no scheme) */
const SCP_LIKE_URL = /^[\w.-]+@([\w.-]+):(?!\/)(.+)$/;

/** Port written in the authority, including a default one the URL API drops */
const EXPLICIT_PORT = /^https:\/\/(?:[^@/?#]*@)?(?:\[[^\]]*\]|[^/:?#]+):(\d+)(?:[/?#]|$)/;

export const TOKEN_USERNAME = 'x-access-token';

/**
 * Rewrite SSH shorthand to HTTPS and ensure a `.git` suffix.
 * Returns the URL unchanged (apart from trimming) when no rule applies.
 */
export function normalizeRepoUrl(repoUrl: string): string {
  let normalized = repoUrl.trim();

  const scpLike = SCP_LIKE_URL.exec(normalized);
  if (scpLike) {
    const [, host, path] = scpLike;
    normalized = `https://${host}/${path}`;
  }

  if (!normalized.endsWith('.git')) {
    normalized = normalized.replace(/\/+$/, '') + '.git';
  }
  return normalized;
}

/**
 * Build the clone URL carrying `x-access-token:<token>@` in its authority.
 *
 * Only HTTPS URLs are rewritten; anything else is returned exactly as given.
 * Host and explicit port are kept; existing credentials are replaced.
 */
export function buildAuthUrl(repoUrl: string, token: string): string {
  const normalized = normalizeRepoUrl(repoUrl);
  if (!normalized.startsWith('https://')) {
    return repoUrl;
  }

  let url: URL;
  try {
    url = new URL(normalized);
  } catch {
    return repoUrl;
  }

  url.username = TOKEN_USERNAME;
  url.password = token;

  const explicitPort = EXPLICIT_PORT.exec(normalized)?.[1];
  if (explicitPort !== undefined && url.port === '') {
    return `${url.protocol}//${url.username}:${url.password}@${url.host}:${explicitPort}${url.pathname}${url.search}${url.hash}`;
  }
  return url.toString();
}
