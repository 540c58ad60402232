import type { GitSource } from '../dtos/git-source.dto';

type CredentialFields = Pick<GitSource, 'repoUrl' | 'token' | 'username' | 'password'>;

const HTTP_URL_REGEX = /^https?:\/\//i;
const EMBEDDED_CREDENTIALS_REGEX = /(https?:\/\/)[^\s/@]+@/gi;

/**
 * Clone URL with credentials embedded.
 * A token is embedded as the sole principal and wins over username+password.
 * Non-http URLs (ssh, scp-like) are returned unchanged.
 */
export function buildAuthenticatedUrl(source: CredentialFields): string {
  if (!HTTP_URL_REGEX.test(source.repoUrl)) {
    return source.repoUrl;
  }

  let url: URL;
  try {
    url = new URL(source.repoUrl);
  } catch {
    return source.repoUrl;
  }

  if (source.token) {
    url.username = source.token;
    url.password = '';
  } else if (source.username && source.password) {
    url.username = source.username;
    url.password = source.password;
  } else {
    return source.repoUrl;
  }

  return url.toString();
}

/** Bearer token for hosted APIs: the token, else the password. */
export function getApiToken(source: Pick<GitSource, 'token' | 'password'>): string | undefined {
  return source.token ?? source.password;
}

/** Masks credentials embedded in any http(s) URL inside `text`. */
export function redactUrl(text: string): string {
  return text.replace(EMBEDDED_CREDENTIALS_REGEX, '$1***@');
}
