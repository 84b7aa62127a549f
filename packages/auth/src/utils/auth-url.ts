/**
 * OAuth2 Authorization URL building utilities
 * Pure functions for constructing authorization and redirect URLs
 */

/**
 * Query values accepted by the URL builders. `undefined` entries are dropped
 * and arrays are joined with the scope separator.
 * @public
 */
export type QueryParams = Record<string, string | number | boolean | readonly string[] | undefined>;

/**
 * Options for an authorization request.
 * @public
 */
export interface AuthorizationUrlOptions {
  /** CSRF state; generated when omitted */
  state?: string;
  /** Requested scopes; the provider defaults apply when omitted */
  scope?: string | readonly string[];
  /** Overrides the configured redirect URI */
  redirectUri?: string;
  /** Extra provider-specific query parameters, e.g. `kc_idp_hint` */
  extraParams?: QueryParams;
}

/**
 * Encodes params as `application/x-www-form-urlencoded`, in insertion order.
 * @param params - Values to encode
 * @param separator - Joiner for array values
 * @public
 */
export function buildQueryString(params: QueryParams, separator = ' '): string {
  const search = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    search.append(key, isList(value) ? value.join(separator) : String(value));
  }

  return search.toString();
}

/**
 * Appends a query string to a URL, using `&` when the URL already has one.
 * An empty query leaves the URL untouched.
 * @example
 * ```typescript
 * appendQuery('https://idp.example.com/logout', 'redirect_uri=x'); // '...logout?redirect_uri=x'
 * appendQuery('https://idp.example.com/auth?a=1', 'b=2');          // '...auth?a=1&b=2'
 * ```
 * @public
 */
export function appendQuery(url: string, query: string): string {
  const trimmed = query.replace(/^[?&]+/, '');
  if (!trimmed) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${trimmed}`;
}

function isList(value: string | number | boolean | readonly string[]): value is readonly string[] {
  return Array.isArray(value);
}
