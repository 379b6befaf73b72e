import { ConstructURLError } from '../error/constructUrlError.js';
import type { QueryParameter } from '../types/request.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Serializes query parameters into `key=value` pairs joined by `&`, in the order given.
 * Keys and values are percent-encoded individually, so reserved characters inside a value cannot split the pair.
 *
 * @returns The query without a leading `?`, or an empty string for an empty list.
 */
export function encodeQueryParameters(queryParameters: readonly QueryParameter[]): string {
  return queryParameters.map(({ key, value }) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`).join('&');
}

/**
 * Appends query parameters to a base URL and checks the result parses as an absolute URL.
 *
 * - An empty list leaves the base URL untouched.
 * - The result keeps a single `?`: a base that already carries a query is extended with `&`.
 * - Parameters go before a `#fragment` in the base URL, which is kept at the end.
 * - The assembled string is returned as-is, not the normalized `URL.href`.
 */
export function constructUrl(
  baseUrl: string,
  queryParameters: readonly QueryParameter[] = [],
): SafeWrap<ConstructURLError, string> {
  const [errEncode, query] = safeWrap(() => encodeQueryParameters(queryParameters));
  if (errEncode) {
    return [new ConstructURLError('error encoding query parameters', baseUrl, { cause: errEncode }), null];
  }

  const hashIndex = baseUrl.indexOf('#');
  let url = hashIndex === -1 ? baseUrl : baseUrl.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? '' : baseUrl.slice(hashIndex);
  if (query) {
    if (!url.includes('?')) {
      url += '?';
    } else if (!url.endsWith('?') && !url.endsWith('&')) {
      url += '&';
    }

    url += query;
  }

  url += fragment;

  const [errParse] = safeWrap(() => new URL(url));
  if (errParse) {
    return [new ConstructURLError(`error constructing URL, invalid URL ${url}`, url, { cause: errParse }), null];
  }

  return [null, url];
}
