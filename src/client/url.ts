export type QueryValue = string | number | boolean | ReadonlyArray<string | number>;
export type QueryParams = Record<string, QueryValue | undefined>;

/**
 * Append query parameters to a URL. Arrays repeat the key, undefined values
 * are left out.
 */
export function buildUrl(base: string, query: QueryParams = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) url.searchParams.append(key, String(item));
    } else {
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
}
