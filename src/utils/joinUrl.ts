/**
 * Joins a base URL and a path, stripping redundant separators from both.
 *
 * @example
 * joinUrl('https://api.example.com/v0/', '/items/'); // 'https://api.example.com/v0/items'
 */
export function joinUrl(baseUrl: string, path: string): string {
  return [baseUrl, path].map((part) => part.replace(/^\/+|\/+$/g, '')).join('/');
}
