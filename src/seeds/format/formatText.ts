export function formatText(urls: Iterable<string>): string {
  return [...urls]
    .sort()
    .map((url) => `${url}\n`)
    .join('');
}
