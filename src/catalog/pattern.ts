export interface ParsedPattern {
  // Sent to the catalog, which understands `*` wildcards itself.
  query?: string;
  exclude?: RegExp;
}

/** A leading `!` turns the pattern into a local anti-pattern. */
export function parseUrlPattern(pattern: string | undefined): ParsedPattern {
  if (!pattern) {
    return {};
  }

  if (pattern.startsWith('!')) {
    return { exclude: wildcardToRegExp(pattern.slice(1)) };
  }

  return { query: pattern };
}

/**
 * True when the anchored wildcard matches the whole URL or its whole host, so
 * `!*.gov` drops every URL served from a `.gov` host.
 */
export function matchesAntiPattern(url: string, exclude: RegExp): boolean {
  if (exclude.test(url)) {
    return true;
  }

  try {
    return exclude.test(new URL(url).hostname);
  } catch {
    return false;
  }
}

export function wildcardToRegExp(wildcard: string): RegExp {
  const body = wildcard
    .split('*')
    .map((literal) => literal.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${body}$`);
}
