/**
 * In-process matchers for the sync path.
 *
 * These only filter; candidate order is kept as received. Ranking belongs
 * to the external matching engine.
 */

export type CaseMode = 'smart' | 'ignore' | 'respect';

export interface Matcher {
  readonly name: string;
  /** Changes whenever the matcher's behaviour changes; invalidates narrowing reuse. */
  readonly configKey: string;
  /**
   * True when every line matching `q + more` also matches `q`, so the
   * previous match set may stand in for the full source.
   */
  readonly narrowingSafe: boolean;
  filter(lines: readonly string[], query: string): string[];
}

function ignoresCase(caseMode: CaseMode, query: string): boolean {
  if (caseMode === 'ignore') return true;
  if (caseMode === 'respect') return false;
  return query === query.toLowerCase();
}

function isSubsequence(needle: string, haystack: string): boolean {
  let i = 0;
  for (let j = 0; j < haystack.length && i < needle.length; j++) {
    if (haystack[j] === needle[i]) i++;
  }
  return i === needle.length;
}

/** Characters of the query must appear in order, not necessarily adjacent. */
export function createFuzzyMatcher(caseMode: CaseMode = 'smart'): Matcher {
  return {
    name: 'fuzzy',
    configKey: `fuzzy:${caseMode}`,
    narrowingSafe: true,
    filter(lines, query) {
      if (query.length === 0) return [...lines];
      const fold = ignoresCase(caseMode, query);
      const needle = fold ? query.toLowerCase() : query;
      return lines.filter((line) => isSubsequence(needle, fold ? line.toLowerCase() : line));
    },
  };
}

export function createSubstringMatcher(caseMode: CaseMode = 'smart'): Matcher {
  return {
    name: 'substring',
    configKey: `substring:${caseMode}`,
    narrowingSafe: true,
    filter(lines, query) {
      if (query.length === 0) return [...lines];
      const fold = ignoresCase(caseMode, query);
      const needle = fold ? query.toLowerCase() : query;
      return lines.filter((line) => (fold ? line.toLowerCase() : line).includes(needle));
    },
  };
}

/**
 * Regular expression matching. Extending a pattern can widen it
 * (`a` → `a|b`), so previous results are never reused.
 */
export function createRegexMatcher(caseMode: CaseMode = 'smart'): Matcher {
  return {
    name: 'regex',
    configKey: `regex:${caseMode}`,
    narrowingSafe: false,
    filter(lines, query) {
      if (query.length === 0) return [...lines];
      let pattern: RegExp;
      try {
        pattern = new RegExp(query, ignoresCase(caseMode, query) ? 'i' : '');
      } catch {
        // incomplete pattern while typing
        return [];
      }
      return lines.filter((line) => pattern.test(line));
    },
  };
}

export type MatcherName = 'fuzzy' | 'substring' | 'regex';

export function createMatcher(name: MatcherName, caseMode: CaseMode = 'smart'): Matcher {
  switch (name) {
    case 'fuzzy':
      return createFuzzyMatcher(caseMode);
    case 'substring':
      return createSubstringMatcher(caseMode);
    case 'regex':
      return createRegexMatcher(caseMode);
  }
}
