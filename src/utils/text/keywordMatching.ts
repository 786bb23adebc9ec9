/**
 * Keyword matching over free text
 *
 * Terms are matched case-insensitively. Short alphanumeric terms (three
 * characters or fewer, e.g. "rf", "ai", "ios") must stand alone as a token;
 * longer terms match either anywhere ("substring") or at the start of a
 * word ("wordStart", so "skill" also finds "skills").
 */

export type TermMatchMode = "substring" | "wordStart";

export type CompiledTerm = {
  term: string;
  pattern: RegExp;
};

const SHORT_TOKEN_PATTERN = /^[a-z0-9]{1,3}$/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compile one term into a case-insensitive pattern
 *
 * Short terms get token boundaries even in "substring" mode. This departs
 * from plain substring matching: "Interface Intern" does not hit "rf" and
 * "Maintenance" does not hit "ai".
 */
export function compileTerm(term: string, mode: TermMatchMode): CompiledTerm {
  const escaped = escapeRegExp(term);

  if (SHORT_TOKEN_PATTERN.test(term)) {
    return {
      term,
      pattern: new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`, "i"),
    };
  }

  const source =
    mode === "wordStart" ? `(?<![a-z0-9])${escaped}` : escaped;
  return { term, pattern: new RegExp(source, "i") };
}

export function compileTerms(
  terms: readonly string[],
  mode: TermMatchMode,
): CompiledTerm[] {
  return terms.map((term) => compileTerm(term, mode));
}

/**
 * Distinct terms present in the text, in list order
 */
export function findTerms(text: string, terms: readonly CompiledTerm[]): string[] {
  return terms.filter((t) => t.pattern.test(text)).map((t) => t.term);
}

export function countTerms(text: string, terms: readonly CompiledTerm[]): number {
  let count = 0;
  for (const t of terms) {
    if (t.pattern.test(text)) {
      count++;
    }
  }
  return count;
}

/**
 * First term (in list order) present in the text
 */
export function firstTerm(
  text: string,
  terms: readonly CompiledTerm[],
): string | undefined {
  return terms.find((t) => t.pattern.test(text))?.term;
}

export function containsAnyTerm(
  text: string,
  terms: readonly CompiledTerm[],
): boolean {
  return terms.some((t) => t.pattern.test(text));
}
