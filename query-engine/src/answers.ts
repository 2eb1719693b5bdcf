export type AnswerContext = {
  query: string;
  /** Markup-free page text. */
  text: string;
  url: string;
};

/**
 * One precise-answer intent. `matches` looks at the normalized query only;
 * `extract` runs per fetched page and returns `undefined` when the page does
 * not carry the answer.
 */
export type AnswerRule = {
  intent: string;
  matches(query: string): boolean;
  extract(ctx: AnswerContext): string | undefined;
};

export function normalizeQuery(query: string): string {
  return query.toLowerCase().replace(/\s+/g, " ").trim();
}

const OFFICE =
  /\b(?:pm|prime minister|(?:vice )?president|chancellor|premier|governor|mayor|ceo|head of state|head of government) of\b/;

const INCUMBENT = /Incumbent\s+(\p{Lu}[\p{L}\p{M}\d.'-]*(?:\s+\p{Lu}[\p{L}\p{M}\d.'-]*)*)\s+since\b/u;

const PROPER_NAME_WORD = /^\p{Lu}[\p{L}.'-]*$/u;

/** "Narendra_Modi" from https://en.wikipedia.org/wiki/Narendra_Modi, if it reads like a person. */
export function nameFromEncyclopediaUrl(url: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }
  if (!/(^|\.)wikipedia\.org$/.test(parsed.hostname) || !parsed.pathname.startsWith("/wiki/")) return undefined;

  let title: string;
  try {
    title = decodeURIComponent(parsed.pathname.slice("/wiki/".length));
  } catch {
    return undefined;
  }

  const words = title.replace(/_/g, " ").trim().split(/\s+/);
  if (words.length < 2 || words.length > 3) return undefined;
  return words.every((w) => PROPER_NAME_WORD.test(w)) ? words.join(" ") : undefined;
}

export const officeHolderRule: AnswerRule = {
  intent: "office-holder",
  matches: (query) => OFFICE.test(normalizeQuery(query)),
  extract: ({ text, url }) => {
    const match = INCUMBENT.exec(text);
    if (match) return match[1];
    return nameFromEncyclopediaUrl(url);
  },
};

export const ANSWER_RULES: readonly AnswerRule[] = [officeHolderRule];

export function rulesFor(query: string, rules: readonly AnswerRule[] = ANSWER_RULES): AnswerRule[] {
  return rules.filter((rule) => rule.matches(query));
}

export function extractAnswer(rules: readonly AnswerRule[], ctx: AnswerContext): string | undefined {
  for (const rule of rules) {
    const answer = rule.extract(ctx)?.trim();
    if (answer) return answer;
  }
  return undefined;
}
