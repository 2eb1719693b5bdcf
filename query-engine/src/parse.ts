import { load } from "cheerio";
import { SUMMARY_SENTENCES } from "./constants";
import { collapseWhitespace, trimTo } from "./utils";

const COMMENTS = /<!--[\s\S]*?-->/g;
const BLOCKS = /<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const TAGS = /<[^>]*>/g;

/**
 * Reduces markup to plain text. Never throws on malformed input and is
 * idempotent: `stripMarkup(stripMarkup(x)) === stripMarkup(x)`. Entities are
 * left as they are.
 */
export function stripMarkup(html: string): string {
  return collapseWhitespace(html.replace(COMMENTS, " ").replace(BLOCKS, " ").replace(TAGS, " "));
}

export function extractTitle(html: string): string | undefined {
  const $ = load(html);
  const title =
    $("meta[property='og:title']").attr("content") ||
    $("title").first().text() ||
    $("h1").first().text();
  return trimTo(title, 200) || undefined;
}

const ABBREVIATIONS = new Set([
  "mr", "mrs", "ms", "dr", "prof", "sr", "jr", "st", "mt", "ft",
  "gen", "col", "lt", "sgt", "capt", "gov", "sen", "rep", "rev",
  "vs", "etc", "inc", "ltd", "co", "corp", "fig", "approx",
  "e.g", "i.e", "cf", "al",
]);

const BOUNDARY = /([.!?]+)(["'”’)\]]*)\s+/g;

function isSentenceEnd(before: string, terminator: string, next: string): boolean {
  if (/\p{Ll}/u.test(next)) return false;
  if (terminator !== ".") return true;

  const word = before.slice(before.lastIndexOf(" ") + 1).replace(/^["'“‘(\[]+/, "");
  if (/^no$/i.test(word)) return !/\d/.test(next); // "No. 5"
  if (/^\p{L}$/u.test(word)) return false; // initial, "J. R. R. Tolkien"
  if (/^(?:\p{L}\.)+\p{L}$/u.test(word)) return false; // dotted acronym, "U.S."
  return !ABBREVIATIONS.has(word.toLowerCase());
}

export function splitSentences(text: string): string[] {
  const clean = collapseWhitespace(text);
  const sentences: string[] = [];
  let start = 0;

  for (const match of clean.matchAll(BOUNDARY)) {
    const at = match.index ?? 0;
    const next = clean.charAt(at + match[0].length);
    if (!isSentenceEnd(clean.slice(start, at), match[1], next)) continue;
    sentences.push(clean.slice(start, at + match[1].length + match[2].length));
    start = at + match[0].length;
  }

  const tail = clean.slice(start);
  if (tail) sentences.push(tail);
  return sentences;
}

export function summarize(text: string, maxSentences = SUMMARY_SENTENCES): string {
  const sentences = splitSentences(text);
  const kept = sentences.slice(0, maxSentences).join(" ");
  return sentences.length > maxSentences ? `${kept} …` : kept;
}
