import { HTML_PREVIEW_CHARS, NOT_FOUND_MESSAGE } from "./constants";
import type { FetchedSource, Resolution } from "./types";

export type ResolutionJson =
  | { type: "fact"; query: string; answer: string }
  | { type: "summary"; query: string; sources: FetchedSource[] }
  | { error: string };

export function toJson(resolution: Resolution): ResolutionJson {
  switch (resolution.kind) {
    case "fact":
      return { type: "fact", query: resolution.query, answer: resolution.answer };
    case "summary":
      return { type: "summary", query: resolution.query, sources: resolution.sources };
    case "not-found":
      return { error: NOT_FOUND_MESSAGE };
  }
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

// Cut on code points so a surrogate pair is never split.
function preview(content: string): string {
  const chars = Array.from(content);
  return chars.length > HTML_PREVIEW_CHARS ? `${chars.slice(0, HTML_PREVIEW_CHARS).join("")}...` : content;
}

function renderBody(resolution: Resolution): string {
  switch (resolution.kind) {
    case "fact":
      return `<div class="factual-answer">${escapeHtml(resolution.answer)}</div>`;
    case "summary":
      return resolution.sources
        .map((source) => {
          const href = escapeHtml(source.url);
          return [
            `<div class="source">`,
            `  <strong>Source:</strong> <a href="${href}" target="_blank" rel="noopener">${escapeHtml(source.title ?? source.url)}</a>`,
            `  <div class="content">${escapeHtml(preview(source.content))}</div>`,
            `</div>`,
          ].join("\n");
        })
        .join("\n");
    case "not-found":
      return "<p>No results found.</p>";
  }
}

const STYLE = `
    body { font-family: sans-serif; line-height: 1.6; margin: 2em; background-color: #f8f9fa; color: #212529; }
    .container { max-width: 800px; margin: auto; background-color: #ffffff; padding: 2em; border-radius: 8px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
    h1 { color: #343a40; }
    h2 { color: #495057; border-bottom: 1px solid #dee2e6; padding-bottom: 0.3em; }
    .source { margin-bottom: 1.5em; }
    .source a { color: #007bff; text-decoration: none; }
    .content { background-color: #f8f9fa; padding: 1em; border-radius: 5px; white-space: pre-wrap; word-wrap: break-word; }
    .factual-answer { font-size: 1.5em; font-weight: bold; color: #28a745; }`;

export function toHtml(resolution: Resolution): string {
  const query = escapeHtml(resolution.query);
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Search Result: ${query}</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <div class="container">
    <h1>Search Query</h1>
    <p><em>${query}</em></p>
    <h2>Result</h2>
${renderBody(resolution)}
  </div>
</body>
</html>
`;
}
