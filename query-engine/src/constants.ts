export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

export const FETCH_TIMEOUT_MS = 10_000;
export const WIKI_TIMEOUT_MS = 5_000;
export const RETRY_DELAY_MS = 500;
export const MAX_FETCH_RETRIES = 3;

export const DEFAULT_MAX_RESULTS = 3;
export const MAX_RESULTS_CAP = 5;
export const SUMMARY_SENTENCES = 5;
export const HTML_PREVIEW_CHARS = 800;

export const BING_ENDPOINT = "https://api.bing.microsoft.com/v7.0/search";
export const DUCKDUCKGO_URL = "https://html.duckduckgo.com/html/";
export const WIKI_API_URL = "https://en.wikipedia.org/w/api.php";

export const NOT_FOUND_MESSAGE = "Could not find a relevant answer for that query.";
