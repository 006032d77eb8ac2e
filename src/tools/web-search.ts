/**
 * Web search backend
 *
 * - Brave Search API when BRAVE_SEARCH_API_KEY is set (count=8, 15 s timeout)
 * - Wikipedia's search API otherwise, or when Brave fails (srlimit=5, 10 s timeout)
 *
 * Results are formatted for the model:
 *   1. Title
 *      snippet
 *      URL: https://…
 */

import { z } from "zod";
import { CoreError, describeError } from "../errors.js";
import { combineAbortSignals } from "./abort.js";

const BRAVE_ENDPOINT = "https://api.search.brave.com/res/v1/web/search";
const WIKIPEDIA_ENDPOINT = "https://en.wikipedia.org/w/api.php";
const BRAVE_TIMEOUT_MS = 15_000;
const WIKIPEDIA_TIMEOUT_MS = 10_000;
const BRAVE_COUNT = 8;
const WIKIPEDIA_LIMIT = 5;

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().default(""),
            description: z.string().default(""),
            url: z.string().default(""),
          }),
        )
        .default([]),
    })
    .optional(),
});

const WikipediaResponseSchema = z.object({
  query: z
    .object({
      search: z
        .array(
          z.object({
            title: z.string(),
            snippet: z.string().default(""),
          }),
        )
        .default([]),
    })
    .optional(),
});

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface WebSearchOptions {
  /** Brave key; defaults to BRAVE_SEARCH_API_KEY */
  apiKey?: string;
  fetch?: FetchLike;
  signal?: AbortSignal;
}

export interface WebSearchResult {
  output: string;
  source: "brave" | "wikipedia";
  count: number;
}

export function stripHtml(text: string): string {
  return text.replace(/<[^>]+>/g, "");
}

async function getJson(fetchFn: FetchLike, url: string, init: RequestInit, label: string): Promise<unknown> {
  const response = await fetchFn(url, init);
  if (!response.ok) {
    throw new Error(`${label} HTTP ${response.status}`);
  }
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`${label} returned invalid JSON: ${describeError(err)}`);
  }
}

async function braveSearch(query: string, apiKey: string, fetchFn: FetchLike, signal?: AbortSignal): Promise<WebSearchResult> {
  const url = `${BRAVE_ENDPOINT}?q=${encodeURIComponent(query)}&count=${BRAVE_COUNT}`;
  const raw = await getJson(
    fetchFn,
    url,
    {
      headers: {
        Accept: "application/json",
        "X-Subscription-Token": apiKey,
      },
      signal: combineAbortSignals(signal, AbortSignal.timeout(BRAVE_TIMEOUT_MS)),
    },
    "Brave API",
  );
  const parsed = BraveResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error("Brave API returned an unexpected response");
  }
  const results = (parsed.data.web?.results ?? []).slice(0, BRAVE_COUNT);
  if (results.length === 0) {
    return { output: "No results found.", source: "brave", count: 0 };
  }
  const output = results
    .map((r, i) => `${i + 1}. ${r.title}\n   ${stripHtml(r.description)}\n   URL: ${r.url}\n`)
    .join("\n");
  return { output, source: "brave", count: results.length };
}

async function wikipediaSearch(query: string, fetchFn: FetchLike, signal?: AbortSignal): Promise<WebSearchResult> {
  const url =
    `${WIKIPEDIA_ENDPOINT}?action=query&list=search&srsearch=${encodeURIComponent(query)}` +
    `&format=json&srlimit=${WIKIPEDIA_LIMIT}`;
  const raw = await getJson(
    fetchFn,
    url,
    {
      headers: { "User-Agent": "LittleHelper/1.0 (Desktop App)" },
      signal: combineAbortSignals(signal, AbortSignal.timeout(WIKIPEDIA_TIMEOUT_MS)),
    },
    "Wikipedia API",
  );
  const parsed = WikipediaResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error("Wikipedia API returned an unexpected response");
  }
  const results = (parsed.data.query?.search ?? []).slice(0, WIKIPEDIA_LIMIT);
  if (results.length === 0) {
    return {
      output: "No results found. For full web search, add a Brave Search API key in Settings.",
      source: "wikipedia",
      count: 0,
    };
  }
  let output = "Results from Wikipedia (for full web search, add a Brave Search API key in Settings):\n\n";
  results.forEach((r, i) => {
    output += `${i + 1}. ${r.title}\n   ${stripHtml(r.snippet)}\n   URL: https://en.wikipedia.org/wiki/${encodeURIComponent(r.title)}\n\n`;
  });
  return { output, source: "wikipedia", count: results.length };
}

/**
 * Search the web. Rejects with CoreError(ExecutorFailed) when every backend fails.
 */
export async function webSearch(query: string, options: WebSearchOptions = {}): Promise<WebSearchResult> {
  const fetchFn: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const apiKey = options.apiKey ?? process.env.BRAVE_SEARCH_API_KEY;
  const failures: string[] = [];

  if (apiKey) {
    try {
      return await braveSearch(query, apiKey, fetchFn, options.signal);
    } catch (err) {
      if (options.signal?.aborted) throw err;
      failures.push(describeError(err));
    }
  }

  try {
    return await wikipediaSearch(query, fetchFn, options.signal);
  } catch (err) {
    if (options.signal?.aborted) throw err;
    failures.push(describeError(err));
  }

  throw new CoreError("ExecutorFailed", failures.join("; "), { details: failures.join("\n") });
}
