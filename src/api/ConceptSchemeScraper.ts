import type { AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { RemoteServiceError, toRemoteServiceError } from "../errors.js";

const SEARCH_PATH = "/search/";

/** "Books / Series" → "books-series" */
export function normalizeSchemeName(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/ /g, "-")
    .replace(/\//g, "-")
    .replace(/---/g, "-");
}

/**
 * Pull concept schemes out of the search page HTML. The first `.facet-box`
 * on the page is assumed to be the concept scheme facet; values keep the
 * `cs:` prefix the facet links use. When two labels normalize to the same
 * name the first one wins (the page lists "Preservation Level" twice).
 */
export function parseConceptSchemeFacets(html: string, url = "search page"): Map<string, string> {
  const $ = cheerio.load(html);
  const facets = $(".facet-box").first();
  if (facets.length === 0) {
    throw new RemoteServiceError(`No .facet-box found on ${url}`, url);
  }

  const schemes = new Map<string, string>();
  facets.find("li a").each((_, el) => {
    const $a = $(el);
    const schemeId = ($a.attr("href") ?? "").replace(/\?q=/g, "");
    const name = normalizeSchemeName($a.find("span").first().text());

    if (name === "" || schemes.has(name)) return;
    schemes.set(name, schemeId);
  });

  return schemes;
}

export class ConceptSchemeScraper {
  constructor(
    private readonly http: AxiosInstance,
    private readonly baseUrl: string
  ) {}

  /** Re-derive the scheme mapping from the live search page. Never cached. */
  async discover(): Promise<Map<string, string>> {
    const url = `${this.baseUrl}${SEARCH_PATH}`;
    let html: unknown;
    try {
      ({ data: html } = await this.http.get<unknown>(url, {
        responseType: "text",
        headers: { Accept: "text/html" },
      }));
    } catch (err) {
      throw toRemoteServiceError(err, url);
    }
    if (typeof html !== "string") {
      throw new RemoteServiceError(`Response from ${url} was not HTML`, url);
    }
    return parseConceptSchemeFacets(html, url);
  }
}
