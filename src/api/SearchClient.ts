import type { AxiosInstance } from "axios";
import { XMLParser } from "fast-xml-parser";
import { setTimeout as sleep } from "node:timers/promises";
import { RemoteServiceError, toRemoteServiceError } from "../errors.js";
import type { SearchOptions, SearchPage, SearchResultEntry } from "../types.js";

// ─── Constants ───────────────────────────────────────────────────

const SEARCH_PATH = "/search/";

// Elements that may appear once or many times in an Atom feed.
const ARRAY_TAGS = new Set(["entry", "link"]);

type XmlNode = Record<string, unknown>;

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asNodes(value: unknown): XmlNode[] {
  return Array.isArray(value) ? value.filter(isXmlNode) : [];
}

/** Text of an element that may be a plain value or an object with #text. */
function textOf(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (isXmlNode(value) && typeof value["#text"] === "string") return value["#text"];
  return null;
}

function attr(node: XmlNode, name: string): string | null {
  const value = node[`@${name}`];
  return typeof value === "string" ? value : null;
}

/** Build the first-page query: the text plus one `cs:<uri>` term per scheme. */
export function buildSearchParams(query: string, schemeUris: readonly string[] = []): URLSearchParams {
  const params = new URLSearchParams({ format: "atom" });
  params.append("q", query);
  for (const uri of schemeUris) params.append("q", `cs:${uri}`);
  return params;
}

// ─── Client ──────────────────────────────────────────────────────

export class SearchClient {
  private parser: XMLParser;

  constructor(
    private readonly http: AxiosInstance,
    private readonly baseUrl: string,
    private readonly defaultDelayMs: number = 1_000
  ) {
    this.parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: "@",
      removeNSPrefix: true,
      isArray: (tagName) => ARRAY_TAGS.has(tagName),
      parseTagValue: false,
      trimValues: true,
    });
  }

  /**
   * Lazily page through the service's search results. Each page is only
   * requested once the consumer has pulled every entry of the previous one;
   * a consumer that stops iterating stops the fetching too.
   */
  async *search(query: string, options: SearchOptions = {}): AsyncGenerator<SearchResultEntry, void, undefined> {
    const limit = options.limit ?? 0;
    const delayMs = options.delayMs ?? this.defaultDelayMs;
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
    }

    let page = await this.fetchFirstPage(query, options.schemeUris ?? []);
    let count = 0;

    while (true) {
      for (const entry of page.entries) {
        yield entry;
        count++;
        if (limit > 0 && count >= limit) return;
      }

      if (!page.next) return;
      if (delayMs > 0) await sleep(delayMs);
      page = await this.fetchPage(page.next);
    }
  }

  async fetchFirstPage(query: string, schemeUris: readonly string[]): Promise<SearchPage> {
    const url = `${this.baseUrl}${SEARCH_PATH}`;
    return this.request(url, buildSearchParams(query, schemeUris));
  }

  /** Follow a service-provided next link verbatim. */
  async fetchPage(url: string): Promise<SearchPage> {
    return this.request(url);
  }

  private async request(url: string, params?: URLSearchParams): Promise<SearchPage> {
    let body: unknown;
    try {
      ({ data: body } = await this.http.get<unknown>(url, {
        params,
        responseType: "text",
        headers: { Accept: "application/atom+xml" },
      }));
    } catch (err) {
      throw toRemoteServiceError(err, url);
    }
    if (typeof body !== "string") {
      throw new RemoteServiceError(`Response from ${url} was not an Atom feed`, url);
    }
    return this.parseFeed(body, url);
  }

  // ── Feed parser ──────────────────────────────────────────────

  parseFeed(xml: string, url = "feed"): SearchPage {
    let parsed: unknown;
    try {
      parsed = this.parser.parse(xml, true);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new RemoteServiceError(`Could not parse Atom feed from ${url}: ${detail}`, url, null, { cause: err });
    }

    if (!isXmlNode(parsed) || !("feed" in parsed)) {
      throw new RemoteServiceError(`Response from ${url} has no Atom <feed> element`, url);
    }
    // an empty <feed> parses to "" rather than an object
    const feed: XmlNode = isXmlNode(parsed.feed) ? parsed.feed : {};

    const entries: SearchResultEntry[] = [];
    for (const entry of asNodes(feed.entry)) {
      const title = textOf(entry.title);
      // the first link is the entity itself; later ones are alternate serializations
      const link = asNodes(entry.link)[0];
      const uri = link ? attr(link, "href") : null;
      if (title && uri) entries.push({ title, uri });
    }

    const nextLink = asNodes(feed.link).find((l) => attr(l, "rel") === "next");
    const next = nextLink ? attr(nextLink, "href") : null;

    return { entries, next };
  }
}
