import type { AxiosInstance } from "axios";
import { ConceptSchemeScraper } from "./api/ConceptSchemeScraper.js";
import { LinkedDataClient } from "./api/LinkedDataClient.js";
import { SearchClient } from "./api/SearchClient.js";
import { resolveConceptSchemes } from "./conceptSchemes.js";
import type { Config } from "./config.js";
import type { EntityDocument, NamedSearchOptions, SearchResultEntry } from "./types.js";
import { createHttpClient } from "./utils/http.js";

export interface Clients {
  entities: LinkedDataClient;
  search: SearchClient;
  schemes: ConceptSchemeScraper;
}

/** All clients share one axios instance; pass `http` to swap the transport (tests). */
export function createClients(config: Config, http: AxiosInstance = createHttpClient(config)): Clients {
  return {
    entities: new LinkedDataClient(http),
    search: new SearchClient(http, config.baseUrl, config.pageDelayMs),
    schemes: new ConceptSchemeScraper(http, config.baseUrl),
  };
}

/**
 * Search by scheme *names*. Names are resolved before anything is fetched,
 * so an unknown name throws here rather than on the first iteration.
 */
export function searchByName(
  clients: Clients,
  query: string,
  options: NamedSearchOptions = {}
): AsyncGenerator<SearchResultEntry, void, undefined> {
  const schemeUris = resolveConceptSchemes(options.conceptSchemes ?? []);
  return clients.search.search(query, { schemeUris, limit: options.limit, delayMs: options.delayMs });
}

/** First search hit, or null when the service has none. */
export async function firstMatch(
  clients: Clients,
  query: string,
  options: Omit<NamedSearchOptions, "limit"> = {}
): Promise<SearchResultEntry | null> {
  for await (const entry of searchByName(clients, query, { ...options, limit: 1 })) {
    return entry;
  }
  return null;
}

/** "I'm feeling lucky": the framed entity behind the first hit, or null. */
export async function luckyEntity(
  clients: Clients,
  query: string,
  options: Omit<NamedSearchOptions, "limit"> = {}
): Promise<EntityDocument | null> {
  const hit = await firstMatch(clients, query, options);
  return hit ? clients.entities.getEntity(hit.uri) : null;
}
