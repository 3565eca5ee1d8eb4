import { createClients, firstMatch as firstMatchWith, searchByName } from "./clients.js";
import { loadConfig } from "./config.js";
import type { EntityDocument, NamedSearchOptions, SearchResultEntry } from "./types.js";

export { CONCEPT_SCHEMES, listConceptSchemes, resolveConceptSchemes } from "./conceptSchemes.js";
export { LOC_CONTEXT, LinkedDataClient, toCanonicalUri } from "./api/LinkedDataClient.js";
export { SearchClient, buildSearchParams } from "./api/SearchClient.js";
export { ConceptSchemeScraper, normalizeSchemeName, parseConceptSchemeFacets } from "./api/ConceptSchemeScraper.js";
export { createClients, luckyEntity, searchByName } from "./clients.js";
export type { Clients } from "./clients.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export {
  FramingError,
  IdLocError,
  RemoteServiceError,
  UnknownConceptSchemeError,
} from "./errors.js";
export type * from "./types.js";

// Convenience functions: each call builds fresh clients from the environment.

/** Get an id.loc.gov entity by URI as framed JSON-LD. */
export function getEntity(uri: string): Promise<EntityDocument> {
  return createClients(loadConfig()).entities.getEntity(uri);
}

/**
 * Search id.loc.gov, paging through results lazily. Pass a `limit` to stop
 * early; by default every result is returned, with a pause between pages.
 */
export function search(
  query: string,
  options: NamedSearchOptions = {}
): AsyncGenerator<SearchResultEntry, void, undefined> {
  return searchByName(createClients(loadConfig()), query, options);
}

export function firstMatch(
  query: string,
  options: Omit<NamedSearchOptions, "limit"> = {}
): Promise<SearchResultEntry | null> {
  return firstMatchWith(createClients(loadConfig()), query, options);
}

/** Scheme name → `cs:`-prefixed identifier, scraped from the live search page. */
export function discoverConceptSchemes(): Promise<Map<string, string>> {
  return createClients(loadConfig()).schemes.discover();
}
