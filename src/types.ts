// ─── Concept Schemes ────────────────────────────────────────────────

/** Scheme name (lowercase, hyphenated) → scheme identifier. */
export type ConceptSchemeMap = ReadonlyMap<string, string>;

export interface ConceptScheme {
  name: string;
  uri: string;
}

// ─── Search ─────────────────────────────────────────────────────────

export interface SearchResultEntry {
  title: string;
  uri: string;
}

/** One parsed page of the Atom search feed. */
export interface SearchPage {
  entries: SearchResultEntry[];
  /** Verbatim `rel="next"` href, or null on the last page */
  next: string | null;
}

export interface SearchOptions {
  /** Scheme URIs (already resolved), each ANDed in as a `cs:` term */
  schemeUris?: readonly string[];
  /** Stop after this many entries; 0 means no limit */
  limit?: number;
  /** Pause between page requests; 0 disables it */
  delayMs?: number;
}

/** Search options as the facade takes them: scheme names instead of URIs. */
export interface NamedSearchOptions {
  conceptSchemes?: readonly string[];
  limit?: number;
  delayMs?: number;
}

// ─── Entities ───────────────────────────────────────────────────────

/**
 * A framed JSON-LD node. The root always carries `@id`; everything else
 * mirrors whatever vocabulary (MADS, SKOS, BIBFRAME, ...) the service used.
 */
export interface EntityDocument {
  "@id": string;
  [key: string]: unknown;
}
