import schemeTable from "./data/concept-schemes.json";
import { UnknownConceptSchemeError } from "./errors.js";
import type { ConceptScheme, ConceptSchemeMap } from "./types.js";

/**
 * Known concept schemes at id.loc.gov, keyed by the hyphenated name used
 * on the command line. Values are bare scheme URIs; the live discovery
 * function returns `cs:`-prefixed values instead (see ConceptSchemeScraper).
 */
export const CONCEPT_SCHEMES: ConceptSchemeMap = new Map<string, string>(Object.entries(schemeTable));

export function listConceptSchemes(registry: ConceptSchemeMap = CONCEPT_SCHEMES): ConceptScheme[] {
  return [...registry].map(([name, uri]) => ({ name, uri }));
}

/**
 * Convert scheme names to URIs, preserving order and duplicates.
 * Throws UnknownConceptSchemeError listing every name the registry lacks.
 */
export function resolveConceptSchemes(
  names: readonly string[],
  registry: ConceptSchemeMap = CONCEPT_SCHEMES
): string[] {
  const uris: string[] = [];
  const missing: string[] = [];

  for (const name of names) {
    const uri = registry.get(name);
    if (uri === undefined) missing.push(name);
    else uris.push(uri);
  }

  if (missing.length > 0) throw new UnknownConceptSchemeError(missing);
  return uris;
}
