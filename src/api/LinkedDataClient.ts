import type { AxiosInstance } from "axios";
import * as jsonld from "jsonld";
import { FramingError, RemoteServiceError, toRemoteServiceError } from "../errors.js";
import type { EntityDocument } from "../types.js";

// ─── Frame ──────────────────────────────────────────────────────────

/** Namespace prefixes used to compact id.loc.gov documents into readable keys. */
export const LOC_CONTEXT = {
  mads: "http://www.loc.gov/mads/rdf/v1#",
  skos: "http://www.w3.org/2004/02/skos/core#",
  skosxl: "http://www.w3.org/2008/05/skos-xl#",
  recordinfo: "http://id.loc.gov/ontologies/RecordInfo#",
  identifiers: "http://id.loc.gov/vocabulary/identifiers/",
  bflc: "http://id.loc.gov/ontologies/bflc/",
  iso6392: "http://id.loc.gov/vocabulary/iso639-2/",
  changeset: "http://purl.org/vocab/changeset/schema#",
  bibframe: "http://id.loc.gov/ontologies/bibframe/",
};

type JsonLdInput = Parameters<typeof jsonld.frame>[0];

function isJsonLdInput(data: unknown): data is JsonLdInput {
  return typeof data === "object" && data !== null;
}

// ─── Helpers ────────────────────────────────────────────────────────

/** The service only frames reliably over http://, whatever the caller typed. */
export function toCanonicalUri(uri: string): string {
  return uri.replace(/^https:\/\//i, "http://");
}

const CONTEXT_PREFIXES = new Map<string, string>(Object.entries(LOC_CONTEXT));

/** Undo prefix compaction on an `@id`, e.g. "iso6392:eng" → the full IRI. */
function expandCompactIri(id: string): string {
  const colon = id.indexOf(":");
  if (colon <= 0) return id;
  const ns = CONTEXT_PREFIXES.get(id.slice(0, colon));
  return ns ? ns + id.slice(colon + 1) : id;
}

// ─── Client ─────────────────────────────────────────────────────────

export class LinkedDataClient {
  constructor(private readonly http: AxiosInstance) {}

  /**
   * Fetch one entity and frame it around its own URI, embedding every
   * linked node (SKOS concepts as well as MADS authorities) inline.
   */
  async getEntity(uri: string): Promise<EntityDocument> {
    const target = toCanonicalUri(uri);

    let data: unknown;
    try {
      ({ data } = await this.http.get<unknown>(target, {
        headers: { Accept: "application/ld+json" },
      }));
    } catch (err) {
      throw toRemoteServiceError(err, target);
    }

    if (!isJsonLdInput(data)) {
      throw new RemoteServiceError(`Response from ${target} was not JSON-LD`, target);
    }

    return LinkedDataClient.frame(data, target);
  }

  static async frame(doc: JsonLdInput, uri: string): Promise<EntityDocument> {
    let framed: Record<string, unknown>;
    try {
      framed = await jsonld.frame(doc, {
        "@context": LOC_CONTEXT,
        "@id": uri,
        "@embed": "@always",
      });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new FramingError(`Could not frame ${uri}: ${detail}`, uri, { cause: err });
    }

    const id = framed["@id"];
    if (typeof id !== "string") {
      throw new FramingError(`Document has no node with @id ${uri}`, uri);
    }
    if (expandCompactIri(id).toLowerCase() !== uri.toLowerCase()) {
      throw new FramingError(`Framed root ${id} does not match ${uri}`, uri);
    }
    // the root may come back compacted to a context prefix
    return { ...framed, "@id": uri };
  }
}
