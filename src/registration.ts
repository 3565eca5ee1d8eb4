import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { luckyEntity, searchByName, type Clients } from "./clients.js";
import { CONCEPT_SCHEMES, listConceptSchemes, resolveConceptSchemes } from "./conceptSchemes.js";
import type { SearchResultEntry } from "./types.js";

/** Limits for the search tool's `limit` argument. */
const RESULTS_DEFAULT = 20;
const RESULTS_MAX = 100;

type ToolResponse = { content: [{ type: "text"; text: string }]; isError?: boolean };

function jsonResponse(data: unknown): ToolResponse {
  return { content: [{ type: "text", text: JSON.stringify(data, null, 2) }] };
}

function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/** Format a search hit as a one-liner for LLM content. */
function formatSearchLine(r: SearchResultEntry, i: number): string {
  return `${i + 1}. ${r.title} <${r.uri}>`;
}

/**
 * Wrap a tool handler: log timing as a JSON line on stderr and turn thrown
 * errors into an `isError` result instead of a protocol error.
 */
export function createLogger(log: (line: string) => void = (line) => console.error(line)) {
  return function withLogging<A extends unknown[]>(
    toolName: string,
    fn: (...args: A) => Promise<ToolResponse>
  ): (...args: A) => Promise<ToolResponse> {
    return async (...args: A): Promise<ToolResponse> => {
      // args[0] is the tool input; args[1] is request metadata from the SDK
      const input = args[0] && typeof args[0] === "object" ? args[0] : undefined;
      const start = performance.now();
      try {
        const result = await fn(...args);
        const ms = Math.round(performance.now() - start);
        log(JSON.stringify({ tool: toolName, ms, ok: true, ...(input && { input }) }));
        return result;
      } catch (err) {
        const ms = Math.round(performance.now() - start);
        const error = err instanceof Error ? err.message : String(err);
        log(JSON.stringify({ tool: toolName, ms, ok: false, error, ...(input && { input }) }));
        return { content: [{ type: "text", text: `Error in ${toolName}: ${error}` }], isError: true };
      }
    };
  };
}

/** Register every id.loc.gov tool on the given McpServer. */
export function registerAll(
  server: McpServer,
  clients: Clients,
  withLogging: ReturnType<typeof createLogger> = createLogger()
): void {
  const conceptSchemeNames = z
    .array(z.string())
    .optional()
    .describe(
      "Concept scheme names to restrict to, e.g. 'subject-headings' or 'name-authority'. " +
      "Use list_concept_schemes for the full set."
    );

  // ── get_entity ──────────────────────────────────────────────────

  server.registerTool(
    "get_entity",
    {
      title: "Get Entity",
      description:
        "Fetch an id.loc.gov entity by URI and return it as framed JSON-LD, with linked " +
        "SKOS concepts and MADS authorities embedded inline. https:// URIs are accepted.",
      inputSchema: {
        uri: z
          .string()
          .url()
          .describe("Entity URI, e.g. 'http://id.loc.gov/authorities/subjects/sh85050184'"),
      },
    },
    withLogging("get_entity", async ({ uri }: { uri: string }) =>
      jsonResponse(await clients.entities.getEntity(uri))
    )
  );

  // ── search ──────────────────────────────────────────────────────

  server.registerTool(
    "search",
    {
      title: "Search id.loc.gov",
      description:
        "Full-text search across id.loc.gov. Returns titles and URIs; pass a URI to get_entity " +
        "for the full record.",
      inputSchema: {
        query: z.string().min(1).describe("Search text"),
        conceptSchemes: conceptSchemeNames,
        limit: z
          .number()
          .int()
          .min(1)
          .max(RESULTS_MAX)
          .default(RESULTS_DEFAULT)
          .describe(`Maximum results (1-${RESULTS_MAX}, default ${RESULTS_DEFAULT})`),
      },
    },
    withLogging("search", async ({ query, conceptSchemes, limit }: { query: string; conceptSchemes?: string[]; limit: number }) => {
      const results: SearchResultEntry[] = [];
      for await (const entry of searchByName(clients, query, { conceptSchemes, limit, delayMs: 0 })) {
        results.push(entry);
      }
      if (results.length === 0) return textResponse(`No match found for "${query}"`);
      return textResponse(results.map(formatSearchLine).join("\n"));
    })
  );

  // ── lucky ───────────────────────────────────────────────────────

  server.registerTool(
    "lucky",
    {
      title: "Feeling Lucky",
      description: "Search and return the first matching entity as framed JSON-LD.",
      inputSchema: {
        query: z.string().min(1).describe("Search text"),
        conceptSchemes: conceptSchemeNames,
      },
    },
    withLogging("lucky", async ({ query, conceptSchemes }: { query: string; conceptSchemes?: string[] }) => {
      const entity = await luckyEntity(clients, query, { conceptSchemes, delayMs: 0 });
      return entity ? jsonResponse(entity) : textResponse(`No match found for "${query}"`);
    })
  );

  // ── concept schemes ─────────────────────────────────────────────

  server.registerTool(
    "list_concept_schemes",
    {
      title: "List Concept Schemes",
      description: `List the ${CONCEPT_SCHEMES.size} known concept scheme names and their URIs.`,
      inputSchema: {},
    },
    withLogging("list_concept_schemes", async () => jsonResponse(listConceptSchemes()))
  );

  server.registerTool(
    "resolve_concept_schemes",
    {
      title: "Resolve Concept Schemes",
      description: "Convert concept scheme names to URIs. Fails listing every unknown name.",
      inputSchema: {
        names: z.array(z.string()).min(1).describe("Concept scheme names"),
      },
    },
    withLogging("resolve_concept_schemes", async ({ names }: { names: string[] }) =>
      jsonResponse(resolveConceptSchemes(names))
    )
  );

  server.registerTool(
    "discover_concept_schemes",
    {
      title: "Discover Concept Schemes",
      description:
        "Scrape the live id.loc.gov search page for the concept schemes it currently offers. " +
        "Values carry the 'cs:' prefix the search facets use.",
      inputSchema: {},
    },
    withLogging("discover_concept_schemes", async () =>
      jsonResponse(Object.fromEntries(await clients.schemes.discover()))
    )
  );
}
