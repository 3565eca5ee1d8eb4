import { parseArgs } from "node:util";
import { createClients, firstMatch, luckyEntity, searchByName, type Clients } from "./clients.js";
import { CONCEPT_SCHEMES } from "./conceptSchemes.js";
import { loadConfig, type Config } from "./config.js";
import { UnknownConceptSchemeError } from "./errors.js";
import { runHttp, runStdio } from "./server.js";

export const USAGE = `Usage: idloc <command> [options]

Commands:
  get <uri>                 Get an id.loc.gov entity by URI and print out JSON-LD
  search <query>            Search for entities in id.loc.gov
  lucky <query>             Return the first matching entity as JSON-LD
  guess <query>             Return the URI of the first matching entity
  concept-schemes           List available concept scheme names and their URIs
  serve                     Run as an MCP server (stdio, or HTTP with --http)

Options:
  --concept-scheme <name>   A concept scheme to limit to (can repeat)
  --limit <n>               Number of records to limit results to (0 is all)
  --live                    concept-schemes: read them from the live search page
  --http                    serve: listen on PORT (default 3000) instead of stdio
  -h, --help                Show this help`;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliDeps {
  config?: Config;
  clients?: Clients;
  io?: CliIO;
}

const consoleIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseLimit(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new UsageError(`--limit must be a non-negative integer, got "${raw}"`);
  }
  return limit;
}

function requirePositional(value: string | undefined, name: string, command: string): string {
  if (!value) throw new UsageError(`${command}: missing <${name}>`);
  return value;
}

/** Run one CLI invocation and return the process exit code. */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;

  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        "concept-scheme": { type: "string", multiple: true },
        limit: { type: "string" },
        live: { type: "boolean" },
        http: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });

    const [command, arg] = positionals;
    if (values.help || !command) {
      io.stdout(USAGE);
      return values.help ? 0 : 1;
    }

    const config = deps.config ?? loadConfig();
    const clients = deps.clients ?? createClients(config);
    const conceptSchemes = values["concept-scheme"] ?? [];

    switch (command) {
      case "get": {
        const uri = requirePositional(arg, "uri", command);
        const entity = await clients.entities.getEntity(uri);
        io.stdout(JSON.stringify(entity, null, 2));
        return 0;
      }

      case "search": {
        const query = requirePositional(arg, "query", command);
        const limit = parseLimit(values.limit, config.searchLimit);
        for await (const result of searchByName(clients, query, { conceptSchemes, limit })) {
          io.stdout(`${result.title}\n<${result.uri}>\n`);
        }
        return 0;
      }

      case "lucky": {
        const query = requirePositional(arg, "query", command);
        const entity = await luckyEntity(clients, query, { conceptSchemes });
        io.stdout(entity ? JSON.stringify(entity, null, 2) : `Alas, there was no match found for "${query}"`);
        return 0;
      }

      case "guess": {
        const query = requirePositional(arg, "query", command);
        const hit = await firstMatch(clients, query, { conceptSchemes });
        io.stdout(hit ? hit.uri : `Alas, there was no match found for "${query}"`);
        return 0;
      }

      case "concept-schemes": {
        const schemes = values.live ? await clients.schemes.discover() : CONCEPT_SCHEMES;
        for (const [name, uri] of schemes) io.stdout(`${name}: <${uri}>`);
        return 0;
      }

      case "serve": {
        if (values.http || config.port !== undefined) await runHttp(clients, config);
        else await runStdio(clients);
        return 0;
      }

      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (err) {
    if (err instanceof UnknownConceptSchemeError) {
      io.stderr(err.message);
    } else if (err instanceof UsageError) {
      io.stderr(`${err.message}\n\n${USAGE}`);
    } else {
      io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
  }
}
