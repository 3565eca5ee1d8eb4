import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import cors from "cors";
import express from "express";
import crypto from "node:crypto";
import type { Server } from "node:http";
import type { Clients } from "./clients.js";
import type { Config } from "./config.js";
import { registerAll } from "./registration.js";
import { packageVersion } from "./utils/http.js";

const SERVER_NAME = "idloc";
const DEFAULT_PORT = 3000;

// ─── Types ───────────────────────────────────────────────────────────

export type SessionData = {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
  lastActivity: number;
};

// ─── Create a configured McpServer ───────────────────────────────────

export function createServer(clients: Clients): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: packageVersion(), title: "Library of Congress Linked Data" },
    {
      capabilities: { tools: {} },
      instructions:
        "Search the Library of Congress Linked Data Service (id.loc.gov) and fetch " +
        "authority and vocabulary records as JSON-LD. Restrict searches with concept " +
        "scheme names from list_concept_schemes.",
    }
  );
  registerAll(server, clients);
  return server;
}

// ─── Shutdown ────────────────────────────────────────────────────────

/** Close the server cleanly on SIGTERM/SIGINT. Only long-running modes install this. */
function registerShutdown(close: () => Promise<void>): void {
  const shutdown = () => {
    console.error("Shutting down...");
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

// ─── Stdio mode ──────────────────────────────────────────────────────

export async function runStdio(clients: Clients): Promise<void> {
  const server = createServer(clients);
  await server.connect(new StdioServerTransport());
  registerShutdown(() => server.close());
  console.error("id.loc.gov MCP server running on stdio");
}

// ─── HTTP mode ───────────────────────────────────────────────────────

const MAX_SESSIONS = 100;
const SESSION_TTL_MS = 30 * 60 * 1000;

export function createHttpApp(
  clients: Clients,
  config: Pick<Config, "allowedOrigins">
): { app: express.Express; sessions: Map<string, SessionData> } {
  const app = express();
  app.use(cors({ origin: config.allowedOrigins ?? "*" }));
  app.use(express.json());

  const sessions = new Map<string, SessionData>();

  app.all("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const header = req.headers["mcp-session-id"];
      const sessionId = typeof header === "string" ? header : undefined;
      const session = sessionId ? sessions.get(sessionId) : undefined;

      // GET opens the SSE stream, DELETE closes the session; both need one
      if (req.method === "GET" || req.method === "DELETE") {
        if (!session || !sessionId) {
          res.status(400).json({ error: "Invalid or missing session ID" });
          return;
        }
        session.lastActivity = Date.now();
        await session.transport.handleRequest(req, res);
        if (req.method === "DELETE") sessions.delete(sessionId);
        return;
      }

      if (session) {
        session.lastActivity = Date.now();
        await session.transport.handleRequest(req, res, req.body);
        return;
      }

      if (sessions.size >= MAX_SESSIONS) {
        res.status(503).json({ error: "Too many active sessions" });
        return;
      }

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => crypto.randomUUID(),
      });
      transport.onclose = () => {
        if (transport.sessionId) sessions.delete(transport.sessionId);
      };

      const server = createServer(clients);
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);

      // sessionId is assigned while handling the initialize request
      if (transport.sessionId) {
        sessions.set(transport.sessionId, { server, transport, lastActivity: Date.now() });
      }
    } catch (err) {
      console.error("MCP endpoint error:", err);
      if (!res.headersSent) res.status(500).json({ error: "Internal server error" });
    }
  });

  app.get("/health", (_req: express.Request, res: express.Response) => {
    res.json({ status: "ok", server: SERVER_NAME, version: packageVersion(), sessions: sessions.size });
  });

  return { app, sessions };
}

export function purgeStaleSessions(sessions: Map<string, SessionData>, ttlMs: number, now = Date.now()): number {
  let purged = 0;
  for (const [sid, session] of sessions) {
    if (now - session.lastActivity > ttlMs) {
      session.transport.close().catch((err: unknown) => console.error(`Failed to close session ${sid}:`, err));
      sessions.delete(sid);
      purged++;
    }
  }
  return purged;
}

export function runHttp(clients: Clients, config: Pick<Config, "port" | "allowedOrigins">): Promise<Server> {
  const port = config.port ?? DEFAULT_PORT;
  const { app, sessions } = createHttpApp(clients, config);

  const cleanup = setInterval(() => purgeStaleSessions(sessions, SESSION_TTL_MS), 60_000);
  cleanup.unref();

  return new Promise((resolve, reject) => {
    const httpServer = app.listen(port, () => {
      console.error(`id.loc.gov MCP server listening on http://localhost:${port}`);
      console.error(`  MCP endpoint: POST /mcp`);
      console.error(`  Health:       GET  /health`);
      registerShutdown(
        () =>
          new Promise<void>((done, fail) => {
            for (const session of sessions.values()) {
              session.transport.close().catch((err: unknown) => console.error("Failed to close session:", err));
            }
            sessions.clear();
            httpServer.close((err) => (err ? fail(err) : done()));
          })
      );
      resolve(httpServer);
    });
    httpServer.on("error", reject);
    httpServer.on("close", () => clearInterval(cleanup));
  });
}
