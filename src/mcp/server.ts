import { randomUUID } from "node:crypto";

import type express from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createMcpExpressApp } from "@modelcontextprotocol/sdk/server/express.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import * as z from "zod/v4";

import type { ApiSession, PowerBIClient } from "../core/client.js";
import { describeError, httpError, NotFoundError } from "../core/errors.js";
import { redactForLog } from "../core/policy.js";
import type { RefreshOutcome } from "../core/refresh.js";
import { toRow, toRows, type Group, type Refreshable } from "../core/resources.js";
import type { ServerConfig } from "../core/types.js";
import { constantTimeEqual, logError, logInfo } from "../core/utils.js";

type SessionState = {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
};

type ToolPayload = Record<string, unknown>;

const groupFilterInputSchema = z.strictObject({
  groups: z.array(z.string().min(1)).optional(),
});

const refreshableTarget = {
  group: z.string().min(1),
  kind: z.enum(["dataset", "dataflow"]),
  name: z.string().min(1),
};

const refreshTargetInputSchema = z.strictObject(refreshableTarget);

const refreshInputSchema = z.strictObject({
  ...refreshableTarget,
  force: z.boolean().optional(),
  waitUntilComplete: z.boolean().optional(),
  refreshType: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export function requireServerKey(config: ServerConfig, serverKeyHeader: string | undefined): void {
  if (!config.serverApiKey) return;
  const key = String(serverKeyHeader || "");
  if (!constantTimeEqual(key, config.serverApiKey)) {
    throw httpError(401, "Unauthorized: missing/invalid X-Server-Key.");
  }
}

function toMcpErrorResult(client: PowerBIClient, error: unknown) {
  const mapped = describeError(error);
  return {
    isError: true,
    content: [{ type: "text" as const, text: `${mapped.status}: ${mapped.message}` }],
    structuredContent: {
      error: mapped.message,
      status: mapped.status,
      details: redactForLog(mapped.details, client.redactionFields),
    },
  };
}

function toMcpOkResult(payload: ToolPayload) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
    structuredContent: payload,
  };
}

async function runTool(client: PowerBIClient, fn: (session: ApiSession) => Promise<ToolPayload>) {
  try {
    return toMcpOkResult(await client.withSession(fn));
  } catch (error) {
    return toMcpErrorResult(client, error);
  }
}

async function selectGroups(session: ApiSession, names: string[] | undefined): Promise<Group[]> {
  const groups = await session.catalog.listGroups();
  if (!names || names.length === 0) return groups;
  return names.map((name) => {
    const match = groups.find((g) => g.name === name);
    if (!match) throw new NotFoundError(`No group named '${name}'.`);
    return match;
  });
}

async function resolveRefreshable(
  session: ApiSession,
  target: { group: string; kind: "dataset" | "dataflow"; name: string },
): Promise<Refreshable> {
  const group = await session.catalog.findGroup(target.group);
  return target.kind === "dataset"
    ? session.catalog.findDataset(group, target.name)
    : session.catalog.findDataflow(group, target.name);
}

function outcomeToPayload(outcome: RefreshOutcome): ToolPayload {
  switch (outcome.kind) {
    case "skipped":
      return { outcome: outcome.kind, resource: toRow(outcome.resource), current: toRow(outcome.current) };
    case "started":
      return {
        outcome: outcome.kind,
        resource: toRow(outcome.resource),
        submittedAt: outcome.submittedAt.toISOString(),
        final: outcome.final ? toRow(outcome.final) : null,
      };
    case "cancelledAndStarted":
      return {
        outcome: outcome.kind,
        resource: toRow(outcome.resource),
        cancelled: toRow(outcome.cancelled),
        submittedAt: outcome.submittedAt.toISOString(),
        final: outcome.final ? toRow(outcome.final) : null,
      };
  }
}

function createPbiMcpServer(client: PowerBIClient): McpServer {
  const server = new McpServer(
    {
      name: "pbi-refresh-client",
      version: "0.1.0",
    },
    {
      capabilities: {
        logging: {},
      },
    },
  );

  server.registerTool(
    "pbi.listGroups",
    {
      description: "List the workspaces the credential can see.",
      inputSchema: z.strictObject({}),
      annotations: { readOnlyHint: true, idempotentHint: true },
    },
    () =>
      runTool(client, async (session) => {
        const rows = toRows(await session.catalog.listGroups());
        return { count: rows.length, rows };
      }),
  );

  server.registerTool(
    "pbi.listDatasets",
    {
      description: "List datasets in the named workspaces, or in every workspace when none are named.",
      inputSchema: groupFilterInputSchema,
      annotations: { readOnlyHint: true, idempotentHint: true },
    },
    ({ groups }) =>
      runTool(client, async (session) => {
        const selected = await selectGroups(session, groups);
        const rows = toRows(await session.catalog.listDatasets(...selected));
        return { count: rows.length, rows };
      }),
  );

  server.registerTool(
    "pbi.listDataflows",
    {
      description: "List dataflows in the named workspaces, or in every workspace when none are named.",
      inputSchema: groupFilterInputSchema,
      annotations: { readOnlyHint: true, idempotentHint: true },
    },
    ({ groups }) =>
      runTool(client, async (session) => {
        const selected = await selectGroups(session, groups);
        const rows = toRows(await session.catalog.listDataflows(...selected));
        return { count: rows.length, rows };
      }),
  );

  server.registerTool(
    "pbi.listRefreshes",
    {
      description: "Refresh history of one dataset or dataflow, oldest first.",
      inputSchema: refreshTargetInputSchema,
      annotations: { readOnlyHint: true, idempotentHint: true },
    },
    (target) =>
      runTool(client, async (session) => {
        const resource = await resolveRefreshable(session, target);
        const rows = toRows(await session.catalog.listRefreshes(resource));
        return { count: rows.length, rows };
      }),
  );

  server.registerTool(
    "pbi.refresh",
    {
      description: "Start a refresh. An in-progress refresh is left alone unless force is set, in which case it is cancelled first.",
      inputSchema: refreshInputSchema,
      annotations: { readOnlyHint: false, idempotentHint: false },
    },
    ({ force, waitUntilComplete, refreshType, timeoutMs, ...target }) =>
      runTool(client, async (session) => {
        const resource = await resolveRefreshable(session, target);
        const outcome = await session.refreshes.refresh(resource, { force, waitUntilComplete, refreshType, timeoutMs });
        return outcomeToPayload(outcome);
      }),
  );

  server.registerTool(
    "pbi.cancelRefresh",
    {
      description: "Cancel the refresh in progress, if there is one.",
      inputSchema: refreshTargetInputSchema,
      annotations: { readOnlyHint: false, idempotentHint: true },
    },
    (target) =>
      runTool(client, async (session) => {
        const resource = await resolveRefreshable(session, target);
        const result = await session.refreshes.cancel(resource);
        return { cancelled: result.cancelled, record: result.record ? toRow(result.record) : null };
      }),
  );

  return server;
}

export function createMcpApp(client: PowerBIClient, config: ServerConfig): express.Express {
  const app = createMcpExpressApp({ host: config.host });
  const sessions = new Map<string, SessionState>();

  app.disable("x-powered-by");
  app.use((req, res, next) => {
    const supplied = String(req.header("x-request-id") || "").trim();
    const requestId = supplied || randomUUID();
    res.locals.requestId = requestId;
    res.setHeader("x-request-id", requestId);
    next();
  });
  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logInfo("http.request", {
        requestId: String(res.locals.requestId ?? ""),
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  });

  function logCloseFailure(sessionId: string, error: unknown): void {
    logError("mcp.session.closeFailed", {
      sessionId,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  async function closeSession(sessionId: string): Promise<void> {
    const state = sessions.get(sessionId);
    if (!state) return;
    sessions.delete(sessionId);
    await state.transport.close().catch((e: unknown) => logCloseFailure(sessionId, e));
    await state.server.close().catch((e: unknown) => logCloseFailure(sessionId, e));
  }

  function writeJsonRpcError(
    res: express.Response,
    code: number,
    mapped: { status: number; message: string; details?: unknown },
  ): void {
    if (res.headersSent) return;
    res.status(mapped.status).json({
      jsonrpc: "2.0",
      error: { code, message: mapped.message, data: redactForLog(mapped.details, client.redactionFields) },
      id: null,
    });
  }

  app.post(config.mcpPath, async (req, res) => {
    try {
      requireServerKey(config, req.header("x-server-key"));
      const sessionId = String(req.header("mcp-session-id") || "").trim();

      if (sessionId) {
        const state = sessions.get(sessionId);
        if (!state) {
          writeJsonRpcError(res, -32001, { status: 404, message: `Unknown MCP session '${sessionId}'.` });
          return;
        }
        await state.transport.handleRequest(req, res, req.body);
        return;
      }

      if (!isInitializeRequest(req.body)) {
        writeJsonRpcError(res, -32000, { status: 400, message: "Missing mcp-session-id header for non-initialize request." });
        return;
      }

      const mcpServer = createPbiMcpServer(client);
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (newSessionId) => {
          sessions.set(newSessionId, { server: mcpServer, transport });
        },
      });

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid) sessions.delete(sid);
        void mcpServer.close().catch((e: unknown) => logCloseFailure(sid ?? "", e));
      };

      try {
        await mcpServer.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        await transport.close().catch((e: unknown) => logCloseFailure(transport.sessionId ?? "", e));
        await mcpServer.close().catch((e: unknown) => logCloseFailure(transport.sessionId ?? "", e));
        throw error;
      }
    } catch (error) {
      writeJsonRpcError(res, -32603, describeError(error));
    }
  });

  app.get(config.mcpPath, async (req, res) => {
    try {
      requireServerKey(config, req.header("x-server-key"));
      const sessionId = String(req.header("mcp-session-id") || "").trim();
      if (!sessionId) {
        writeJsonRpcError(res, -32000, { status: 400, message: "Missing mcp-session-id header." });
        return;
      }

      const state = sessions.get(sessionId);
      if (!state) {
        writeJsonRpcError(res, -32001, { status: 404, message: `Unknown MCP session '${sessionId}'.` });
        return;
      }

      await state.transport.handleRequest(req, res);
    } catch (error) {
      writeJsonRpcError(res, -32603, describeError(error));
    }
  });

  app.delete(config.mcpPath, async (req, res) => {
    try {
      requireServerKey(config, req.header("x-server-key"));
      const sessionId = String(req.header("mcp-session-id") || "").trim();
      if (!sessionId) {
        writeJsonRpcError(res, -32000, { status: 400, message: "Missing mcp-session-id header." });
        return;
      }

      const state = sessions.get(sessionId);
      if (!state) {
        writeJsonRpcError(res, -32001, { status: 404, message: `Unknown MCP session '${sessionId}'.` });
        return;
      }

      await state.transport.handleRequest(req, res);
      await closeSession(sessionId);
    } catch (error) {
      writeJsonRpcError(res, -32603, describeError(error));
    }
  });

  app.get(config.healthPath, (_req, res) => {
    res.json({
      ok: true,
      transport: "mcp-streamable-http",
      mcpPath: config.mcpPath,
      credential: client.tokens.credentialKind,
      activeSessions: sessions.size,
    });
  });

  return app;
}
