import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import type { AddressInfo } from "node:net";

import type { PowerBIClient } from "../core/client.js";
import type { ServerConfig } from "../core/types.js";
import { isPlainObject, setLogLevel } from "../core/utils.js";
import {
  createTestClient,
  datasetPayload,
  fakeClock,
  FakePowerBI,
  groupPayload,
  refreshPayload,
} from "../testing/fake-power-bi.js";
import { createMcpApp } from "./server.js";

setLogLevel("silent");

type JsonObject = Record<string, unknown>;

type JsonRpcEnvelope = {
  id: string | number | null;
  result?: JsonObject;
  error?: JsonObject;
};

const baseServerConfig: ServerConfig = {
  serverApiKey: "",
  host: "127.0.0.1",
  port: 0,
  mcpPath: "/mcp",
  healthPath: "/healthz",
};

function objectOf(value: unknown): JsonObject {
  assert.ok(isPlainObject(value), `Expected a JSON object, got ${JSON.stringify(value)}`);
  return value;
}

function arrayOf(value: unknown): unknown[] {
  assert.ok(Array.isArray(value), `Expected a JSON array, got ${JSON.stringify(value)}`);
  return value;
}

function toEnvelope(parsed: unknown): JsonRpcEnvelope {
  const raw = objectOf(parsed);
  const id = typeof raw.id === "string" || typeof raw.id === "number" ? raw.id : null;
  return {
    id,
    result: isPlainObject(raw.result) ? raw.result : undefined,
    error: isPlainObject(raw.error) ? raw.error : undefined,
  };
}

function parseStreamableJsonRpc(text: string): JsonRpcEnvelope {
  const trimmed = text.trim();
  if (trimmed.startsWith("{")) {
    return toEnvelope(JSON.parse(trimmed));
  }

  const lines = text.split(/\r?\n/);
  const dataLines: string[] = [];
  for (const line of lines) {
    if (line.startsWith("data:")) {
      dataLines.push(line.slice(5).trimStart());
    } else if (dataLines.length > 0 && line.trim() === "") {
      break;
    }
  }
  if (dataLines.length === 0) {
    throw new Error(`Unable to parse Streamable HTTP response: ${text}`);
  }
  return toEnvelope(JSON.parse(dataLines.join("\n")));
}

async function postMcp(
  url: string,
  payload: JsonObject,
  sessionId?: string,
  extraHeaders: Record<string, string> = {},
): Promise<{ response: Response; message: JsonRpcEnvelope }> {
  const headers: Record<string, string> = {
    "content-type": "application/json",
    accept: "application/json, text/event-stream",
    ...extraHeaders,
  };
  if (sessionId) headers["mcp-session-id"] = sessionId;

  const response = await fetch(url, {
    method: "POST",
    headers,
    body: JSON.stringify(payload),
  });
  const bodyText = await response.text();
  return { response, message: parseStreamableJsonRpc(bodyText) };
}

function makeInitializePayload(id: number): JsonObject {
  return {
    jsonrpc: "2.0",
    id,
    method: "initialize",
    params: {
      protocolVersion: "2025-06-18",
      capabilities: {},
      clientInfo: { name: "mcp-integration-test", version: "1.0.0" },
    },
  };
}

function callTool(id: number, name: string, args: JsonObject): JsonObject {
  return { jsonrpc: "2.0", id, method: "tools/call", params: { name, arguments: args } };
}

function fixtureTenant(): FakePowerBI {
  return new FakePowerBI()
    .on("GET", "groups", { body: { value: [groupPayload("g1", "Sales"), groupPayload("g2", "Finance")] } })
    .on("GET", "groups/g1/datasets", { body: { value: [datasetPayload("d1", "Revenue"), datasetPayload("d2", "Margin")] } })
    .on("GET", "groups/g2/datasets", { body: { value: [datasetPayload("e1", "Budget")] } })
    .on("GET", "groups/g1/datasets/d1/refreshes?$top=50", {
      body: { value: [refreshPayload("r-live", "Unknown", "2026-03-02T07:55:00.000Z")] },
    });
}

async function startTestServer(
  t: TestContext,
  client: PowerBIClient,
  configOverrides: Partial<ServerConfig> = {},
): Promise<{ mcpUrl: string; healthUrl: string }> {
  const app = createMcpApp(client, { ...baseServerConfig, ...configOverrides });
  const server = app.listen(0, "127.0.0.1");
  t.after(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address: AddressInfo | string | null = server.address();
  assert.ok(address !== null && typeof address !== "string", "Expected a TCP address.");
  return {
    mcpUrl: `http://127.0.0.1:${address.port}/mcp`,
    healthUrl: `http://127.0.0.1:${address.port}/healthz`,
  };
}

async function initializeSession(mcpUrl: string, extraHeaders: Record<string, string> = {}): Promise<string> {
  const initialize = await postMcp(mcpUrl, makeInitializePayload(1), undefined, extraHeaders);

  assert.equal(initialize.response.status, 200);
  assert.ok(!initialize.message.error);

  const sessionId = initialize.response.headers.get("mcp-session-id");
  assert.ok(sessionId && sessionId.trim().length > 0, "Expected mcp-session-id response header.");
  return sessionId;
}

async function terminateSession(mcpUrl: string, sessionId: string, extraHeaders: Record<string, string> = {}): Promise<void> {
  const terminate = await fetch(mcpUrl, {
    method: "DELETE",
    headers: {
      accept: "application/json, text/event-stream",
      "mcp-session-id": sessionId,
      ...extraHeaders,
    },
  });
  assert.equal(terminate.status, 200);
  await terminate.text();
}

test("MCP Streamable HTTP server exposes the refresh tools and lists datasets", async (t) => {
  const fake = fixtureTenant();
  const { mcpUrl } = await startTestServer(t, createTestClient(fake, fakeClock().clock));
  const sessionId = await initializeSession(mcpUrl);

  const listTools = await postMcp(mcpUrl, { jsonrpc: "2.0", id: 2, method: "tools/list", params: {} }, sessionId);
  assert.equal(listTools.response.status, 200);
  assert.ok(!listTools.message.error);

  const tools = arrayOf(listTools.message.result?.tools).map(objectOf);
  const names = tools.map((tool) => String(tool.name)).sort();
  assert.deepEqual(names, [
    "pbi.cancelRefresh",
    "pbi.listDataflows",
    "pbi.listDatasets",
    "pbi.listGroups",
    "pbi.listRefreshes",
    "pbi.refresh",
  ]);
  for (const tool of tools) {
    assert.equal(objectOf(tool.inputSchema).type, "object", `Tool ${String(tool.name)} has no object inputSchema.`);
  }

  const call = await postMcp(mcpUrl, callTool(3, "pbi.listDatasets", { groups: ["Sales"] }), sessionId);
  assert.equal(call.response.status, 200);
  assert.ok(!call.message.error);
  const structured = objectOf(call.message.result?.structuredContent);
  assert.equal(structured.count, 2);
  const rows = arrayOf(structured.rows).map(objectOf);
  assert.deepEqual(
    rows.map((row) => [row.name, row.groupName]),
    [
      ["Revenue", "Sales"],
      ["Margin", "Sales"],
    ],
  );
  assert.equal(fake.count("GET", "groups/g2/datasets"), 0);

  await terminateSession(mcpUrl, sessionId);
});

test("pbi.refresh leaves an in-progress refresh alone without force", async (t) => {
  const fake = fixtureTenant();
  const { mcpUrl } = await startTestServer(t, createTestClient(fake, fakeClock().clock));
  const sessionId = await initializeSession(mcpUrl);

  const call = await postMcp(
    mcpUrl,
    callTool(4, "pbi.refresh", { group: "Sales", kind: "dataset", name: "Revenue" }),
    sessionId,
  );
  assert.equal(call.response.status, 200);
  const structured = objectOf(call.message.result?.structuredContent);
  assert.equal(structured.outcome, "skipped");
  assert.equal(objectOf(structured.current).id, "r-live");
  assert.equal(fake.count("POST"), 0);

  await terminateSession(mcpUrl, sessionId);
});

test("tool failures come back as error results with the mapped status", async (t) => {
  const { mcpUrl } = await startTestServer(t, createTestClient(fixtureTenant(), fakeClock().clock));
  const sessionId = await initializeSession(mcpUrl);

  const call = await postMcp(mcpUrl, callTool(5, "pbi.listDatasets", { groups: ["Marketing"] }), sessionId);
  assert.equal(call.response.status, 200);
  assert.equal(call.message.result?.isError, true);
  const structured = objectOf(call.message.result?.structuredContent);
  assert.equal(structured.error, "No group named 'Marketing'.");
  assert.equal(structured.status, 404);

  await terminateSession(mcpUrl, sessionId);
});

test("MCP session delete closes state and rejects reuse", async (t) => {
  const client = createTestClient(fixtureTenant(), fakeClock().clock);
  const { mcpUrl, healthUrl } = await startTestServer(t, client);
  const sessionId = await initializeSession(mcpUrl);

  const healthBefore = await fetch(healthUrl);
  assert.equal(healthBefore.status, 200);
  const bodyBefore = objectOf(await healthBefore.json());
  assert.equal(bodyBefore.activeSessions, 1);
  assert.equal(bodyBefore.credential, "staticToken");

  await terminateSession(mcpUrl, sessionId);

  const bodyAfter = objectOf(await (await fetch(healthUrl)).json());
  assert.equal(bodyAfter.activeSessions, 0);

  const reuse = await postMcp(mcpUrl, { jsonrpc: "2.0", id: 2, method: "tools/list", params: {} }, sessionId);
  assert.equal(reuse.response.status, 404);
  assert.equal(reuse.message.error?.message, `Unknown MCP session '${sessionId}'.`);
});

test("a request without a session that is not initialize is rejected", async (t) => {
  const { mcpUrl } = await startTestServer(t, createTestClient(fixtureTenant(), fakeClock().clock));

  const orphan = await postMcp(mcpUrl, { jsonrpc: "2.0", id: 7, method: "tools/list", params: {} });
  assert.equal(orphan.response.status, 400);
  assert.equal(orphan.message.error?.message, "Missing mcp-session-id header for non-initialize request.");
});

test("MCP endpoint enforces x-server-key when configured", async (t) => {
  const serverApiKey = "test-api-key";
  const { mcpUrl } = await startTestServer(t, createTestClient(fixtureTenant(), fakeClock().clock), { serverApiKey });

  const unauthorized = await postMcp(mcpUrl, makeInitializePayload(501));
  assert.equal(unauthorized.response.status, 401);
  assert.equal(unauthorized.message.error?.message, "Unauthorized: missing/invalid X-Server-Key.");

  const wrong = await postMcp(mcpUrl, makeInitializePayload(502), undefined, { "x-server-key": "wrong-key" });
  assert.equal(wrong.response.status, 401);

  const sessionId = await initializeSession(mcpUrl, { "x-server-key": serverApiKey });
  await terminateSession(mcpUrl, sessionId, { "x-server-key": serverApiKey });
});
