import test from "node:test";
import assert from "node:assert/strict";

import { HttpError, RateLimitError, ValidationError } from "./errors.js";
import { unwrapValue, type HttpSession } from "./session.js";
import { isPlainObject, setLogLevel } from "./utils.js";
import { createTestClient, fakeClock, FakePowerBI, groupPayload, TEST_BASE_URL } from "../testing/fake-power-bi.js";

setLogLevel("silent");

test("requests carry the bearer token and default to a JSON content type", async () => {
  const fake = new FakePowerBI().on("GET", "groups", { body: { value: [] } });
  const client = createTestClient(fake, fakeClock().clock);

  await client.withSession((s) => s.http.get("groups"));

  assert.equal(fake.requests.length, 1);
  assert.equal(fake.requests[0].headers.authorization, "Bearer test-token");
  assert.equal(fake.requests[0].headers["content-type"], "application/json");
});

test("an explicit Content-Type survives in any letter case", async () => {
  const fake = new FakePowerBI().on("POST", "groups/g1/upload", { status: 202 });
  const client = createTestClient(fake, fakeClock().clock);

  await client.withSession((s) =>
    s.http.post("groups/g1/upload", { body: "raw text", headers: { "content-type": "text/plain" } }),
  );

  assert.equal(fake.requests[0].headers["content-type"], "text/plain");
  assert.equal(fake.requests[0].body, "raw text");
});

test("buildHeaders keeps caller headers but always sets Authorization", () => {
  const fake = new FakePowerBI();
  const session = createTestClient(fake, fakeClock().clock).openSession();

  assert.deepEqual(session.http.buildHeaders("Bearer fresh", { "CONTENT-TYPE": "text/csv", authorization: "Bearer stale" }), {
    "CONTENT-TYPE": "text/csv",
    Authorization: "Bearer fresh",
  });
  assert.deepEqual(session.http.buildHeaders("Bearer fresh"), {
    "Content-Type": "application/json",
    Authorization: "Bearer fresh",
  });
});

test("the transport opens on first use and reopens after close", async () => {
  const fake = new FakePowerBI().on("GET", "groups", { body: { value: [] } });
  const session = createTestClient(fake, fakeClock().clock).openSession();

  assert.equal(session.http.isOpen, false);
  await session.http.get("groups");
  assert.equal(session.http.isOpen, true);
  const first = session.http.open();
  assert.equal(session.http.open(), first);

  await session.close();
  assert.equal(session.http.isOpen, false);
  await session.http.get("groups");
  assert.equal(session.http.isOpen, true);
  assert.notEqual(session.http.open(), first);
  await session.close();
});

test("withSession closes the session even when the callback throws", async () => {
  const fake = new FakePowerBI().on("GET", "groups", { body: { value: [] } });
  const client = createTestClient(fake, fakeClock().clock);
  const seen: { http?: HttpSession } = {};

  await assert.rejects(
    client.withSession(async (s) => {
      await s.http.get("groups");
      seen.http = s.http;
      throw new Error("caller failure");
    }),
    { message: "caller failure" },
  );
  assert.equal(seen.http?.isOpen, false);
});

test("relative paths resolve against the base URL; absolute URLs pass through", () => {
  const session = createTestClient(new FakePowerBI(), fakeClock().clock).openSession();

  assert.equal(session.http.resolveUrl("groups"), `${TEST_BASE_URL}/groups`);
  assert.equal(session.http.resolveUrl("/groups/g1/datasets"), `${TEST_BASE_URL}/groups/g1/datasets`);
  assert.equal(session.http.resolveUrl("https://other.example.test/x"), "https://other.example.test/x");
});

test("listValues strips the value envelope", async () => {
  const fake = new FakePowerBI().on("GET", "groups", {
    body: { "@odata.context": "ctx", value: [groupPayload("g1", "Sales"), groupPayload("g2", "Finance")] },
  });
  const client = createTestClient(fake, fakeClock().clock);

  const values = await client.withSession((s) => s.http.listValues("groups"));
  assert.deepEqual(values, [groupPayload("g1", "Sales"), groupPayload("g2", "Finance")]);
});

test("a list response without an envelope is an upstream error", () => {
  assert.throws(
    () => unwrapValue([{ id: "g1" }], "groups"),
    (error: unknown) => error instanceof ValidationError && error.statusCode === 502,
  );
});

test("getJson unwraps envelopes but returns plain documents unchanged", async () => {
  const fake = new FakePowerBI()
    .on("GET", "groups", { body: { value: [{ id: "g1" }] } })
    .on("GET", "groups/g1/datasets/d1/refreshSchedule", { body: { enabled: true, days: ["Monday"] } });
  const client = createTestClient(fake, fakeClock().clock);

  await client.withSession(async (s) => {
    assert.deepEqual(await s.http.getJson("groups"), [{ id: "g1" }]);
    assert.deepEqual(await s.http.getJson("groups/g1/datasets/d1/refreshSchedule"), { enabled: true, days: ["Monday"] });
  });
});

test("a 429 is retried after the Retry-After delay", async () => {
  const { clock, sleeps } = fakeClock();
  const fake = new FakePowerBI().on(
    "GET",
    "groups",
    { status: 429, headers: { "retry-after": "5" }, body: { error: { code: "TooManyRequests" } } },
    { body: { value: [] } },
  );
  const client = createTestClient(fake, clock);

  const values = await client.withSession((s) => s.http.listValues("groups"));
  assert.deepEqual(values, []);
  assert.equal(fake.count("GET", "groups"), 2);
  assert.deepEqual(sleeps, [5000]);
});

test("rate limiting that never clears surfaces RateLimitError after the configured attempts", async () => {
  const { clock, sleeps } = fakeClock();
  const fake = new FakePowerBI().on("GET", "groups", { status: 429, body: { error: { code: "TooManyRequests" } } });
  const client = createTestClient(fake, clock, { rateLimitMaxAttempts: 3 });

  await assert.rejects(client.withSession((s) => s.http.get("groups")), RateLimitError);
  assert.equal(fake.count("GET", "groups"), 3);
  assert.deepEqual(sleeps, [60_000, 60_000]);
});

test("other failures map to HttpError without retrying", async () => {
  const { clock, sleeps } = fakeClock();
  const fake = new FakePowerBI().on("GET", "groups/missing/datasets", {
    status: 404,
    body: { error: { code: "ItemNotFound", message: "Workspace not found" } },
  });
  const client = createTestClient(fake, clock);

  await assert.rejects(client.withSession((s) => s.http.get("groups/missing/datasets")), (error: unknown) => {
    assert.ok(error instanceof HttpError);
    assert.equal(error.status, 404);
    assert.equal(
      error.message,
      `GET ${TEST_BASE_URL}/groups/missing/datasets failed with status 404: ItemNotFound: Workspace not found`,
    );
    return true;
  });
  assert.equal(fake.requests.length, 1);
  assert.deepEqual(sleeps, []);
});

test("failed requests are logged at warn level", async (t) => {
  const lines: string[] = [];
  t.mock.method(console, "error", (line: unknown) => {
    lines.push(String(line));
  });
  setLogLevel("warn");
  t.after(() => setLogLevel("silent"));

  const fake = new FakePowerBI().on("GET", "groups/missing/datasets", {
    status: 404,
    body: { error: { code: "ItemNotFound" } },
  });
  const client = createTestClient(fake, fakeClock().clock);

  await assert.rejects(client.withSession((s) => s.http.get("groups/missing/datasets")), HttpError);
  assert.equal(lines.length, 1);
  const entry: unknown = JSON.parse(lines[0]);
  assert.ok(isPlainObject(entry));
  assert.equal(entry.level, "warn");
  assert.equal(entry.event, "pbi.request.failed");
  assert.equal(entry.method, "GET");
  assert.equal(entry.url, `${TEST_BASE_URL}/groups/missing/datasets`);
  assert.equal(entry.status, 404);
  assert.equal(entry.attempts, 1);
});
