import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import type { JsonObject } from "./types.js";
import { isPlainObject } from "./utils.js";

const DEFAULT_REDACTION_FIELDS = [
  "authorization",
  "access_token",
  "refresh_token",
  "id_token",
  "client_secret",
  "clientsecret",
  "token",
  "secret",
  "password",
];

const REDACTED = "***redacted***";

function normalizeYamlList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((v): v is string => typeof v === "string")
    .map((v) => v.trim())
    .filter((v) => !!v);
}

function readYamlOrDefault(filePath: string, defaultValue: unknown): unknown {
  if (!fs.existsSync(filePath)) return defaultValue;
  const text = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = parseYaml(text);
  return parsed ?? defaultValue;
}

/**
 * Field names to mask in log payloads: the built-in secret names plus the
 * `fields` list of `registry/redaction.yaml`, lower-cased.
 */
export function loadRedactionFields(repoRoot: string): Set<string> {
  const yamlPath = path.join(repoRoot, "registry", "redaction.yaml");
  const parsed = readYamlOrDefault(yamlPath, {});
  const extra = isPlainObject(parsed) ? normalizeYamlList(parsed.fields) : normalizeYamlList(parsed);
  return new Set([...DEFAULT_REDACTION_FIELDS, ...extra].map((x) => x.toLowerCase()));
}

export function defaultRedactionFields(): Set<string> {
  return new Set(DEFAULT_REDACTION_FIELDS);
}

export function redactText(text: string): string {
  return text
    .replace(/(Bearer|Basic)\s+[A-Za-z0-9\-._~+/]+=*/gi, `$1 ${REDACTED}`)
    .replace(/(client_secret|access_token)=[^&\s]+/gi, `$1=${REDACTED}`);
}

export function redactForLog(value: unknown, redactionFields: Set<string>): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") {
    const scrubbed = redactText(value);
    return scrubbed.length > 240 ? `${scrubbed.slice(0, 237)}...` : scrubbed;
  }
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((x) => redactForLog(x, redactionFields));
  if (!isPlainObject(value)) return "[non-plain-object]";

  const out: JsonObject = {};
  for (const [k, v] of Object.entries(value)) {
    const key = k.toLowerCase();
    const shouldRedact = redactionFields.has(key) || key.includes("secret") || key.includes("token") || key.includes("password");
    out[k] = shouldRedact ? REDACTED : redactForLog(v, redactionFields);
  }
  return out;
}
