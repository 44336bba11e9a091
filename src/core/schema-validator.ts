import fs from "node:fs";
import path from "node:path";

import { Ajv, type ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";

import { httpError } from "./errors.js";
import type { JsonObject } from "./types.js";
import { isPlainObject } from "./utils.js";

const addFormats = addFormatsModule.default;

export type PayloadDefinition =
  | "Group"
  | "Dataset"
  | "Dataflow"
  | "Report"
  | "Page"
  | "Refresh"
  | "Transaction"
  | "Schedule"
  | "ScheduleUpdate"
  | "QueryResult";

export function loadResourceDefinitions(repoRoot: string): Record<string, unknown> {
  const schemaPath = path.join(repoRoot, "schemas", "resources.schema.json");
  const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, "utf8"));
  if (!isPlainObject(parsed) || !isPlainObject(parsed.definitions)) {
    throw new Error(`${schemaPath} has no definitions object.`);
  }
  return parsed.definitions;
}

/**
 * Checks REST payloads against `schemas/resources.schema.json` before they are
 * turned into resources. With `strictUnknownProperties` every object schema
 * that does not say otherwise rejects fields it does not list.
 */
export class PayloadValidator {
  private readonly ajv: Ajv;

  private readonly cache = new Map<PayloadDefinition, ValidateFunction>();

  constructor(
    private readonly definitions: Record<string, unknown>,
    private readonly strictUnknownProperties: boolean,
  ) {
    this.ajv = new Ajv({
      allErrors: true,
      strict: false,
      allowUnionTypes: true,
    });
    addFormats(this.ajv);
  }

  validate(definition: PayloadDefinition, payload: unknown): string[] {
    const validator = this.getOrCompileValidator(definition);
    if (validator(payload)) return [];

    return (validator.errors ?? []).map((err) => {
      const at = err.instancePath && err.instancePath.length > 0 ? `$${err.instancePath}` : "$";
      return `${at}: ${err.message ?? "invalid value"}`;
    });
  }

  /** Validates one payload from the service; a mismatch is an upstream fault (502). */
  parse(definition: PayloadDefinition, payload: unknown, context: string): JsonObject {
    const errors = this.validate(definition, payload);
    if (errors.length > 0 || !isPlainObject(payload)) {
      throw httpError(502, `Unexpected ${definition} payload from ${context}.`, errors.slice(0, 25));
    }
    return payload;
  }

  parseAll(definition: PayloadDefinition, payloads: unknown[], context: string): JsonObject[] {
    return payloads.map((p) => this.parse(definition, p, context));
  }

  /** Validates a caller-supplied request body; a mismatch is a client fault (400). */
  checkInput(definition: PayloadDefinition, body: unknown): JsonObject {
    const errors = this.validate(definition, body);
    if (errors.length > 0 || !isPlainObject(body)) {
      throw httpError(400, `${definition} body failed validation.`, errors.slice(0, 25));
    }
    return body;
  }

  private getOrCompileValidator(definition: PayloadDefinition): ValidateFunction {
    const cached = this.cache.get(definition);
    if (cached) return cached;

    const schema = this.definitions[definition];
    if (!isPlainObject(schema)) {
      throw new Error(`Schema definition '${definition}' not found.`);
    }

    const validator = this.ajv.compile(this.tighten(schema));
    this.cache.set(definition, validator);
    return validator;
  }

  private tighten(schema: JsonObject): JsonObject {
    const out: JsonObject = {};
    for (const [key, value] of Object.entries(schema)) {
      if (key === "properties" && isPlainObject(value)) {
        const props: JsonObject = {};
        for (const [propName, propSchema] of Object.entries(value)) {
          props[propName] = isPlainObject(propSchema) ? this.tighten(propSchema) : propSchema;
        }
        out.properties = props;
      } else if (key === "items" && isPlainObject(value)) {
        out.items = this.tighten(value);
      } else {
        out[key] = value;
      }
    }

    const isObjectSchema = out.type === "object" && isPlainObject(out.properties);
    if (this.strictUnknownProperties && isObjectSchema && out.additionalProperties === undefined) {
      out.additionalProperties = false;
    }
    return out;
  }
}
