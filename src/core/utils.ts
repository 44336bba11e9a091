import crypto from "node:crypto";

import { AbortedError } from "./errors.js";
import type { JsonObject, LogLevel } from "./types.js";

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function readBoolEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function readIntEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (!raw || !raw.trim()) return defaultValue;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return defaultValue;
  return clamp(Math.trunc(parsed), min, max);
}

export function readStringEnv(name: string, defaultValue: string): string {
  const raw = process.env[name];
  if (raw === undefined || !raw.trim()) return defaultValue;
  return raw.trim();
}

export function isPlainObject(v: unknown): v is JsonObject {
  if (v === null || typeof v !== "object") return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

export function toNonEmptyString(value: unknown, fieldName: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new TypeError(`${fieldName} must be a non-empty string.`);
  }
  return value.trim();
}

export function constantTimeEqual(lhs: string, rhs: string): boolean {
  const left = Buffer.from(lhs);
  const right = Buffer.from(rhs);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AbortedError(abortMessage(signal));
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortedError(abortMessage(signal)));

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError(abortMessage(signal)));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function abortMessage(signal: AbortSignal | undefined): string {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error && reason.message) return reason.message;
  if (typeof reason === "string" && reason) return reason;
  return "Operation aborted.";
}

// ---- Structured logging -------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function parseLogLevel(raw: string | undefined): LogLevel {
  const v = (raw ?? "").trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent") return v;
  return "info";
}

let activeLevel: LogLevel = parseLogLevel(process.env.PBI_LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

function emit(level: Exclude<LogLevel, "silent">, event: string, data: JsonObject): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return;
  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    event,
    ...data,
  });
  if (level === "warn" || level === "error") console.error(line);
  else console.log(line);
}

export function logDebug(event: string, data: JsonObject = {}): void {
  emit("debug", event, data);
}

export function logInfo(event: string, data: JsonObject = {}): void {
  emit("info", event, data);
}

export function logWarn(event: string, data: JsonObject = {}): void {
  emit("warn", event, data);
}

export function logError(event: string, data: JsonObject = {}): void {
  emit("error", event, data);
}
