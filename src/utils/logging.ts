import type { IncomingHttpHeaders } from "http";
import { maskIdentifier } from "./mask";

const SECRET_HEADERS = new Set(["x-api-key", "authorization", "cookie"]);
const DIGIT_RUN = /\d{3,}/g;
const PAYMENT_OWNER = /([a-z0-9._-])[a-z0-9._-]+(@[a-z][a-z0-9.-]*)/gi;

/**
 * Masks account and phone digits and the owner part of payment ids in log
 * lines. Escalation reports sent to the collector are never passed through this.
 */
export function redactArtifacts(input: string): string {
  return input
    .replace(DIGIT_RUN, (run) => maskIdentifier(run, 2))
    .replace(PAYMENT_OWNER, (_match, first: string, domain: string) => `${first}***${domain}`);
}

export function maskSecret(value?: string): string {
  if (!value) return "missing";
  return value.length <= 4 ? "*".repeat(value.length) : maskTail(value, 4);
}

function maskTail(value: string, visible: number): string {
  return "*".repeat(value.length - visible) + value.slice(-visible);
}

export function redactHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const name = key.toLowerCase();
    const joined = Array.isArray(value) ? value.join(",") : value;
    output[name] = SECRET_HEADERS.has(name) ? maskSecret(joined) : joined;
  }
  return output;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/** Redacted, length-capped rendering of a request, response or report for the log. */
export function safeStringify(value: unknown, maxLen: number): string {
  const text = redactArtifacts(toText(value));
  return text.length > maxLen ? `${text.slice(0, maxLen)}...(truncated)` : text;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function emit(level: "info" | "warn", message: string): void {
  try {
    console[level](message);
  } catch {
    // a failed log write is dropped
  }
}

export function safeLog(message: string): void {
  emit("info", message);
}

export function safeWarn(message: string): void {
  emit("warn", message);
}
