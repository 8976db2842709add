import { ConnectivityError } from "../pump/errors.js";

function readStringField(value: object, field: "message" | "code"): string | null {
  const raw: unknown = Reflect.get(value, field);
  return typeof raw === "string" && raw.trim() ? raw : null;
}

function collectErrorText(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current && !seen.has(current)) {
    seen.add(current);

    if (current instanceof Error) {
      if (current.name) parts.push(current.name);
      if (current.message) parts.push(current.message);
      const code = readStringField(current, "code");
      if (code) parts.push(code);
      current = current.cause;
      continue;
    }

    if (typeof current === "object") {
      const message = readStringField(current, "message");
      if (message) parts.push(message);
      const code = readStringField(current, "code");
      if (code) parts.push(code);
      current = Reflect.get(current, "cause");
      continue;
    }

    if (typeof current === "string" && current.trim()) {
      parts.push(current);
    }
    break;
  }

  return parts.join(" ").trim();
}

function hasConnectivityError(error: unknown): boolean {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof ConnectivityError) return true;
    seen.add(current);
    current = current.cause;
  }
  return false;
}

/** True for failures to reach the serial device (missing, busy, or unplugged port). */
export function isConnectivityError(error: unknown): boolean {
  if (hasConnectivityError(error)) return true;

  const text = collectErrorText(error).toLowerCase();
  if (!text) return false;

  const markers = [
    "enoent",
    "eacces",
    "ebusy",
    "enodev",
    "no such file",
    "file not found",
    "access denied",
    "permission denied",
    "port is not open",
    "cannot lock port",
  ];

  return markers.some((marker) => text.includes(marker));
}

export function summarizeConnectivityError(error: unknown): string {
  const text = collectErrorText(error);
  if (!text) {
    return "unknown connectivity error";
  }

  const match = text.match(/\b(ENOENT|EACCES|EBUSY|ENODEV|EIO)\b/i);
  if (match?.[1]) {
    return match[1].toUpperCase();
  }

  if (/access denied|permission denied/i.test(text)) {
    return "EACCES";
  }
  if (/no such file|file not found/i.test(text)) {
    return "ENOENT";
  }

  return text.length > 120 ? `${text.slice(0, 117)}...` : text;
}
