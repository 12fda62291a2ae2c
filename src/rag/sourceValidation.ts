import net from "node:net";
import path from "node:path";

import { InvalidArgumentError } from "../errors.js";

export const MAX_URL_LENGTH = 2048;
export const MAX_PDF_BYTES = 10 * 1024 * 1024;
export const MAX_QUESTION_LENGTH = 1000;

function isPrivateIPv4(host: string): boolean {
  const parts = host.split(".").map((p) => Number(p));
  const [a = -1, b = -1] = parts;
  return (
    a === 0 ||
    a === 10 ||
    a === 127 ||
    (a === 169 && b === 254) ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168)
  );
}

function isBlockedHost(hostname: string): boolean {
  const host = hostname.toLowerCase().replace(/^\[|\]$/g, "");
  if (host === "localhost" || host.endsWith(".localhost")) return true;
  if (net.isIPv4(host)) return isPrivateIPv4(host);
  if (net.isIPv6(host)) {
    return host === "::1" || host === "::" || host.startsWith("fc") || host.startsWith("fd") || host.startsWith("fe80");
  }
  return false;
}

/** Returns the trimmed URL when it is a public http(s) address. */
export function validateUrl(raw: string): string {
  const url = raw.trim();
  if (!url) {
    throw new InvalidArgumentError("URL is required");
  }
  if (url.length > MAX_URL_LENGTH) {
    throw new InvalidArgumentError(`URL too long (max ${MAX_URL_LENGTH} characters)`);
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidArgumentError("Invalid URL format");
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidArgumentError("URL must start with http:// or https://");
  }
  if (!parsed.hostname) {
    throw new InvalidArgumentError("Invalid URL format");
  }
  if (isBlockedHost(parsed.hostname)) {
    throw new InvalidArgumentError("Local/private URLs are not allowed");
  }
  return url;
}

export function sanitizeFileName(fileName: string): string {
  return path.basename(fileName).replace(/[^a-zA-Z0-9._-]/g, "_");
}

/** Returns the sanitized file name. */
export function validatePdfUpload(params: { fileName: string; data: Uint8Array }): string {
  if (!params.fileName.trim()) {
    throw new InvalidArgumentError("No filename provided");
  }
  const safeName = sanitizeFileName(params.fileName);
  if (!safeName.toLowerCase().endsWith(".pdf")) {
    throw new InvalidArgumentError("Only PDF files are supported");
  }
  if (params.data.byteLength === 0) {
    throw new InvalidArgumentError("File is empty");
  }
  if (params.data.byteLength > MAX_PDF_BYTES) {
    throw new InvalidArgumentError(`File size exceeds ${MAX_PDF_BYTES / (1024 * 1024)}MB limit`);
  }
  return safeName;
}

export function validateQuestion(question: string): string {
  const trimmed = question.trim();
  if (!trimmed) {
    throw new InvalidArgumentError("Question is required");
  }
  if (trimmed.length > MAX_QUESTION_LENGTH) {
    throw new InvalidArgumentError(`Question too long (max ${MAX_QUESTION_LENGTH} characters)`);
  }
  return trimmed;
}

export function validateThreshold(threshold: number | null | undefined): number | null {
  if (threshold == null) return null;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidArgumentError(`similarityThreshold must be in [0, 1] (got ${threshold})`);
  }
  return threshold;
}
