import { createHash } from "node:crypto";
import os from "node:os";
import path from "node:path";

export interface ContentDigest {
  size: number;
  hash: string;
}

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function contentDigest(content: string | Buffer): ContentDigest {
  const bytes = typeof content === "string" ? Buffer.from(content, "utf8") : content;
  const hash = createHash("sha1");
  hash.update(bytes);
  return { size: bytes.length, hash: hash.digest("hex") };
}

export function digestMatches(digest: ContentDigest | null, size: number, hash: string): boolean {
  if (!digest) return false;
  return digest.size === size && digest.hash === hash.toLowerCase();
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

export function isNonNegativeInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}
