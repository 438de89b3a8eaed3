import { decodeBase64Strict } from "../utils/base64.js"
import { hasKnownScheme } from "./endpoint.js"

export type TextEncodingUsed = "utf-8" | "utf-8-bom" | "latin1"

export type ContentEncoding = "base64" | "plain"

export type ParseOutcome =
  | { ok: true; lines: string[]; encoding: ContentEncoding; dropped: number }
  | { ok: false; reason: string; encoding: ContentEncoding; dropped: number }

// Whole-payload base64 is only assumed for single-token bodies at least this long.
export const BASE64_MIN_LENGTH = 16

const utf8Strict = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

/** UTF-8, then UTF-8 with a byte-order mark, then Latin-1 which accepts any byte sequence. */
export function decodePayload(bytes: Uint8Array): { text: string; encoding: TextEncodingUsed } {
  try {
    const text = utf8Strict.decode(bytes)
    if (text.charCodeAt(0) === 0xfeff) return { text: text.slice(1), encoding: "utf-8-bom" }
    return { text, encoding: "utf-8" }
  } catch {
    return { text: Buffer.from(bytes).toString("latin1"), encoding: "latin1" }
  }
}

export function looksLikeBase64Blob(text: string) {
  const s = String(text || "").trim()
  if (s.length < BASE64_MIN_LENGTH) return false
  return !/\s/.test(s)
}

function splitLines(text: string) {
  return String(text || "")
    .split(/\r?\n|\r/)
    .map((s) => s.trim())
    .filter(Boolean)
}

/**
 * Turn a decoded subscription body into descriptor lines. Single-token bodies are tried as base64
 * first; a body that fails to decode is read as plaintext. Lines without a known scheme are dropped
 * and duplicates keep their first occurrence.
 */
export function parseSubscriptionContent(content: string): ParseOutcome {
  const trimmed = String(content || "").trim()
  let body = trimmed
  let encoding: ContentEncoding = "plain"
  if (looksLikeBase64Blob(trimmed)) {
    try {
      body = decodeBase64Strict(trimmed)
      encoding = "base64"
    } catch {
      body = trimmed
    }
  }

  const all = splitLines(body)
  const seen = new Set<string>()
  const lines: string[] = []
  for (const line of all) {
    if (!hasKnownScheme(line)) continue
    if (seen.has(line)) continue
    seen.add(line)
    lines.push(line)
  }
  const dropped = all.length - lines.length

  if (!lines.length) {
    const reason = all.length
      ? `no valid endpoint descriptors among ${all.length} line(s)`
      : "subscription body is empty"
    return { ok: false, reason, encoding, dropped }
  }
  return { ok: true, lines, encoding, dropped }
}
