const utf8Strict = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

/**
 * Decode standard or URL-safe base64 into UTF-8 text, padding to a multiple of 4 first.
 * Throws on characters outside the alphabet, impossible lengths and bytes that are not UTF-8.
 */
export function decodeBase64Strict(input: string): string {
  const s = String(input || "").trim().replace(/-/g, "+").replace(/_/g, "/")
  const padded = s + "=".repeat((4 - (s.length % 4)) % 4)
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(padded)) {
    throw new Error("invalid base64 payload")
  }
  return utf8Strict.decode(Buffer.from(padded, "base64"))
}

export function safeBase64Decode(input: string): string | null {
  try {
    const out = decodeBase64Strict(input)
    return out && out.trim() ? out : null
  } catch {
    return null
  }
}
