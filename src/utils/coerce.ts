export function toInt(v: unknown, fallback: number) {
  if (v == null || v === "") return fallback
  const n = Number(v)
  return Number.isFinite(n) ? Math.trunc(n) : fallback
}

export function toNum(v: unknown, fallback: number) {
  if (v == null || v === "") return fallback
  const n = Number(v)
  return Number.isFinite(n) ? n : fallback
}

export function toList(value: unknown): string[] {
  if (Array.isArray(value)) return value.map(String).map((s) => s.trim()).filter(Boolean)
  if (value == null || value === "") return []
  return String(value)
    .split(/[,;\s]+/)
    .map((s) => s.trim())
    .filter(Boolean)
}

export function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(max, n))
}

export function envNum(name: string, fallback: number) {
  return toNum(process.env[name], fallback)
}

export function envStr(name: string, fallback = "") {
  const raw = process.env[name]
  return raw == null || raw.trim() === "" ? fallback : raw.trim()
}
