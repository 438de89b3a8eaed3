import fs from "node:fs"
import fsp from "node:fs/promises"
import path from "node:path"

export async function ensureDir(dir: string) {
  await fsp.mkdir(dir, { recursive: true })
}

export async function readJson(filePath: string): Promise<unknown> {
  const txt = await fsp.readFile(filePath, "utf8")
  return JSON.parse(txt)
}

let tmpSeq = 0

// Written beside the target and renamed over it, so readers never see half a file.
export async function writeJson(filePath: string, data: unknown, space = 2) {
  await ensureDir(path.dirname(filePath))
  const tmp = `${filePath}.${process.pid}.${++tmpSeq}.tmp`
  await fsp.writeFile(tmp, JSON.stringify(data, null, space), "utf8")
  try {
    await fsp.rename(tmp, filePath)
  } catch (e) {
    await removeFile(tmp)
    throw e
  }
}

export async function removeFile(filePath: string) {
  try {
    await fsp.unlink(filePath)
    return true
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return false
    throw e
  }
}

export async function listFiles(dir: string, ext: string) {
  if (!fs.existsSync(dir)) return []
  const entries = await fsp.readdir(dir, { withFileTypes: true })
  return entries
    .filter((d) => d.isFile() && d.name.endsWith(ext))
    .map((d) => path.join(dir, d.name))
    .sort()
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e
}
