import fsp from "node:fs/promises"
import path from "node:path"

export async function ensureDir(dir: string): Promise<void> {
  await fsp.mkdir(dir, { recursive: true })
}

export async function readJson(filePath: string): Promise<unknown> {
  const txt = await fsp.readFile(filePath, "utf8")
  return JSON.parse(txt)
}

export async function writeJson(filePath: string, data: unknown, space = 2): Promise<void> {
  await ensureDir(path.dirname(filePath))
  const tmp = `${filePath}.${process.pid}.tmp`
  await fsp.writeFile(tmp, JSON.stringify(data, null, space), "utf8")
  await fsp.rename(tmp, filePath)
}

export async function readTextOrNull(filePath: string): Promise<string | null> {
  try {
    return await fsp.readFile(filePath, "utf8")
  } catch (e) {
    if (isErrno(e) && e.code === "ENOENT") return null
    throw e
  }
}

export function isErrno(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms))
}
