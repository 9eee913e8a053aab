import { fetch as undiciFetch, type RequestInit, type Response } from "undici"
import { z } from "zod"
import { createLogger, errorMessage } from "../utils/log.js"

const log = createLogger("api")

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

export interface TrafficStats {
  upload: number
  download: number
}

const ConnectionSchema = z.object({
  id: z.string().default(""),
  metadata: z.record(z.unknown()).default({}),
  upload: z.number().default(0),
  download: z.number().default(0),
  start: z.string().default(""),
  chains: z.array(z.string()).default([]),
  rule: z.string().default(""),
  rulePayload: z.string().default("")
})

const ConnectionsSchema = z.object({
  uploadTotal: z.number().default(0),
  downloadTotal: z.number().default(0),
  connections: z.array(ConnectionSchema).nullable().default([])
})

const VersionSchema = z.object({ version: z.string().default("") }).passthrough()
const DelaySchema = z.object({ delay: z.number() })
const RecordSchema = z.record(z.unknown())
const LogLineSchema = z.object({ type: z.string().default("info"), payload: z.string().default("") })

export type Connection = z.output<typeof ConnectionSchema>
export type EngineVersion = z.output<typeof VersionSchema>
export type LogLine = z.output<typeof LogLineSchema>

interface ApiReply {
  status: number
  text: string
}

export interface LogStream extends AsyncIterable<LogLine> {
  close(): void
}

export interface ClashApiOptions {
  /** `host:port` of the external controller. */
  addr: string
  secret?: string
  timeoutMs?: number
  fetch?: FetchLike
}

/**
 * Client for the engine's Clash-compatible control API. Every call degrades
 * to a sentinel (null, {}, [], false or -1) instead of throwing.
 */
export class ClashApiClient {
  readonly baseUrl: string
  private readonly secret: string
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchLike

  constructor(opts: ClashApiOptions) {
    this.baseUrl = `http://${opts.addr}`
    this.secret = opts.secret ?? ""
    this.timeoutMs = opts.timeoutMs ?? 5000
    this.fetchImpl = opts.fetch ?? undiciFetch
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = { "content-type": "application/json" }
    if (this.secret) h.authorization = `Bearer ${this.secret}`
    return h
  }

  /** One bounded request; the body is read inside the same timeout window. */
  private async request(method: string, pathAndQuery: string, timeoutMs = this.timeoutMs): Promise<ApiReply> {
    const controller = new AbortController()
    const tid = setTimeout(() => controller.abort(), timeoutMs)
    try {
      const res = await this.fetchImpl(`${this.baseUrl}${pathAndQuery}`, {
        method,
        headers: this.headers(),
        signal: controller.signal
      })
      return { status: res.status, text: await res.text() }
    } finally {
      clearTimeout(tid)
    }
  }

  private async getJson<T>(op: string, pathAndQuery: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, timeoutMs?: number): Promise<T | null> {
    try {
      const res = await this.request("GET", pathAndQuery, timeoutMs)
      if (res.status !== 200) {
        log.debug(`${op}: HTTP ${res.status}`)
        return null
      }
      const parsed = schema.safeParse(JSON.parse(res.text))
      if (!parsed.success) {
        log.debug(`${op}: unexpected response shape`)
        return null
      }
      return parsed.data
    } catch (e) {
      log.debug(`${op} error: ${errorMessage(e)}`)
      return null
    }
  }

  private async del(op: string, pathAndQuery: string): Promise<boolean> {
    try {
      const res = await this.request("DELETE", pathAndQuery)
      return res.status === 204
    } catch (e) {
      log.debug(`${op} error: ${errorMessage(e)}`)
      return false
    }
  }

  async getVersion(): Promise<EngineVersion | null> {
    return await this.getJson("getVersion", "/version", VersionSchema)
  }

  /** Cumulative byte counters since the engine started. */
  async getTraffic(): Promise<TrafficStats> {
    const data = await this.getJson("getTraffic", "/connections", ConnectionsSchema)
    return data ? { upload: data.uploadTotal, download: data.downloadTotal } : { upload: 0, download: 0 }
  }

  async getConnections(): Promise<Connection[]> {
    const data = await this.getJson("getConnections", "/connections", ConnectionsSchema)
    return data?.connections ?? []
  }

  async closeConnection(id: string): Promise<boolean> {
    return await this.del("closeConnection", `/connections/${encodeURIComponent(id)}`)
  }

  async closeAllConnections(): Promise<boolean> {
    return await this.del("closeAllConnections", "/connections")
  }

  async getProxies(): Promise<Record<string, unknown>> {
    return (await this.getJson("getProxies", "/proxies", RecordSchema)) ?? {}
  }

  async getConfig(): Promise<Record<string, unknown>> {
    return (await this.getJson("getConfig", "/configs", RecordSchema)) ?? {}
  }

  /** Round-trip delay in ms through the named outbound, or -1. */
  async testDelay(proxyName: string, url = "https://www.gstatic.com/generate_204", timeoutMs = 5000): Promise<number> {
    const q = new URLSearchParams({ url, timeout: String(timeoutMs) })
    const data = await this.getJson(
      "testDelay",
      `/proxies/${encodeURIComponent(proxyName)}/delay?${q.toString()}`,
      DelaySchema,
      timeoutMs + 2000
    )
    return data ? data.delay : -1
  }

  /**
   * Opens the live log stream. The stream has no timeout; the caller ends it
   * with `close()` or by leaving the `for await` loop.
   */
  async openLogStream(level = "info"): Promise<LogStream | null> {
    const controller = new AbortController()
    let res: Response
    try {
      res = await this.fetchImpl(`${this.baseUrl}/logs?${new URLSearchParams({ level }).toString()}`, {
        method: "GET",
        headers: this.headers(),
        signal: controller.signal
      })
    } catch (e) {
      log.debug(`openLogStream error: ${errorMessage(e)}`)
      return null
    }
    if (res.status !== 200 || !res.body) {
      log.debug(`openLogStream: HTTP ${res.status}`)
      controller.abort()
      return null
    }
    const body = res.body

    const lines = async function* (): AsyncGenerator<LogLine> {
      const decoder = new TextDecoder()
      let buf = ""
      try {
        for await (const chunk of body) {
          buf += decoder.decode(chunk, { stream: true })
          let nl = buf.indexOf("\n")
          while (nl >= 0) {
            const line = parseLogLine(buf.slice(0, nl))
            buf = buf.slice(nl + 1)
            if (line) yield line
            nl = buf.indexOf("\n")
          }
        }
        const tail = parseLogLine(buf + decoder.decode())
        if (tail) yield tail
      } catch (e) {
        if (!controller.signal.aborted) throw e
      } finally {
        controller.abort()
      }
    }

    const iterator = lines()
    return {
      [Symbol.asyncIterator]: () => iterator,
      close: () => controller.abort()
    }
  }
}

export function parseLogLine(raw: string): LogLine | null {
  const s = raw.trim()
  if (!s) return null
  try {
    const parsed = LogLineSchema.safeParse(JSON.parse(s))
    return parsed.success ? parsed.data : { type: "info", payload: s }
  } catch {
    return { type: "info", payload: s }
  }
}
