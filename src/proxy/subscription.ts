import crypto from "node:crypto"
import fsp from "node:fs/promises"
import path from "node:path"
import { Agent, ProxyAgent, fetch as undiciFetch, type Dispatcher } from "undici"
import { parseSubscriptionContent } from "../link/index.js"
import type { ProfileStore } from "../profile/store.js"
import type { SubscriptionSettings } from "../settings/settings.schema.js"
import { ensureDir, isErrno, sleep as defaultSleep } from "../utils/fs.js"
import { createLogger, errorMessage } from "../utils/log.js"
import type { FetchLike } from "./clash-api.js"

const log = createLogger("sub")

export interface FetchSubscriptionOptions {
  userAgent?: string
  timeoutMs?: number
  maxAttempts?: number
  /** Skip TLS certificate checks. */
  insecure?: boolean
  /** `host:port` or a full URL. */
  httpProxy?: string
  /** Directory for the last good body of each URL; empty disables caching. */
  cacheDir?: string
  useCacheOnFail?: boolean
  fetch?: FetchLike
  sleep?: (ms: number) => Promise<void>
}

export interface FetchedSubscription {
  text: string
  fromCache: boolean
  /** `subscription-userinfo` header, when the provider sends one. */
  userInfo: string
}

export function normalizeHttpProxyUrl(raw: string): string {
  const s = raw.trim()
  if (!s) return ""
  return s.includes("://") ? s : `http://${s}`
}

export function safeUrlForLog(url: string): string {
  try {
    const u = new URL(url)
    u.username = ""
    u.password = ""
    u.search = u.search ? "?..." : ""
    return u.toString()
  } catch {
    return url
  }
}

function normalizeHttpUrl(raw: string): string {
  const s = raw.trim()
  try {
    // Some providers reject non-ASCII paths that are not percent-encoded.
    return new URL(s).toString()
  } catch {
    return s
  }
}

export function backoffMs(attempt: number): number {
  return Math.min(8000, 500 * Math.pow(2, attempt - 1))
}

export function cachePathFor(cacheDir: string, url: string): string {
  const key = crypto.createHash("sha1").update(normalizeHttpUrl(url)).digest("hex")
  return path.join(cacheDir, `${key}.txt`)
}

async function readCache(file: string): Promise<string | null> {
  try {
    const txt = await fsp.readFile(file, "utf8")
    return txt.trim() ? txt : null
  } catch (e) {
    if (!(isErrno(e) && e.code === "ENOENT")) log.debug(`cache read failed: ${errorMessage(e)}`)
    return null
  }
}

async function writeCache(file: string, text: string): Promise<void> {
  try {
    await ensureDir(path.dirname(file))
    await fsp.writeFile(file, text, "utf8")
  } catch (e) {
    log.warn(`cache write failed: ${errorMessage(e)}`)
  }
}

function createDispatcher(opts: FetchSubscriptionOptions): Dispatcher | null {
  const proxy = normalizeHttpProxyUrl(opts.httpProxy ?? "")
  if (proxy) {
    log.debug(`fetching through ${safeUrlForLog(proxy)}`)
    return new ProxyAgent(opts.insecure ? { uri: proxy, requestTls: { rejectUnauthorized: false } } : proxy)
  }
  return opts.insecure ? new Agent({ connect: { rejectUnauthorized: false } }) : null
}

class HttpStatusError extends Error {
  constructor(readonly status: number, body: string) {
    super(`subscription HTTP ${status}: ${body.slice(0, 300)}`)
    this.name = "HttpStatusError"
  }
}

async function fetchText(url: string, opts: FetchSubscriptionOptions): Promise<{ text: string; userInfo: string }> {
  const doFetch = opts.fetch ?? undiciFetch
  const wait = opts.sleep ?? defaultSleep
  const timeoutMs = opts.timeoutMs ?? 15_000
  const attempts = Math.max(1, opts.maxAttempts ?? 4)
  const dispatcher = createDispatcher(opts)
  const errors: Error[] = []

  try {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const controller = new AbortController()
      const tid = setTimeout(() => controller.abort(), timeoutMs)
      try {
        const res = await doFetch(url, {
          redirect: "follow",
          signal: controller.signal,
          headers: { "user-agent": opts.userAgent ?? "linkbox/0.1", accept: "*/*" },
          ...(dispatcher ? { dispatcher } : {})
        })
        const text = await res.text()
        if (res.ok) return { text, userInfo: res.headers.get("subscription-userinfo") ?? "" }
        const err = new HttpStatusError(res.status, text)
        // Client errors will not fix themselves.
        if (res.status < 500) throw new AggregateError([...errors, err], err.message)
        errors.push(err)
      } catch (e) {
        if (e instanceof AggregateError) throw e
        errors.push(controller.signal.aborted ? new Error(`timed out after ${timeoutMs}ms`) : toError(e))
      } finally {
        clearTimeout(tid)
      }
      if (attempt < attempts) {
        const delay = backoffMs(attempt)
        log.debug(`attempt ${attempt}/${attempts} failed (${errors[errors.length - 1]?.message ?? ""}), retrying in ${delay}ms`)
        await wait(delay)
      }
    }
  } finally {
    if (dispatcher) await dispatcher.close()
  }
  throw new AggregateError(errors, `subscription fetch failed after ${attempts} attempts: ${safeUrlForLog(url)}`)
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}

/**
 * Downloads a subscription body, retrying 5xx answers and network errors with
 * exponential backoff. When every attempt fails and a cached copy exists, the
 * cached body is returned instead.
 */
export async function fetchSubscription(url: string, opts: FetchSubscriptionOptions = {}): Promise<FetchedSubscription> {
  const target = normalizeHttpUrl(url)
  const cacheFile = opts.cacheDir ? cachePathFor(opts.cacheDir, target) : null
  try {
    const { text, userInfo } = await fetchText(target, opts)
    if (cacheFile && text.trim()) await writeCache(cacheFile, text)
    return { text, fromCache: false, userInfo }
  } catch (e) {
    if (cacheFile && (opts.useCacheOnFail ?? true)) {
      const cached = await readCache(cacheFile)
      if (cached != null) {
        log.warn(`fetch failed, using cached copy of ${safeUrlForLog(target)}: ${errorMessage(e)}`)
        return { text: cached, fromCache: true, userInfo: "" }
      }
    }
    throw e
  }
}

export function subscriptionOptions(s: SubscriptionSettings): FetchSubscriptionOptions {
  return {
    userAgent: s.userAgent,
    timeoutMs: s.timeoutMs,
    maxAttempts: s.maxAttempts,
    insecure: s.insecure,
    httpProxy: s.httpProxy,
    cacheDir: s.cacheDir,
    useCacheOnFail: s.useCacheOnFail
  }
}

export interface UpdateResult {
  groupId: number
  added: number
  fromCache: boolean
}

/**
 * Refreshes a subscription group: fetch, parse, replace the group's profiles
 * and save the store. A body with no usable links leaves the group untouched.
 */
export async function updateSubscription(
  store: ProfileStore,
  groupId: number,
  opts: FetchSubscriptionOptions & { now?: () => number } = {}
): Promise<UpdateResult> {
  const group = store.getGroup(groupId)
  if (!group) throw new Error(`unknown group ${groupId}`)
  if (!group.subscriptionUrl) throw new Error(`group ${groupId} has no subscription URL`)

  const fetched = await fetchSubscription(group.subscriptionUrl, opts)
  const profiles = parseSubscriptionContent(fetched.text)
  if (profiles.length === 0) throw new Error(`subscription for group ${groupId} contained no usable links`)

  store.replaceGroupProfiles(groupId, profiles)
  store.updateGroup(groupId, {
    lastUpdated: (opts.now ?? Date.now)(),
    ...(fetched.userInfo ? { subUserInfo: fetched.userInfo } : {})
  })
  await store.save()
  log.info(`group ${group.name}: ${profiles.length} profiles${fetched.fromCache ? " (from cache)" : ""}`)
  return { groupId, added: profiles.length, fromCache: fetched.fromCache }
}
