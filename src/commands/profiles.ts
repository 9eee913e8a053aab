import { loadAppContext, type AppContext } from "../app.js"
import { parseLink } from "../link/index.js"
import { DEFAULT_GROUP_ID } from "../profile/store.js"
import { buildConfigFor } from "../runtime/session.js"
import { toInt } from "../settings/settings.js"
import { createLogger } from "../utils/log.js"
import { parseArgs } from "./args.js"
import { describeProfile, formatEntry, formatGroupHeader, parsePort, parseProfileId } from "./format.js"

const log = createLogger("cli")

function groupArg(flags: Map<string, string>, fallback: number): number {
  const v = flags.get("--group")
  return v == null ? fallback : toInt(v, fallback)
}

export async function cmdParse(argv: string[]) {
  const { positional, flags } = parseArgs(argv)
  const [link = ""] = positional
  if (!link) throw new Error("usage: linkbox parse <link> [--json]")
  const profile = parseLink(link)
  if (!profile) throw new Error("not a supported share link")
  console.log(flags.has("--json") ? JSON.stringify(profile, null, 2) : describeProfile(profile))
}

export async function cmdGen(argv: string[], ctx?: AppContext) {
  const [target = "", portArg] = parseArgs(argv).positional
  if (!target) throw new Error("usage: linkbox gen <link|id> [port]")
  const app = ctx ?? (await loadAppContext())
  const port = parsePort(portArg)
  if (port != null) app.settings.inbound.port = port

  const id = parseProfileId(target)
  const entry = id != null ? app.store.getProfile(id) : undefined
  if (id != null && !entry) throw new Error(`no profile with id ${id}`)
  const profile = entry?.profile ?? parseLink(target)
  if (!profile) throw new Error("not a supported share link")

  const built = await buildConfigFor(profile, app, entry?.overrides)
  if (!built.ok) throw new Error(built.error)
  console.log(JSON.stringify(built.config, null, 2))
}

export async function cmdList(argv: string[], ctx?: AppContext) {
  const { flags } = parseArgs(argv, ["--group"])
  const app = ctx ?? (await loadAppContext())
  const only = flags.has("--group") ? groupArg(flags, DEFAULT_GROUP_ID) : null
  for (const group of app.store.listGroups()) {
    if (only != null && group.id !== only) continue
    const entries = app.store.listGroup(group.id)
    console.log(formatGroupHeader(group, entries.length))
    for (const e of entries) console.log(formatEntry(e))
  }
}

export async function cmdAdd(argv: string[], ctx?: AppContext) {
  const { positional, flags } = parseArgs(argv, ["--group"])
  const [link = ""] = positional
  if (!link) throw new Error("usage: linkbox add <link> [--group id]")
  const app = ctx ?? (await loadAppContext())
  const entry = app.store.parseAndAdd(link, groupArg(flags, app.store.currentGroupId))
  if (!entry) throw new Error("not a supported share link")
  await app.store.save()
  log.debug(`saved ${app.store.filePath ?? "(memory)"}`)
  console.log(formatEntry(entry))
}

export async function cmdRemove(argv: string[], ctx?: AppContext) {
  const [arg = ""] = parseArgs(argv).positional
  const id = parseProfileId(arg)
  if (id == null) throw new Error("usage: linkbox rm <id>")
  const app = ctx ?? (await loadAppContext())
  if (!app.store.removeProfile(id)) throw new Error(`no profile with id ${id}`)
  await app.store.save()
  console.log(`removed ${id}`)
}
