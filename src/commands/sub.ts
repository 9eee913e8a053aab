import { loadAppContext, type AppContext } from "../app.js"
import { parseSubscriptionContent } from "../link/index.js"
import { fetchSubscription, subscriptionOptions, updateSubscription } from "../proxy/subscription.js"
import { toInt } from "../settings/settings.js"
import { c } from "../utils/log.js"
import { parseArgs } from "./args.js"
import { describeProfile } from "./format.js"

/**
 * `sub <url>` lists what a subscription contains. With `--save [name]` the
 * URL becomes a subscription group (reused when it already exists) and its
 * profiles are stored; `--update <groupId>` refreshes an existing group.
 */
export async function cmdSub(argv: string[], ctx?: AppContext) {
  const { positional, flags } = parseArgs(argv, ["--update", "--name"])
  const app = ctx ?? (await loadAppContext())
  const opts = subscriptionOptions(app.settings.subscription)

  const update = flags.get("--update")
  if (update != null) {
    const result = await updateSubscription(app.store, toInt(update, -1), opts)
    console.log(`group ${result.groupId}: ${result.added} profiles${result.fromCache ? c.yellow(" (from cache)") : ""}`)
    return
  }

  const [url = ""] = positional
  if (!url) throw new Error("usage: linkbox sub <url> [--save] [--name name] | linkbox sub --update <groupId>")

  if (flags.has("--save")) {
    const existing = app.store.listGroups().find((g) => g.subscriptionUrl === url)
    const group = existing ?? app.store.addGroup(flags.get("--name") || new URL(url).hostname, url)
    const result = await updateSubscription(app.store, group.id, opts)
    console.log(`group ${group.id} (${group.name}): ${result.added} profiles${result.fromCache ? c.yellow(" (from cache)") : ""}`)
    return
  }

  const fetched = await fetchSubscription(url, opts)
  const profiles = parseSubscriptionContent(fetched.text)
  profiles.forEach((p, i) => console.log(`${String(i + 1).padStart(4)}  ${describeProfile(p)}`))
  console.log(c.gray(`${profiles.length} profiles${fetched.fromCache ? " (from cache)" : ""}`))
}
