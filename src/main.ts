import { cmdAdd, cmdGen, cmdList, cmdParse, cmdRemove } from "./commands/profiles.js"
import { cmdRun } from "./commands/run.js"
import { cmdSub } from "./commands/sub.js"

export const USAGE = `usage:
  linkbox parse <link> [--json]            decode a share link
  linkbox gen <link|id> [port]             print the sing-box run config
  linkbox run <link|id> [port]             run the engine until Ctrl+C
  linkbox sub <url> [--save] [--name n]    list (or store) a subscription
  linkbox sub --update <groupId>           refresh a stored subscription
  linkbox ls [--group id]                  list stored profiles
  linkbox add <link> [--group id]          store a profile
  linkbox rm <id>                          delete a stored profile

config: $LINKBOX_CONFIG_DIR or ~/.config/linkbox (config.yaml, profiles.json)`

export async function run(argv: string[]) {
  const [command = ""] = argv
  const rest = argv.slice(1)
  switch (command) {
    case "parse":
      return await cmdParse(rest)
    case "gen":
      return await cmdGen(rest)
    case "run":
      return await cmdRun(rest)
    case "sub":
      return await cmdSub(rest)
    case "ls":
      return await cmdList(rest)
    case "add":
      return await cmdAdd(rest)
    case "rm":
      return await cmdRemove(rest)
    default:
      console.log(USAGE)
      if (command && command !== "help" && command !== "--help") process.exitCode = 2
  }
}
