export interface ParsedArgs {
  positional: string[]
  /** Boolean flags map to "", valued flags to their value. */
  flags: Map<string, string>
}

/** Splits argv into positionals and `--flag [value]` pairs; `valued` lists the flags that take a value. */
export function parseArgs(argv: readonly string[], valued: readonly string[] = []): ParsedArgs {
  const out: ParsedArgs = { positional: [], flags: new Map() }
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? ""
    if (!a.startsWith("--")) out.positional.push(a)
    else if (valued.includes(a)) out.flags.set(a, argv[++i] ?? "")
    else out.flags.set(a, "")
  }
  return out
}
