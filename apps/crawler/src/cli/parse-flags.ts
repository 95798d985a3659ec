export interface ParsedArgs {
  flags: Record<string, string | boolean>
  positionals: string[]
}

export interface FlagSpec {
  /** Flags that never consume the following token as their value */
  booleans?: ReadonlySet<string>
}

/**
 * Split argv into flags and positionals.
 *
 * `--key value` and `--key=value` set a value, `--key` alone sets `true`,
 * `--no-key` sets `false`. Boolean flags only take a value through `=`, so a
 * positional may follow them. Everything after `--` is positional.
 */
export function parseFlags(argv: string[], spec: FlagSpec = {}): ParsedArgs {
  const booleans = spec.booleans ?? new Set<string>()
  const flags: Record<string, string | boolean> = {}
  const positionals: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]

    if (token === '--') {
      positionals.push(...argv.slice(i + 1))
      break
    }
    if (token === '-h') {
      flags.help = true
      continue
    }
    if (!token.startsWith('--')) {
      positionals.push(token)
      continue
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq >= 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    if (body.startsWith('no-') && booleans.has(body.slice(3))) {
      flags[body.slice(3)] = false
      continue
    }

    const next = argv[i + 1]
    if (!booleans.has(body) && next !== undefined && !next.startsWith('--')) {
      flags[body] = next
      i++
    } else {
      flags[body] = true
    }
  }

  return { flags, positionals }
}
