/**
 * CLI argument parsing and routing.
 */

export type Flags = Record<string, string | boolean>

export type ParsedCommand =
  | { type: 'resource'; resource: string; action: string; args: string[]; flags: Flags }
  | { type: 'meta'; command: string; args: string[]; flags: Flags }
  | { type: 'help'; topic?: string; subtopic?: string }
  | { type: 'unknown'; command: string }

export const RESOURCES = ['escrows', 'sign', 'puzzle', 'keys', 'ledger', 'config'] as const
const META_COMMANDS = ['schema', 'version']

const DEFAULT_ACTIONS: Record<string, string> = {
  escrows: 'list',
  config: 'show',
  keys: 'new',
  puzzle: 'new',
}

function isResource(value: string): boolean {
  return RESOURCES.some(resource => resource === value)
}

export function parseArgs(argv: string[]): ParsedCommand {
  if (argv.length === 0) {
    return { type: 'help', topic: undefined, subtopic: undefined }
  }

  const [first, ...rest] = argv

  // --help or -h anywhere
  const helpIndex = argv.findIndex(a => a === '--help' || a === '-h')
  if (helpIndex !== -1) {
    if (helpIndex === 0) {
      return { type: 'help', topic: undefined, subtopic: undefined }
    }
    if (helpIndex === 1 && isResource(first)) {
      return { type: 'help', topic: first, subtopic: undefined }
    }
    if (helpIndex === 2 && isResource(first)) {
      return { type: 'help', topic: first, subtopic: rest[0] }
    }
    return { type: 'help', topic: first, subtopic: undefined }
  }

  if (first === '--version' || first === '-v') {
    return { type: 'meta', command: 'version', args: [], flags: {} }
  }

  if (first === 'help') {
    return { type: 'help', topic: rest[0], subtopic: rest[1] }
  }

  if (META_COMMANDS.includes(first)) {
    const { args, flags } = parseRest(rest)
    return { type: 'meta', command: first, args, flags }
  }

  if (isResource(first)) {
    const explicit = rest[0] !== undefined && !rest[0].startsWith('-')
    const action = explicit ? rest[0] : DEFAULT_ACTIONS[first] ?? ''
    const { args, flags } = parseRest(explicit ? rest.slice(1) : rest)
    return { type: 'resource', resource: first, action, args, flags }
  }

  return { type: 'unknown', command: first }
}

interface ParsedRest {
  args: string[]
  flags: Flags
}

function parseRest(argv: string[]): ParsedRest {
  const args: string[] = []
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=')
      if (eq !== -1) {
        flags[arg.slice(2, eq)] = arg.slice(eq + 1)
      } else {
        const key = arg.slice(2)
        const next = argv[i + 1]
        if (next !== undefined && !next.startsWith('-')) {
          flags[key] = next
          i++
        } else {
          flags[key] = true
        }
      }
    } else if (arg.startsWith('-') && arg.length === 2) {
      flags[arg.slice(1)] = true
    } else {
      args.push(arg)
    }
  }

  return { args, flags }
}

/** String value of a flag, or undefined when absent or given without a value. */
export function flagString(flags: Flags, name: string): string | undefined {
  const value = flags[name]
  return typeof value === 'string' ? value : undefined
}
