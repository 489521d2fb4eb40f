/**
 * Output formatting: JSON for piped output, human-readable tables for TTY.
 * Bigints are printed as decimal strings in both modes.
 */

export type Format = 'json' | 'human'

export function detectFormat(explicit?: string): Format {
  if (explicit === 'json' || explicit === 'human') return explicit
  const env = process.env.XSWAP_FORMAT
  if (env === 'json' || env === 'human') return env
  return process.stdout.isTTY ? 'human' : 'json'
}

export function toJsonText(data: unknown): string {
  return JSON.stringify(data, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value), 2)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function cell(value: unknown): string {
  if (value === null || value === undefined) return ''
  if (typeof value === 'object') return toJsonText(value).replace(/\s*\n\s*/g, ' ')
  return String(value)
}

export function output(data: unknown, format: Format): void {
  if (format === 'json') {
    console.log(toJsonText(data))
    return
  }

  if (Array.isArray(data)) {
    printTable(data.filter(isRecord))
  } else if (isRecord(data)) {
    printKeyValue(data)
  } else {
    console.log(cell(data))
  }
}

function printTable(rows: Record<string, unknown>[]): void {
  if (rows.length === 0) {
    console.log('(no results)')
    return
  }

  const keys = Object.keys(rows[0])
  const widths = keys.map(k =>
    Math.max(k.length, ...rows.map(r => cell(r[k]).length))
  )

  console.log(keys.map((k, i) => k.padEnd(widths[i])).join('  '))
  console.log(widths.map(w => '─'.repeat(w)).join('  '))

  for (const row of rows) {
    console.log(keys.map((k, i) => cell(row[k]).padEnd(widths[i])).join('  '))
  }
}

function printKeyValue(obj: Record<string, unknown>): void {
  const maxKey = Math.max(...Object.keys(obj).map(k => k.length))
  for (const [k, v] of Object.entries(obj)) {
    console.log(`${k.padEnd(maxKey)}  ${cell(v)}`)
  }
}
