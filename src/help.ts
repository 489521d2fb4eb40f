/**
 * Help system for CLI commands.
 */

import { RESOURCES } from './routing'

type Resource = typeof RESOURCES[number]

const ACTIONS: Record<Resource, string[]> = {
  escrows: ['handle', 'create', 'fund', 'open', 'cashout', 'refund', 'force-refund', 'post-puzzle', 'solve', 'refund-puzzle', 'withdraw', 'show', 'list'],
  sign: ['cashout', 'refund', 'puzzle'],
  puzzle: ['new', 'hash'],
  keys: ['new'],
  ledger: ['balance', 'reject'],
  config: ['show'],
}

const RESOURCE_DESCRIPTIONS: Record<Resource, string> = {
  escrows: 'Create and settle escrows on the local simulator',
  sign: 'Sign escrow messages with a role key',
  puzzle: 'Generate and hash puzzle preimages',
  keys: 'Generate throwaway role keys',
  ledger: 'Inspect and steer the simulated ledger',
  config: 'View configuration',
}

const ESCROW_FLAGS = '--amount <n> --timelock <unix> --escrower-reserve <addr> --escrower-trade <addr> --escrower-refund <addr> --payee-reserve <addr> --payee-trade <addr>'
const PUZZLE_FLAGS = '--prev-amount <n> --trade-amount <n> --hash <0x..> --timelock <unix>'

const USAGE: Record<string, string> = {
  'escrows handle': `xswap escrows handle ${ESCROW_FLAGS}`,
  'escrows create': `xswap escrows create ${ESCROW_FLAGS}`,
  'escrows fund': 'xswap escrows fund <handle> --amount <n>',
  'escrows open': 'xswap escrows open <handle>',
  'escrows cashout': 'xswap escrows cashout <handle> --amount <n> --escrower-sig <sig> --payee-sig <sig>',
  'escrows refund': 'xswap escrows refund <handle> --amount <n> --sig <sig>',
  'escrows force-refund': 'xswap escrows force-refund <handle>',
  'escrows post-puzzle': `xswap escrows post-puzzle <handle> ${PUZZLE_FLAGS} --escrower-sig <sig> --payee-sig <sig>`,
  'escrows solve': 'xswap escrows solve <handle> --preimage <0x..>',
  'escrows refund-puzzle': 'xswap escrows refund-puzzle <handle>',
  'escrows withdraw': 'xswap escrows withdraw <handle> --claimant escrower|payee',
  'escrows show': 'xswap escrows show <handle>',
  'escrows list': 'xswap escrows list [--state <name>]',
  'sign cashout': 'xswap sign cashout <handle> --amount <n> [--key <hex>]',
  'sign refund': 'xswap sign refund <handle> --amount <n> [--key <hex>]',
  'sign puzzle': `xswap sign puzzle <handle> ${PUZZLE_FLAGS} [--key <hex>]`,
  'puzzle new': 'xswap puzzle new',
  'puzzle hash': 'xswap puzzle hash <preimage>',
  'keys new': 'xswap keys new',
  'ledger balance': 'xswap ledger balance <address>',
  'ledger reject': 'xswap ledger reject <address> [--off]',
  'config show': 'xswap config show',
}

const ACTION_DESCRIPTIONS: Record<string, string> = {
  'escrows handle': 'Compute the deterministic handle for a set of parameters',
  'escrows create': 'Register an escrow (opens it if the handle is already funded)',
  'escrows fund': 'Deposit simulated value at a handle',
  'escrows open': 'Open a funded escrow',
  'escrows cashout': 'Close with both trade signatures',
  'escrows refund': 'Close with the escrower refund signature after the timelock',
  'escrows force-refund': 'Return everything to the escrower after timelock + 2 days',
  'escrows post-puzzle': 'Lock a trade amount behind a SHA-256 hash puzzle',
  'escrows solve': 'Reveal the preimage and credit the payee',
  'escrows refund-puzzle': 'Credit the puzzle amount back after the puzzle timelock',
  'escrows withdraw': 'Pay out a party\'s credited balance',
  'escrows show': 'Show one escrow',
  'escrows list': 'List escrows',
  'sign cashout': 'Sign a cashout message',
  'sign refund': 'Sign a refund message',
  'sign puzzle': 'Sign a puzzle message',
  'puzzle new': 'Random 32-byte preimage and its hash',
  'puzzle hash': 'SHA-256 of a preimage',
  'keys new': 'Random private key and address',
  'ledger balance': 'Show a simulated balance',
  'ledger reject': 'Make an address refuse (or, with --off, accept) transfers',
  'config show': 'Show effective configuration',
}

function isResource(value: string): value is Resource {
  return RESOURCES.some(resource => resource === value)
}

export function usageFor(resource: string, action: string): string {
  return USAGE[`${resource} ${action}`] ?? `xswap ${resource} ${action}`
}

export function showHelp(): void {
  console.log(`xswap - Escrow simulator for cross-chain atomic swaps

Usage:
  xswap <resource> <action> [args] [options]

Resources:
${RESOURCES.map(r => `  ${r.padEnd(10)} ${RESOURCE_DESCRIPTIONS[r]}`).join('\n')}

Meta:
  schema               Machine-readable command spec
  version              Show version
  help [topic]         Show help for a topic

Options:
  --format json|human  Output format (auto-detects TTY)
  --now <unix>         Simulated chain time
  --help, -h           Show help for any command

Examples:
  # Set up a trade and fund it before registering
  xswap escrows handle ${ESCROW_FLAGS}
  xswap escrows fund <handle> --amount 1000
  xswap escrows create ${ESCROW_FLAGS}

  # Both trade keys sign the final split
  xswap sign cashout <handle> --amount 400 --key <escrower-trade-key>

Configuration (environment):
  XSWAP_HOME          State directory (default: ~/.config/xswap)
  XSWAP_STATE_SECRET  Secret for the state file integrity tag
  XSWAP_KEY           Default signing key for 'xswap sign'
  XSWAP_FACTORY       Factory address mixed into handles
  XSWAP_NOW           Simulated chain time (unix seconds)
  XSWAP_FORMAT        json or human`)
}

export function showResourceHelp(resource: string): void {
  if (!isResource(resource)) {
    console.log(`Unknown resource: ${resource}

Available resources: ${RESOURCES.join(', ')}

Run 'xswap help' for overview.`)
    return
  }

  console.log(`xswap ${resource} - ${RESOURCE_DESCRIPTIONS[resource]}

Usage:
  xswap ${resource} <action> [args] [options]

Actions:`)

  for (const action of ACTIONS[resource]) {
    console.log(`  ${action.padEnd(14)} ${ACTION_DESCRIPTIONS[`${resource} ${action}`] ?? ''}`)
  }

  console.log(`
For detailed help on an action:
  xswap ${resource} <action> --help
  xswap help ${resource} <action>`)
}

export function showActionHelp(resource: string, action: string): void {
  if (!isResource(resource) || !ACTIONS[resource].includes(action)) {
    showResourceHelp(resource)
    return
  }
  console.log(`${ACTION_DESCRIPTIONS[`${resource} ${action}`]}

Usage:
  ${usageFor(resource, action)}`)
}
