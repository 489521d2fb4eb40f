/**
 * CLI configuration from environment variables. Flags win over these in the
 * command layer.
 */

import { join } from 'path'
import { homedir } from 'os'
import type { Address } from 'viem'
import { EscrowError } from './errors'
import { toAddress } from './registry'

// Arbitrary fixed identity for the local simulator's factory
export const DEFAULT_FACTORY: Address = '0x0000000000000000000000000000000000000042'

export interface Config {
  home: string
  stateSecret: string
  key: string | null
  factory: Address
  /** Simulated chain time override, unix seconds */
  now: bigint | null
  format: 'json' | 'human' | null
}

type Env = Record<string, string | undefined>

export function parseUnixSeconds(value: string, label: string): bigint {
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new EscrowError('ERR_INVALID_ARGUMENT', `${label} must be unix seconds, got "${value}"`)
  }
  return BigInt(trimmed)
}

export function loadConfig(env: Env = process.env): Config {
  const format = env.XSWAP_FORMAT?.trim()
  const now = env.XSWAP_NOW?.trim()
  const factory = env.XSWAP_FACTORY?.trim()
  return {
    home: env.XSWAP_HOME?.trim() || join(homedir(), '.config', 'xswap'),
    stateSecret: env.XSWAP_STATE_SECRET ?? '',
    key: env.XSWAP_KEY?.trim() || null,
    factory: factory ? toAddress(factory, 'XSWAP_FACTORY') : DEFAULT_FACTORY,
    now: now ? parseUnixSeconds(now, 'XSWAP_NOW') : null,
    format: format === 'json' || format === 'human' ? format : null,
  }
}

/** Config as shown by `xswap config show`; never prints secrets. */
export function describeConfig(config: Config): Record<string, string> {
  return {
    home: config.home,
    stateSecret: config.stateSecret ? '(set)' : '(empty)',
    key: config.key ? '(set)' : '(not set)',
    factory: config.factory,
    now: config.now === null ? '(wall clock)' : config.now.toString(),
    format: config.format ?? '(auto)',
  }
}
