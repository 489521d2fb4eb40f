/**
 * CLI state persistence: HMAC-protected JSON state file plus a lock
 * directory so two CLI processes never write the same state.
 * State lives at $XSWAP_HOME/state.json.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { hmac } from '@noble/hashes/hmac.js'
import { sha256 } from '@noble/hashes/sha2.js'
import { getAddress, isAddress, isHex, toHex, type Address, type Hex } from 'viem'
import { ESCROW_STATE, type EscrowStateValue } from './constants'
import { EscrowError } from './errors'
import type { LedgerSnapshot } from './holders/ledger'
import type { CloseReason, EscrowRecord, PuzzleRecord, RegistrySnapshot } from './types'

const MAX_STATE_BYTES = 4 * 1024 * 1024

const STATE_VALUES: readonly EscrowStateValue[] = Object.values(ESCROW_STATE)
const CLOSE_REASONS: readonly CloseReason[] = ['cashout', 'refund', 'force-refund', 'puzzle-solved', 'puzzle-refunded']

export interface StatePaths {
  dir: string
  state: string
  lock: string
  pid: string
}

export function statePaths(home: string): StatePaths {
  const lock = join(home, 'state.lock')
  return { dir: home, state: join(home, 'state.json'), lock, pid: join(lock, 'pid') }
}

/** Everything the CLI keeps between invocations. */
export interface SimulatorState {
  factory: Address
  registry: RegistrySnapshot
  ledger: LedgerSnapshot
}

type StoredRecord = Record<string, string | number | null>

interface StateDocument {
  version: 1
  factory: string
  registry: { records: StoredRecord[]; puzzles: StoredRecord[] }
  ledger: LedgerSnapshot
}

// ── Serialization ──

function storeRecord(record: EscrowRecord): StoredRecord {
  return {
    handle: record.handle,
    state: record.state,
    amount: record.amount.toString(),
    timelock: record.timelock.toString(),
    escrowerReserve: record.escrowerReserve,
    escrowerTrade: record.escrowerTrade,
    escrowerRefund: record.escrowerRefund,
    payeeReserve: record.payeeReserve,
    payeeTrade: record.payeeTrade,
    escrowerBalance: record.escrowerBalance.toString(),
    payeeBalance: record.payeeBalance.toString(),
    escrowerWithdrawn: record.escrowerWithdrawn.toString(),
    payeeWithdrawn: record.payeeWithdrawn.toString(),
    escrowerExcess: record.escrowerExcess.toString(),
    closeReason: record.closeReason,
  }
}

function storePuzzle(puzzle: PuzzleRecord): StoredRecord {
  return {
    handle: puzzle.handle,
    tradeAmount: puzzle.tradeAmount.toString(),
    puzzleHash: puzzle.puzzleHash,
    puzzleTimelock: puzzle.puzzleTimelock.toString(),
    authorizingSighash: puzzle.authorizingSighash,
  }
}

function corrupt(detail: string): EscrowError {
  return new EscrowError('ERR_STATE_CORRUPT', `State file is malformed: ${detail}`, 'Move the state file aside to start fresh')
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readAddress(obj: Record<string, unknown>, key: string): Address {
  const value = obj[key]
  if (typeof value !== 'string' || !isAddress(value, { strict: false })) throw corrupt(`${key} is not an address`)
  return getAddress(value)
}

function readBigint(obj: Record<string, unknown>, key: string): bigint {
  const value = obj[key]
  if (typeof value !== 'string' || !/^\d+$/.test(value)) throw corrupt(`${key} is not an unsigned integer`)
  return BigInt(value)
}

function readHex(obj: Record<string, unknown>, key: string): Hex {
  const value = obj[key]
  if (typeof value !== 'string' || !isHex(value, { strict: true })) throw corrupt(`${key} is not hex`)
  return value
}

function readState(obj: Record<string, unknown>): EscrowStateValue {
  const state = STATE_VALUES.find(value => value === obj.state)
  if (state === undefined) throw corrupt(`unknown escrow state ${String(obj.state)}`)
  return state
}

function readCloseReason(obj: Record<string, unknown>): CloseReason | null {
  if (obj.closeReason === null || obj.closeReason === undefined) return null
  const reason = CLOSE_REASONS.find(value => value === obj.closeReason)
  if (reason === undefined) throw corrupt(`unknown close reason ${String(obj.closeReason)}`)
  return reason
}

function parseRecord(value: unknown): EscrowRecord {
  if (!isObject(value)) throw corrupt('escrow record is not an object')
  return {
    handle: readAddress(value, 'handle'),
    state: readState(value),
    amount: readBigint(value, 'amount'),
    timelock: readBigint(value, 'timelock'),
    escrowerReserve: readAddress(value, 'escrowerReserve'),
    escrowerTrade: readAddress(value, 'escrowerTrade'),
    escrowerRefund: readAddress(value, 'escrowerRefund'),
    payeeReserve: readAddress(value, 'payeeReserve'),
    payeeTrade: readAddress(value, 'payeeTrade'),
    escrowerBalance: readBigint(value, 'escrowerBalance'),
    payeeBalance: readBigint(value, 'payeeBalance'),
    escrowerWithdrawn: readBigint(value, 'escrowerWithdrawn'),
    payeeWithdrawn: readBigint(value, 'payeeWithdrawn'),
    escrowerExcess: readBigint(value, 'escrowerExcess'),
    closeReason: readCloseReason(value),
  }
}

function parsePuzzle(value: unknown): PuzzleRecord {
  if (!isObject(value)) throw corrupt('puzzle record is not an object')
  return {
    handle: readAddress(value, 'handle'),
    tradeAmount: readBigint(value, 'tradeAmount'),
    puzzleHash: readHex(value, 'puzzleHash'),
    puzzleTimelock: readBigint(value, 'puzzleTimelock'),
    authorizingSighash: readHex(value, 'authorizingSighash'),
  }
}

function parseLedger(value: unknown): LedgerSnapshot {
  if (!isObject(value)) throw corrupt('ledger section is malformed')
  const stored = value.balances
  const rejecting = value.rejecting
  if (!isObject(stored) || !Array.isArray(rejecting)) throw corrupt('ledger section is malformed')
  const balances: Record<string, string> = {}
  for (const address of Object.keys(stored)) {
    balances[readAddress({ address }, 'address')] = readBigint(stored, address).toString()
  }
  return { balances, rejecting: rejecting.map(address => readAddress({ address }, 'address')) }
}

export function serializeState(state: SimulatorState): StateDocument {
  return {
    version: 1,
    factory: state.factory,
    registry: {
      records: state.registry.records.map(storeRecord),
      puzzles: state.registry.puzzles.map(storePuzzle),
    },
    ledger: state.ledger,
  }
}

export function parseState(value: unknown): SimulatorState {
  if (!isObject(value) || value.version !== 1) throw corrupt('unsupported version')
  const registry = value.registry
  if (!isObject(registry)) throw corrupt('registry section is malformed')
  const records = registry.records
  const puzzles = registry.puzzles
  if (!Array.isArray(records) || !Array.isArray(puzzles)) throw corrupt('registry section is malformed')
  return {
    factory: readAddress(value, 'factory'),
    registry: {
      records: records.map(parseRecord),
      puzzles: puzzles.map(parsePuzzle),
    },
    ledger: parseLedger(value.ledger),
  }
}

// ── Integrity ──

function deriveHmacKey(secret: string): Uint8Array {
  return sha256(new TextEncoder().encode(`xswap-state-hmac:${secret}`))
}

export function computeStateHmac(document: unknown, secret: string): string {
  const bytes = new TextEncoder().encode(JSON.stringify(document))
  return toHex(hmac(sha256, deriveHmacKey(secret), bytes))
}

/** Load saved state, or null when nothing has been saved yet. */
export function loadState(home: string, secret: string): SimulatorState | null {
  const paths = statePaths(home)
  if (!existsSync(paths.state)) return null
  const raw = readFileSync(paths.state, 'utf-8')
  if (raw.length > MAX_STATE_BYTES) throw new EscrowError('ERR_STATE_CORRUPT', 'State file too large')

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw corrupt('not valid JSON')
  }
  if (!isObject(parsed)) throw corrupt('not an object')
  const { hmac: savedHmac, ...rest } = parsed
  if (savedHmac !== computeStateHmac(rest, secret)) {
    throw new EscrowError(
      'ERR_STATE_CORRUPT',
      'State file has been tampered with or was written with a different secret',
      'Check XSWAP_STATE_SECRET'
    )
  }
  return parseState(rest)
}

export function saveState(home: string, state: SimulatorState, secret: string): void {
  const paths = statePaths(home)
  mkdirSync(paths.dir, { recursive: true, mode: 0o700 })
  const document = serializeState(state)
  const full = { ...document, hmac: computeStateHmac(document, secret) }
  const tmpPath = paths.state + '.tmp'
  writeFileSync(tmpPath, JSON.stringify(full, null, 2), { mode: 0o600 })
  renameSync(tmpPath, paths.state)
}

// ── Locking ──

function errnoCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    // EPERM: alive but owned by someone else
    return errnoCode(err) === 'EPERM'
  }
}

function tryCreateLock(lockDir: string): boolean {
  try {
    mkdirSync(lockDir)
    return true
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') return false
    throw err
  }
}

export function acquireLock(home: string): void {
  const paths = statePaths(home)
  mkdirSync(paths.dir, { recursive: true, mode: 0o700 })
  // Leftover from a crashed write
  rmSync(paths.state + '.tmp', { force: true })

  if (!tryCreateLock(paths.lock)) {
    const owner = existsSync(paths.pid) ? parseInt(readFileSync(paths.pid, 'utf-8').trim(), 10) : NaN
    if (!isNaN(owner) && owner !== process.pid && processAlive(owner)) {
      throw new EscrowError(
        'ERR_STATE_LOCKED',
        `Another xswap process is using the state (PID ${owner})`,
        'Wait for it to finish and retry'
      )
    }
    // Stale lock
    rmSync(paths.lock, { recursive: true, force: true })
    if (!tryCreateLock(paths.lock)) {
      throw new EscrowError('ERR_STATE_LOCKED', 'Another process acquired the lock during cleanup', 'Try again')
    }
  }

  writeFileSync(paths.pid, String(process.pid), { mode: 0o600 })
}

export function releaseLock(home: string): void {
  rmSync(statePaths(home).lock, { recursive: true, force: true })
}
