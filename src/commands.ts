/**
 * All CLI command handlers. Each returns data; formatting handled by caller.
 *
 * Escrow commands drive a local simulator: the registry and an in-memory
 * ledger are restored from the state file, the command runs, and the result
 * is saved back under the state lock.
 */

import { isHex, type Address, type Hex } from 'viem'
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts'
import { ESCROW_STATE, FORCE_REFUND_GRACE_SECONDS, MAX_UINT256, isStateName, stateName, type EscrowStateName } from './constants'
import { EscrowError } from './errors'
import { describeConfig, type Config } from './config'
import { cashoutDigest, cashoutMessage, puzzleDigest, puzzleMessage, refundDigest, refundMessage, type PuzzleTerms } from './crypto/messages'
import { signCashout, signPuzzle, signRefund } from './crypto/signature'
import { generatePreimage, hashPreimage, isBytes32 } from './crypto/puzzle'
import { EscrowFactory } from './factory'
import { Ledger, LedgerAssetHolder } from './holders/ledger'
import type { HolderProvider } from './holders/types'
import { EscrowRegistry, toAddress, unixNow } from './registry'
import { acquireLock, loadState, releaseLock, saveState } from './store'
import type { Claimant, CloseReason, EscrowParams, EscrowRecord } from './types'

// ── Helpers ──

/**
 * Normalize and validate a private key.
 * Accepts with or without 0x prefix, uppercase or lowercase.
 */
export function normalizePrivateKey(key: string): Hex {
  let normalized = key.trim().toLowerCase()
  if (!normalized.startsWith('0x')) {
    normalized = '0x' + normalized
  }
  if (!isBytes32(normalized)) {
    throw new EscrowError('ERR_INVALID_ARGUMENT', 'Private key must be 32 bytes (64 hex characters)', 'Format: 0x followed by 64 hex chars')
  }
  return normalized
}

function requireKey(config: Config, explicit?: string): Hex {
  const key = explicit?.trim() || config.key
  if (!key) {
    throw new EscrowError('ERR_MISSING_KEY', 'No signing key configured', 'Pass --key or set XSWAP_KEY')
  }
  return normalizePrivateKey(key)
}

export function parseAmount(value: string, label: string): bigint {
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new EscrowError('ERR_INVALID_ARGUMENT', `Invalid ${label}: "${value}" is not a non-negative integer`)
  }
  const parsed = BigInt(trimmed)
  if (parsed > MAX_UINT256) {
    throw new EscrowError('ERR_INVALID_ARGUMENT', `Invalid ${label}: ${trimmed} does not fit in 256 bits`)
  }
  return parsed
}

function parseBytes32(value: string, label: string): Hex {
  const normalized = value.trim().toLowerCase()
  if (!isBytes32(normalized)) {
    throw new EscrowError('ERR_INVALID_ARGUMENT', `${label} must be 32 bytes (0x + 64 hex chars)`)
  }
  return normalized
}

function parseSignature(value: string, label: string): Hex {
  const trimmed = value.trim()
  if (!isHex(trimmed, { strict: true })) {
    throw new EscrowError('ERR_INVALID_SIGNATURE', `${label} is not a hex signature`)
  }
  return trimmed
}

function parseClaimant(value: string): Claimant {
  if (value === 'escrower' || value === 'payee') return value
  throw new EscrowError('ERR_INVALID_ARGUMENT', `Claimant must be "escrower" or "payee", got "${value}"`)
}

// ── Simulator session ──

interface Session {
  ledger: Ledger
  registry: EscrowRegistry
  factory: EscrowFactory
}

function openSession(config: Config): Session {
  const saved = loadState(config.home, config.stateSecret)
  const ledger = saved ? Ledger.restore(saved.ledger) : new Ledger()
  const holders: HolderProvider = handle => new LedgerAssetHolder(ledger, handle)
  const fixed = config.now
  const options = { now: fixed === null ? unixNow : () => fixed }
  const registry = saved ? EscrowRegistry.restore(saved.registry, holders, options) : new EscrowRegistry(options)
  // Handles already issued were derived from the saved factory identity
  const factory = new EscrowFactory(registry, { address: saved?.factory ?? config.factory, holders })

  registry.on('FundsTransferred', e => {
    console.error(`Sent ${e.amount} to ${e.party} reserve ${e.recipient}`)
  })
  registry.on('TransferFailed', e => {
    console.error(`Warning: transfer of ${e.amount} to ${e.recipient} was refused; the ${e.party} can withdraw it later`)
  })
  return { ledger, registry, factory }
}

function readSession<T>(config: Config, fn: (session: Session) => T): T {
  return fn(openSession(config))
}

async function writeSession<T>(config: Config, fn: (session: Session) => Promise<T>): Promise<T> {
  acquireLock(config.home)
  try {
    const session = openSession(config)
    const result = await fn(session)
    saveState(config.home, {
      factory: session.factory.address,
      registry: session.registry.snapshot(),
      ledger: session.ledger.snapshot(),
    }, config.stateSecret)
    return result
  } finally {
    releaseLock(config.home)
  }
}

// ── Views ──

export interface PuzzleView {
  tradeAmount: bigint
  puzzleHash: Hex
  puzzleTimelock: bigint
  authorizingSighash: Hex
}

export interface EscrowView {
  handle: Address
  state: EscrowStateName
  amount: bigint
  timelock: bigint
  forceRefundAfter: bigint
  escrowerReserve: Address
  escrowerTrade: Address
  escrowerRefund: Address
  payeeReserve: Address
  payeeTrade: Address
  escrowerBalance: bigint
  payeeBalance: bigint
  escrowerWithdrawn: bigint
  payeeWithdrawn: bigint
  escrowerExcess: bigint
  closeReason: CloseReason | null
  puzzle: PuzzleView | null
}

function escrowView(registry: EscrowRegistry, record: EscrowRecord): EscrowView {
  const puzzle = registry.getPuzzle(record.handle)
  return {
    handle: record.handle,
    state: stateName(record.state),
    amount: record.amount,
    timelock: record.timelock,
    forceRefundAfter: record.timelock + FORCE_REFUND_GRACE_SECONDS,
    escrowerReserve: record.escrowerReserve,
    escrowerTrade: record.escrowerTrade,
    escrowerRefund: record.escrowerRefund,
    payeeReserve: record.payeeReserve,
    payeeTrade: record.payeeTrade,
    escrowerBalance: record.escrowerBalance,
    payeeBalance: record.payeeBalance,
    escrowerWithdrawn: record.escrowerWithdrawn,
    payeeWithdrawn: record.payeeWithdrawn,
    escrowerExcess: record.escrowerExcess,
    closeReason: record.closeReason,
    puzzle: puzzle
      ? {
          tradeAmount: puzzle.tradeAmount,
          puzzleHash: puzzle.puzzleHash,
          puzzleTimelock: puzzle.puzzleTimelock,
          authorizingSighash: puzzle.authorizingSighash,
        }
      : null,
  }
}

// ── Keys and puzzles ──

export function keysNew() {
  const privateKey = generatePrivateKey()
  return { address: privateKeyToAccount(privateKey).address, privateKey }
}

export function puzzleNew() {
  const preimage = generatePreimage()
  return { preimage, puzzleHash: hashPreimage(preimage) }
}

export function puzzleHash(preimage: string) {
  const normalized = parseBytes32(preimage, 'Preimage')
  return { preimage: normalized, puzzleHash: hashPreimage(normalized) }
}

// ── Signing ──

export interface SignResult {
  handle: Address
  signer: Address
  message: Hex
  digest: Hex
  signature: Hex
}

export async function signCashoutCmd(config: Config, handle: string, opts: { amount: string; key?: string }): Promise<SignResult> {
  const account = privateKeyToAccount(requireKey(config, opts.key))
  const escrow = toAddress(handle, 'handle')
  const amount = parseAmount(opts.amount, 'amount')
  return {
    handle: escrow,
    signer: account.address,
    message: cashoutMessage(escrow, amount),
    digest: cashoutDigest(escrow, amount),
    signature: await signCashout(account, escrow, amount),
  }
}

export async function signRefundCmd(config: Config, handle: string, opts: { amount: string; key?: string }): Promise<SignResult> {
  const account = privateKeyToAccount(requireKey(config, opts.key))
  const escrow = toAddress(handle, 'handle')
  const amount = parseAmount(opts.amount, 'amount')
  return {
    handle: escrow,
    signer: account.address,
    message: refundMessage(escrow, amount),
    digest: refundDigest(escrow, amount),
    signature: await signRefund(account, escrow, amount),
  }
}

export interface PuzzleOpts {
  prevAmount: string
  tradeAmount: string
  hash: string
  timelock: string
}

function puzzleTerms(opts: PuzzleOpts): PuzzleTerms {
  return {
    prevAmountTraded: parseAmount(opts.prevAmount, 'prev-amount'),
    tradeAmount: parseAmount(opts.tradeAmount, 'trade-amount'),
    puzzleHash: parseBytes32(opts.hash, 'Puzzle hash'),
    puzzleTimelock: parseAmount(opts.timelock, 'timelock'),
  }
}

export async function signPuzzleCmd(config: Config, handle: string, opts: PuzzleOpts & { key?: string }): Promise<SignResult> {
  const account = privateKeyToAccount(requireKey(config, opts.key))
  const escrow = toAddress(handle, 'handle')
  const terms = puzzleTerms(opts)
  return {
    handle: escrow,
    signer: account.address,
    message: puzzleMessage(escrow, terms),
    digest: puzzleDigest(escrow, terms),
    signature: await signPuzzle(account, escrow, terms),
  }
}

// ── Escrows ──

export interface EscrowOpts {
  amount: string
  timelock: string
  escrowerReserve: string
  escrowerTrade: string
  escrowerRefund: string
  payeeReserve: string
  payeeTrade: string
}

function escrowParams(opts: EscrowOpts): EscrowParams {
  return {
    amount: parseAmount(opts.amount, 'amount'),
    timelock: parseAmount(opts.timelock, 'timelock'),
    escrowerReserve: toAddress(opts.escrowerReserve, 'escrower-reserve'),
    escrowerTrade: toAddress(opts.escrowerTrade, 'escrower-trade'),
    escrowerRefund: toAddress(opts.escrowerRefund, 'escrower-refund'),
    payeeReserve: toAddress(opts.payeeReserve, 'payee-reserve'),
    payeeTrade: toAddress(opts.payeeTrade, 'payee-trade'),
  }
}

export function escrowsHandle(config: Config, opts: EscrowOpts) {
  return readSession(config, ({ factory, registry }) => {
    const handle = factory.handleFor(escrowParams(opts))
    return { handle, factory: factory.address, registered: registry.has(handle) }
  })
}

export function escrowsCreate(config: Config, opts: EscrowOpts): Promise<EscrowView> {
  return writeSession(config, async ({ factory, registry }) => {
    const record = await factory.createEscrow(escrowParams(opts))
    if (record.state === ESCROW_STATE.Unfunded) {
      console.error(`Escrow ${record.handle} is unfunded; send ${record.amount} to it and run: xswap escrows open ${record.handle}`)
    }
    return escrowView(registry, record)
  })
}

/** Deposit simulated value at an address; escrow handles can be funded before they exist. */
export function escrowsFund(config: Config, handle: string, opts: { amount: string }) {
  return writeSession(config, async ({ ledger }) => {
    const address = toAddress(handle, 'handle')
    const amount = parseAmount(opts.amount, 'amount')
    ledger.deposit(address, amount)
    return { address, deposited: amount, balance: ledger.balanceOf(address) }
  })
}

export function escrowsOpen(config: Config, handle: string): Promise<EscrowView> {
  return writeSession(config, async ({ registry }) => escrowView(registry, await registry.open(handle)))
}

export function escrowsCashout(config: Config, handle: string, opts: { amount: string; escrowerSig: string; payeeSig: string }): Promise<EscrowView> {
  return writeSession(config, async ({ registry }) => {
    const record = await registry.cashout(
      handle,
      parseAmount(opts.amount, 'amount'),
      parseSignature(opts.escrowerSig, 'escrower-sig'),
      parseSignature(opts.payeeSig, 'payee-sig')
    )
    return escrowView(registry, record)
  })
}

export function escrowsRefund(config: Config, handle: string, opts: { amount: string; sig: string }): Promise<EscrowView> {
  return writeSession(config, async ({ registry }) => {
    const record = await registry.refund(handle, parseAmount(opts.amount, 'amount'), parseSignature(opts.sig, 'sig'))
    return escrowView(registry, record)
  })
}

export function escrowsForceRefund(config: Config, handle: string): Promise<EscrowView> {
  return writeSession(config, async ({ registry }) => escrowView(registry, await registry.forceRefund(handle)))
}

export function escrowsPostPuzzle(config: Config, handle: string, opts: PuzzleOpts & { escrowerSig: string; payeeSig: string }): Promise<EscrowView> {
  return writeSession(config, async ({ registry }) => {
    const record = await registry.postPuzzle(
      handle,
      puzzleTerms(opts),
      parseSignature(opts.escrowerSig, 'escrower-sig'),
      parseSignature(opts.payeeSig, 'payee-sig')
    )
    return escrowView(registry, record)
  })
}

export function escrowsSolve(config: Config, handle: string, opts: { preimage: string }): Promise<EscrowView> {
  return writeSession(config, async ({ registry }) => escrowView(registry, await registry.solvePuzzle(handle, opts.preimage.trim())))
}

export function escrowsRefundPuzzle(config: Config, handle: string): Promise<EscrowView> {
  return writeSession(config, async ({ registry }) => escrowView(registry, await registry.refundPuzzle(handle)))
}

export function escrowsWithdraw(config: Config, handle: string, opts: { claimant: string }) {
  return writeSession(config, async ({ registry }) => {
    const claimant = parseClaimant(opts.claimant)
    const amount = await registry.withdraw(handle, claimant)
    const record = registry.get(handle)
    const recipient = claimant === 'escrower' ? record.escrowerReserve : record.payeeReserve
    return { handle: record.handle, claimant, recipient, amount }
  })
}

export function escrowsShow(config: Config, handle: string): EscrowView {
  return readSession(config, ({ registry }) => escrowView(registry, registry.get(handle)))
}

export function escrowsList(config: Config, opts: { state?: string }) {
  let state: EscrowStateName | undefined
  if (opts.state !== undefined) {
    if (!isStateName(opts.state)) {
      throw new EscrowError('ERR_INVALID_ARGUMENT', `Unknown state "${opts.state}"`, `One of: ${Object.keys(ESCROW_STATE).join(', ')}`)
    }
    state = opts.state
  }
  return readSession(config, ({ registry }) =>
    registry.list({ state: state === undefined ? undefined : ESCROW_STATE[state] }).map(record => ({
      handle: record.handle,
      state: stateName(record.state),
      amount: record.amount,
      timelock: record.timelock,
      escrowerBalance: record.escrowerBalance,
      payeeBalance: record.payeeBalance,
      closeReason: record.closeReason,
    }))
  )
}

// ── Ledger ──

export function ledgerBalance(config: Config, address: string) {
  return readSession(config, ({ ledger }) => {
    const account = toAddress(address, 'address')
    return { address: account, balance: ledger.balanceOf(account), rejecting: ledger.isRejecting(account) }
  })
}

/** Make an address refuse incoming transfers, to exercise the failed-push path. */
export function ledgerReject(config: Config, address: string, opts: { off?: boolean }) {
  return writeSession(config, async ({ ledger }) => {
    const account = toAddress(address, 'address')
    ledger.setRejecting(account, !opts.off)
    return { address: account, rejecting: ledger.isRejecting(account) }
  })
}

// ── Config ──

export function configShow(config: Config) {
  return describeConfig(config)
}
