/**
 * Escrow registry: owns every escrow record, enforces the state machine,
 * verifies who may trigger each transition and settles balances through the
 * escrow's asset holder.
 *
 *   Unfunded ──open──▶ Open ──cashout / refund / forceRefund──▶ Closed
 *                        │
 *                        └──postPuzzle──▶ PuzzlePosted ──solvePuzzle / refundPuzzle──▶ Closed
 *
 * Direct closes (cashout, refund, forceRefund) push both credits to the
 * reserves right away. Puzzle-path credits stay in the registry until the
 * party calls `withdraw`. A push that fails leaves the credit claimable, so
 * the state machine always advances and `withdraw` is the fallback.
 *
 * Calls run one at a time through an internal queue; a guard failure throws
 * before anything is mutated.
 */

import { EventEmitter } from 'events'
import { bytesToHex, getAddress, hexToBytes, isAddress, type Address, type Hex } from 'viem'
import { ESCROW_STATE, FORCE_REFUND_GRACE_SECONDS, MAX_UINT256, stateName, type EscrowStateValue } from './constants'
import { EscrowError, timelockNotReached } from './errors'
import { cashoutDigest, refundDigest, puzzleDigest, type PuzzleTerms } from './crypto/messages'
import { isSignedBy } from './crypto/signature'
import { isBytes32, verifyPreimage } from './crypto/puzzle'
import type { AssetHolder, HolderProvider } from './holders/types'
import type {
  Claimant,
  CloseReason,
  EscrowEventName,
  EscrowEvents,
  EscrowParams,
  EscrowRecord,
  PuzzleRecord,
  RegistrySnapshot,
} from './types'

/**
 * Proof of being the registry's factory. The registry hands out exactly one.
 */
export class FactoryCapability {
  private readonly scope = 'escrow-factory'

  private constructor() {}

  static issue(): FactoryCapability {
    return new FactoryCapability()
  }
}

export interface RegistryOptions {
  /** Chain time in unix seconds. Defaults to the wall clock. */
  now?: () => bigint
}

export function unixNow(): bigint {
  return BigInt(Math.floor(Date.now() / 1000))
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function toAddress(value: string, label: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new EscrowError('ERR_INVALID_ADDRESS', `${label} is not a valid address: ${value}`)
  }
  return getAddress(value)
}

function normalizeParams(params: EscrowParams): EscrowParams {
  return {
    amount: params.amount,
    timelock: params.timelock,
    escrowerReserve: toAddress(params.escrowerReserve, 'escrowerReserve'),
    escrowerTrade: toAddress(params.escrowerTrade, 'escrowerTrade'),
    escrowerRefund: toAddress(params.escrowerRefund, 'escrowerRefund'),
    payeeReserve: toAddress(params.payeeReserve, 'payeeReserve'),
    payeeTrade: toAddress(params.payeeTrade, 'payeeTrade'),
  }
}

/** Throws `code` unless `value` fits a uint256. */
export function requireUint256(value: bigint, label: string, code: 'ERR_INVALID_AMOUNT' | 'ERR_INVALID_ARGUMENT'): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new EscrowError(code, `${label} must be between 0 and 2^256 - 1, got ${value}`)
  }
}

function requireAmount(value: bigint, max: bigint, label: string): void {
  if (value < 0n || value > max || value > MAX_UINT256) {
    throw new EscrowError('ERR_INVALID_AMOUNT', `${label} must be between 0 and ${max}, got ${value}`)
  }
}

function reserveOf(record: EscrowRecord, party: Claimant): Address {
  return party === 'escrower' ? record.escrowerReserve : record.payeeReserve
}

function creditOf(record: EscrowRecord, party: Claimant): bigint {
  return party === 'escrower' ? record.escrowerBalance : record.payeeBalance
}

// credit plus, for the escrower, over-funding that could not be returned at open
function claimableOf(record: EscrowRecord, party: Claimant): bigint {
  return party === 'escrower' ? record.escrowerBalance + record.escrowerExcess : record.payeeBalance
}

function settle(record: EscrowRecord, party: Claimant): void {
  addWithdrawn(record, party, creditOf(record, party))
  setCredit(record, party, 0n)
  if (party === 'escrower') record.escrowerExcess = 0n
}

function setCredit(record: EscrowRecord, party: Claimant, amount: bigint): void {
  if (party === 'escrower') record.escrowerBalance = amount
  else record.payeeBalance = amount
}

function addWithdrawn(record: EscrowRecord, party: Claimant, amount: bigint): void {
  if (party === 'escrower') record.escrowerWithdrawn += amount
  else record.payeeWithdrawn += amount
}

export class EscrowRegistry {
  private readonly records = new Map<Address, EscrowRecord>()
  private readonly puzzles = new Map<Address, PuzzleRecord>()
  private readonly holders = new Map<Address, AssetHolder>()
  private readonly events = new EventEmitter()
  private readonly now: () => bigint
  private factory: FactoryCapability | null = null
  private queue: Promise<unknown> = Promise.resolve()

  constructor(options: RegistryOptions = {}) {
    this.now = options.now ?? unixNow
  }

  /** Hand out the factory capability. Only the first caller gets one. */
  issueFactoryCapability(): FactoryCapability {
    if (this.factory !== null) {
      throw new EscrowError('ERR_UNAUTHORIZED', 'Factory capability has already been issued')
    }
    this.factory = FactoryCapability.issue()
    return this.factory
  }

  on<K extends EscrowEventName>(event: K, listener: (payload: EscrowEvents[K]) => void): this {
    this.events.on(event, listener)
    return this
  }

  off<K extends EscrowEventName>(event: K, listener: (payload: EscrowEvents[K]) => void): this {
    this.events.off(event, listener)
    return this
  }

  // ── Queries ──

  has(handle: string): boolean {
    return isAddress(handle, { strict: false }) && this.records.has(getAddress(handle))
  }

  get(handle: string): EscrowRecord {
    return { ...this.requireRecord(handle) }
  }

  getPuzzle(handle: string): PuzzleRecord | null {
    const puzzle = this.puzzles.get(toAddress(handle, 'handle'))
    return puzzle ? { ...puzzle } : null
  }

  list(filter: { state?: EscrowStateValue } = {}): EscrowRecord[] {
    const all = [...this.records.values()]
    return all
      .filter(record => filter.state === undefined || record.state === filter.state)
      .map(record => ({ ...record }))
  }

  /** Earliest time `forceRefund` is accepted. */
  forceRefundTimelock(handle: string): bigint {
    return this.requireRecord(handle).timelock + FORCE_REFUND_GRACE_SECONDS
  }

  // ── Transitions ──

  /** Register a new escrow. Factory-only; the escrow starts Unfunded. */
  create(capability: FactoryCapability, handle: Address, params: EscrowParams, holder: AssetHolder): Promise<EscrowRecord> {
    return this.serialize(async () => {
      if (this.factory === null || capability !== this.factory) {
        throw new EscrowError('ERR_UNAUTHORIZED', 'Only the registered factory can create escrows')
      }
      const key = toAddress(handle, 'handle')
      const normalized = normalizeParams(params)
      if (normalized.amount <= 0n) {
        throw new EscrowError('ERR_INVALID_AMOUNT', 'Escrow amount must be greater than zero')
      }
      requireUint256(normalized.amount, 'Escrow amount', 'ERR_INVALID_AMOUNT')
      if (normalized.timelock < 0n) {
        throw new EscrowError('ERR_INVALID_ARGUMENT', 'Escrow timelock must not be negative')
      }
      requireUint256(normalized.timelock, 'Escrow timelock', 'ERR_INVALID_ARGUMENT')
      if (this.records.has(key)) {
        throw new EscrowError('ERR_ALREADY_EXISTS', `Escrow ${key} is already registered`)
      }

      const record: EscrowRecord = {
        ...normalized,
        handle: key,
        state: ESCROW_STATE.Unfunded,
        escrowerBalance: 0n,
        payeeBalance: 0n,
        escrowerWithdrawn: 0n,
        payeeWithdrawn: 0n,
        escrowerExcess: 0n,
        closeReason: null,
      }
      this.records.set(key, record)
      this.holders.set(key, holder)
      this.emit('Opened', { handle: key, amount: record.amount, timelock: record.timelock })
      return { ...record }
    })
  }

  /** Unfunded → Open once the holder has at least `amount`. Excess goes back to the escrower. */
  open(handle: string): Promise<EscrowRecord> {
    return this.serialize(async () => {
      const record = this.requireRecord(handle)
      this.requireState(record, ESCROW_STATE.Unfunded, 'open')
      const holder = this.holderFor(record)

      const held = await holder.balance()
      if (held < record.amount) {
        throw new EscrowError(
          'ERR_INSUFFICIENT_BALANCE',
          `Escrow ${record.handle} holds ${held}, needs ${record.amount}`,
          `Send ${record.amount - held} more to ${holder.address}`
        )
      }

      record.state = ESCROW_STATE.Open
      const excess = held - record.amount
      if (excess > 0n) {
        const sent = await this.trySend(holder, record.escrowerReserve, excess)
        if (!sent) record.escrowerExcess = excess
        const payload = { handle: record.handle, party: 'escrower' as const, recipient: record.escrowerReserve, amount: excess }
        this.emit(sent ? 'FundsTransferred' : 'TransferFailed', payload)
      }
      this.emit('Funded', { handle: record.handle, amount: record.amount, excess })
      return { ...record }
    })
  }

  /** Bilateral close: both trade keys agree on the final split. */
  cashout(handle: string, amountTraded: bigint, escrowerSig: string, payeeSig: string): Promise<EscrowRecord> {
    return this.serialize(async () => {
      const record = this.requireRecord(handle)
      this.requireState(record, ESCROW_STATE.Open, 'cashout')
      requireAmount(amountTraded, record.amount, 'amountTraded')

      const digest = cashoutDigest(record.handle, amountTraded)
      await this.requireSignature(digest, escrowerSig, record.escrowerTrade, 'escrower trade')
      await this.requireSignature(digest, payeeSig, record.payeeTrade, 'payee trade')

      await this.closeAndPush(record, record.amount - amountTraded, amountTraded, 'cashout')
      return { ...record }
    })
  }

  /** Unilateral close by the escrower's refund key once the escrow timelock has passed. */
  refund(handle: string, amountTraded: bigint, escrowerRefundSig: string): Promise<EscrowRecord> {
    return this.serialize(async () => {
      const record = this.requireRecord(handle)
      this.requireState(record, ESCROW_STATE.Open, 'refund')
      const now = this.now()
      if (now < record.timelock) {
        throw timelockNotReached('Escrow', record.timelock, now)
      }
      requireAmount(amountTraded, record.amount, 'amountTraded')

      const digest = refundDigest(record.handle, amountTraded)
      await this.requireSignature(digest, escrowerRefundSig, record.escrowerRefund, 'escrower refund')

      await this.closeAndPush(record, record.amount - amountTraded, amountTraded, 'refund')
      return { ...record }
    })
  }

  /** Signature-free last resort: everything goes back to the escrower after the grace period. */
  forceRefund(handle: string): Promise<EscrowRecord> {
    return this.serialize(async () => {
      const record = this.requireRecord(handle)
      this.requireState(record, ESCROW_STATE.Open, 'forceRefund')
      const now = this.now()
      const unlocksAt = record.timelock + FORCE_REFUND_GRACE_SECONDS
      if (now < unlocksAt) {
        throw timelockNotReached('Escrow force refund', unlocksAt, now)
      }

      record.escrowerBalance = record.amount
      record.payeeBalance = 0n
      this.close(record, 'force-refund')
      await this.push(record, 'escrower')
      return { ...record }
    })
  }

  /**
   * Settle the already-agreed amount and lock `tradeAmount` behind a SHA-256
   * hash puzzle. Credits are not pushed; parties collect them with `withdraw`.
   */
  postPuzzle(handle: string, terms: PuzzleTerms, escrowerSig: string, payeeSig: string): Promise<EscrowRecord> {
    return this.serialize(async () => {
      const record = this.requireRecord(handle)
      this.requireState(record, ESCROW_STATE.Open, 'postPuzzle')
      if (!isBytes32(terms.puzzleHash)) {
        throw new EscrowError('ERR_INVALID_ARGUMENT', 'puzzleHash must be 32 bytes (0x + 64 hex chars)')
      }
      if (terms.puzzleTimelock < 0n) {
        throw new EscrowError('ERR_INVALID_ARGUMENT', 'puzzleTimelock must not be negative')
      }
      requireUint256(terms.puzzleTimelock, 'puzzleTimelock', 'ERR_INVALID_ARGUMENT')
      requireAmount(terms.prevAmountTraded, record.amount, 'prevAmountTraded')
      requireAmount(terms.tradeAmount, record.amount - terms.prevAmountTraded, 'tradeAmount')

      const digest = puzzleDigest(record.handle, terms)
      await this.requireSignature(digest, escrowerSig, record.escrowerTrade, 'escrower trade')
      await this.requireSignature(digest, payeeSig, record.payeeTrade, 'payee trade')

      const puzzle: PuzzleRecord = {
        handle: record.handle,
        tradeAmount: terms.tradeAmount,
        puzzleHash: bytesToHex(hexToBytes(terms.puzzleHash)),
        puzzleTimelock: terms.puzzleTimelock,
        authorizingSighash: digest,
      }
      this.puzzles.set(record.handle, puzzle)
      record.payeeBalance = terms.prevAmountTraded
      record.escrowerBalance = record.amount - terms.prevAmountTraded - terms.tradeAmount
      record.state = ESCROW_STATE.PuzzlePosted
      this.checkConservation(record)

      this.emit('PuzzlePosted', {
        handle: record.handle,
        tradeAmount: puzzle.tradeAmount,
        puzzleHash: puzzle.puzzleHash,
        puzzleTimelock: puzzle.puzzleTimelock,
        sighash: digest,
      })
      return { ...record }
    })
  }

  /** Reveal the preimage; the puzzle amount is credited to the payee. */
  solvePuzzle(handle: string, preimage: string): Promise<EscrowRecord> {
    return this.serialize(async () => {
      const record = this.requireRecord(handle)
      this.requireState(record, ESCROW_STATE.PuzzlePosted, 'solvePuzzle')
      const puzzle = this.requirePuzzle(record)
      if (!isBytes32(preimage)) {
        throw new EscrowError('ERR_INVALID_PREIMAGE', 'Preimage must be 32 bytes (0x + 64 hex chars)')
      }
      if (!verifyPreimage(preimage, puzzle.puzzleHash)) {
        throw new EscrowError('ERR_INVALID_PREIMAGE', 'Preimage does not hash to the posted puzzle')
      }

      record.payeeBalance += puzzle.tradeAmount
      this.emit('PreimageRevealed', { handle: record.handle, puzzleHash: puzzle.puzzleHash, preimage })
      this.close(record, 'puzzle-solved')
      return { ...record }
    })
  }

  /** After the puzzle timelock, the unsolved puzzle amount is credited back to the escrower. */
  refundPuzzle(handle: string): Promise<EscrowRecord> {
    return this.serialize(async () => {
      const record = this.requireRecord(handle)
      this.requireState(record, ESCROW_STATE.PuzzlePosted, 'refundPuzzle')
      const puzzle = this.requirePuzzle(record)
      const now = this.now()
      if (now < puzzle.puzzleTimelock) {
        throw timelockNotReached('Puzzle', puzzle.puzzleTimelock, now)
      }

      record.escrowerBalance += puzzle.tradeAmount
      this.close(record, 'puzzle-refunded')
      return { ...record }
    })
  }

  /**
   * Pay out a party's whole credit to its reserve, plus any unreturned
   * over-funding for the escrower. Allowed in any state.
   * A refused transfer restores the credit and throws.
   */
  withdraw(handle: string, claimant: Claimant): Promise<bigint> {
    return this.serialize(async () => {
      const record = this.requireRecord(handle)
      const credit = creditOf(record, claimant)
      const excess = claimant === 'escrower' ? record.escrowerExcess : 0n
      const amount = claimableOf(record, claimant)
      if (amount === 0n) {
        throw new EscrowError('ERR_NO_BALANCE', `No ${claimant} balance to withdraw from ${record.handle}`)
      }

      const recipient = reserveOf(record, claimant)
      const holder = this.holderFor(record)
      setCredit(record, claimant, 0n)
      if (claimant === 'escrower') record.escrowerExcess = 0n
      const sent = await this.trySend(holder, recipient, amount)
      if (!sent) {
        setCredit(record, claimant, credit)
        if (claimant === 'escrower') record.escrowerExcess = excess
        this.emit('TransferFailed', { handle: record.handle, party: claimant, recipient, amount })
        throw new EscrowError(
          'ERR_TRANSFER_FAILED',
          `Transfer of ${amount} to ${recipient} was refused`,
          'The credit is still claimable; retry once the reserve accepts transfers'
        )
      }
      addWithdrawn(record, claimant, credit)
      this.checkConservation(record)
      this.emit('FundsTransferred', { handle: record.handle, party: claimant, recipient, amount })
      return amount
    })
  }

  // ── Persistence ──

  snapshot(): RegistrySnapshot {
    return {
      records: [...this.records.values()].map(record => ({ ...record })),
      puzzles: [...this.puzzles.values()].map(puzzle => ({ ...puzzle })),
    }
  }

  /** Rebuild a registry from a snapshot. The new registry has not issued its factory capability yet. */
  static restore(snapshot: RegistrySnapshot, holders: HolderProvider, options: RegistryOptions = {}): EscrowRegistry {
    const registry = new EscrowRegistry(options)
    for (const record of snapshot.records) {
      const handle = getAddress(record.handle)
      registry.records.set(handle, { ...record, handle })
      registry.holders.set(handle, holders(handle))
    }
    for (const puzzle of snapshot.puzzles) {
      const handle = getAddress(puzzle.handle)
      registry.puzzles.set(handle, { ...puzzle, handle })
    }
    return registry
  }

  // ── Internals ──

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task)
    this.queue = run.catch(() => undefined)
    return run
  }

  private emit<K extends EscrowEventName>(event: K, payload: EscrowEvents[K]): void {
    try {
      this.events.emit(event, payload)
    } catch (err) {
      // listeners are observers only
      console.error(`${event} listener failed: ${describeError(err)}`)
    }
  }

  private requireRecord(handle: string): EscrowRecord {
    const record = this.records.get(toAddress(handle, 'handle'))
    if (!record) {
      throw new EscrowError('ERR_NOT_FOUND', `Escrow ${handle} is not registered`)
    }
    return record
  }

  private requirePuzzle(record: EscrowRecord): PuzzleRecord {
    const puzzle = this.puzzles.get(record.handle)
    if (!puzzle) {
      throw new EscrowError('ERR_INVALID_STATE', `Escrow ${record.handle} has no posted puzzle`)
    }
    return puzzle
  }

  private requireState(record: EscrowRecord, expected: EscrowStateValue, action: string): void {
    if (record.state !== expected) {
      throw new EscrowError(
        'ERR_INVALID_STATE',
        `Cannot ${action}: escrow ${record.handle} is ${stateName(record.state)}, expected ${stateName(expected)}`
      )
    }
  }

  private async requireSignature(digest: Hex, signature: string, expected: Address, role: string): Promise<void> {
    if (!(await isSignedBy(digest, signature, expected))) {
      throw new EscrowError('ERR_INVALID_SIGNATURE', `Invalid ${role} signature`)
    }
  }

  private holderFor(record: EscrowRecord): AssetHolder {
    const holder = this.holders.get(record.handle)
    if (!holder) {
      throw new EscrowError('ERR_NOT_FOUND', `No asset holder bound to escrow ${record.handle}`)
    }
    return holder
  }

  private async trySend(holder: AssetHolder, recipient: Address, amount: bigint): Promise<boolean> {
    try {
      return await holder.send(recipient, amount)
    } catch (err) {
      console.error(`Asset holder ${holder.address} failed to send ${amount}: ${describeError(err)}`)
      return false
    }
  }

  private async closeAndPush(record: EscrowRecord, escrowerShare: bigint, payeeShare: bigint, reason: CloseReason): Promise<void> {
    record.escrowerBalance = escrowerShare
    record.payeeBalance = payeeShare
    this.close(record, reason)
    await this.push(record, 'escrower')
    await this.push(record, 'payee')
  }

  private close(record: EscrowRecord, reason: CloseReason): void {
    record.state = ESCROW_STATE.Closed
    record.closeReason = reason
    this.checkConservation(record)
    this.emit('Closed', { handle: record.handle, reason })
  }

  /**
   * Best-effort payout of everything a party can claim. On failure it stays
   * claimable through `withdraw`.
   */
  private async push(record: EscrowRecord, party: Claimant): Promise<void> {
    const amount = claimableOf(record, party)
    if (amount === 0n) return
    const recipient = reserveOf(record, party)
    const sent = await this.trySend(this.holderFor(record), recipient, amount)
    if (!sent) {
      this.emit('TransferFailed', { handle: record.handle, party, recipient, amount })
      return
    }
    settle(record, party)
    this.emit('FundsTransferred', { handle: record.handle, party, recipient, amount })
  }

  /** Credited value (claimable + paid out) never exceeds the escrow amount and equals it once closed. */
  private checkConservation(record: EscrowRecord): void {
    const credited = record.escrowerBalance + record.payeeBalance + record.escrowerWithdrawn + record.payeeWithdrawn
    const reserved = record.state === ESCROW_STATE.PuzzlePosted
      ? this.puzzles.get(record.handle)?.tradeAmount ?? 0n
      : 0n
    const settled = record.state === ESCROW_STATE.Closed || record.state === ESCROW_STATE.PuzzlePosted
    if (settled ? credited + reserved !== record.amount : credited > record.amount) {
      throw new Error(
        `Balance invariant broken for ${record.handle}: credited ${credited} + reserved ${reserved} vs amount ${record.amount}`
      )
    }
  }
}
