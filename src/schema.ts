/**
 * Machine-readable command schema for agent discoverability.
 */

import { getVersion } from './version'

export interface CommandParam {
  name: string
  type: 'string' | 'number' | 'boolean'
  required?: boolean
  description: string
  enum?: string[]
  default?: string | number
}

export interface CommandDef {
  name: string
  description: string
  auth: 'none' | 'sign' | 'state'
  params: CommandParam[]
  returns?: string
  notes?: string
}

interface AuthLevelDef {
  level: CommandDef['auth']
  description: string
  credentials: string[]
}

interface EventFieldDef {
  name: string
  fields: Record<string, string>
}

const HANDLE: CommandParam = { name: 'handle', type: 'string', required: true, description: 'Escrow handle (address)' }
const ESCROW_VIEW = '{ handle, state, amount, timelock, forceRefundAfter, roles..., escrowerBalance, payeeBalance, escrowerWithdrawn, payeeWithdrawn, escrowerExcess, closeReason, puzzle }'
const SIGN_RESULT = '{ handle, signer, message, digest, signature }'

const ESCROW_PARAMS: CommandParam[] = [
  { name: '--amount', type: 'string', required: true, description: 'Escrow amount in base units' },
  { name: '--timelock', type: 'number', required: true, description: 'Unix seconds; earliest signed refund' },
  { name: '--escrower-reserve', type: 'string', required: true, description: 'Escrower payout address' },
  { name: '--escrower-trade', type: 'string', required: true, description: 'Escrower key for cashout and puzzle signatures' },
  { name: '--escrower-refund', type: 'string', required: true, description: 'Escrower key for refund signatures' },
  { name: '--payee-reserve', type: 'string', required: true, description: 'Payee payout address' },
  { name: '--payee-trade', type: 'string', required: true, description: 'Payee key for cashout and puzzle signatures' },
]

const PUZZLE_PARAMS: CommandParam[] = [
  { name: '--prev-amount', type: 'string', required: true, description: 'Amount already agreed to the payee' },
  { name: '--trade-amount', type: 'string', required: true, description: 'Amount locked behind the puzzle' },
  { name: '--hash', type: 'string', required: true, description: 'SHA-256 of the preimage (bytes32)' },
  { name: '--timelock', type: 'number', required: true, description: 'Unix seconds after which the puzzle can be refunded' },
]

const KEY_PARAM: CommandParam = { name: '--key', type: 'string', description: 'Signing key (defaults to XSWAP_KEY)' }

export const SCHEMA: {
  version: string
  globalParams: CommandParam[]
  authLevels: AuthLevelDef[]
  commands: CommandDef[]
  events: EventFieldDef[]
} = {
  version: getVersion(),

  globalParams: [
    { name: '--format', type: 'string', description: 'Output format: "json" (default when piped) or "human" (default when TTY)', enum: ['json', 'human'] },
    { name: '--now', type: 'number', description: 'Simulated chain time in unix seconds (overrides XSWAP_NOW)' },
  ],

  authLevels: [
    { level: 'none', description: 'Pure computation or read-only state access.', credentials: [] },
    { level: 'sign', description: 'Requires a role key to sign a message.', credentials: ['XSWAP_KEY'] },
    { level: 'state', description: 'Writes the HMAC-protected state file under the state lock.', credentials: ['XSWAP_STATE_SECRET'] },
  ],

  commands: [
    { name: 'keys new', description: 'Generate a private key and address', auth: 'none', params: [], returns: '{ address, privateKey }' },
    { name: 'puzzle new', description: 'Random 32-byte preimage and its SHA-256', auth: 'none', params: [], returns: '{ preimage, puzzleHash }' },
    { name: 'puzzle hash', description: 'SHA-256 of a preimage', auth: 'none', params: [
      { name: 'preimage', type: 'string', required: true, description: '32-byte hex preimage' },
    ], returns: '{ preimage, puzzleHash }' },

    { name: 'sign cashout', description: 'Sign a cashout message', auth: 'sign', params: [
      HANDLE, { name: '--amount', type: 'string', required: true, description: 'Amount traded to the payee' }, KEY_PARAM,
    ], returns: SIGN_RESULT },
    { name: 'sign refund', description: 'Sign a refund message', auth: 'sign', params: [
      HANDLE, { name: '--amount', type: 'string', required: true, description: 'Amount traded to the payee' }, KEY_PARAM,
    ], returns: SIGN_RESULT },
    { name: 'sign puzzle', description: 'Sign a puzzle message', auth: 'sign', params: [HANDLE, ...PUZZLE_PARAMS, KEY_PARAM], returns: SIGN_RESULT },

    { name: 'escrows handle', description: 'Deterministic handle for escrow parameters', auth: 'none', params: ESCROW_PARAMS,
      returns: '{ handle, factory, registered }' },
    { name: 'escrows create', description: 'Register an escrow; opens it when the handle is already funded', auth: 'state', params: ESCROW_PARAMS,
      returns: ESCROW_VIEW },
    { name: 'escrows fund', description: 'Deposit simulated value at a handle', auth: 'state', params: [
      HANDLE, { name: '--amount', type: 'string', required: true, description: 'Amount to deposit' },
    ], returns: '{ address, deposited, balance }' },
    { name: 'escrows open', description: 'Open a funded escrow', auth: 'state', params: [HANDLE], returns: ESCROW_VIEW },
    { name: 'escrows cashout', description: 'Close with both trade signatures', auth: 'state', params: [
      HANDLE,
      { name: '--amount', type: 'string', required: true, description: 'Amount traded to the payee' },
      { name: '--escrower-sig', type: 'string', required: true, description: 'Escrower trade signature' },
      { name: '--payee-sig', type: 'string', required: true, description: 'Payee trade signature' },
    ], returns: ESCROW_VIEW },
    { name: 'escrows refund', description: 'Close with the escrower refund signature once the timelock passed', auth: 'state', params: [
      HANDLE,
      { name: '--amount', type: 'string', required: true, description: 'Amount traded to the payee' },
      { name: '--sig', type: 'string', required: true, description: 'Escrower refund signature' },
    ], returns: ESCROW_VIEW },
    { name: 'escrows force-refund', description: 'Return everything to the escrower after timelock + 2 days', auth: 'state', params: [HANDLE],
      returns: ESCROW_VIEW },
    { name: 'escrows post-puzzle', description: 'Lock a trade amount behind a hash puzzle', auth: 'state', params: [
      HANDLE,
      ...PUZZLE_PARAMS,
      { name: '--escrower-sig', type: 'string', required: true, description: 'Escrower trade signature' },
      { name: '--payee-sig', type: 'string', required: true, description: 'Payee trade signature' },
    ], returns: ESCROW_VIEW },
    { name: 'escrows solve', description: 'Reveal the preimage; credits the payee', auth: 'state', params: [
      HANDLE, { name: '--preimage', type: 'string', required: true, description: '32-byte hex preimage' },
    ], returns: ESCROW_VIEW },
    { name: 'escrows refund-puzzle', description: 'Credit the puzzle amount back to the escrower after the puzzle timelock', auth: 'state', params: [HANDLE],
      returns: ESCROW_VIEW },
    { name: 'escrows withdraw', description: 'Pay out a credited balance', auth: 'state', params: [
      HANDLE, { name: '--claimant', type: 'string', required: true, description: 'Party to pay', enum: ['escrower', 'payee'] },
    ], returns: '{ handle, claimant, recipient, amount }' },
    { name: 'escrows show', description: 'Show one escrow', auth: 'none', params: [HANDLE], returns: ESCROW_VIEW },
    { name: 'escrows list', description: 'List escrows', auth: 'none', params: [
      { name: '--state', type: 'string', description: 'Filter by state', enum: ['Unfunded', 'Open', 'PuzzlePosted', 'Closed'] },
    ], returns: '[{ handle, state, amount, timelock, escrowerBalance, payeeBalance, closeReason }]' },

    { name: 'ledger balance', description: 'Simulated balance of an address', auth: 'none', params: [
      { name: 'address', type: 'string', required: true, description: 'Account address' },
    ], returns: '{ address, balance, rejecting }' },
    { name: 'ledger reject', description: 'Make an address refuse transfers', auth: 'state', params: [
      { name: 'address', type: 'string', required: true, description: 'Account address' },
      { name: '--off', type: 'boolean', description: 'Accept transfers again' },
    ], returns: '{ address, rejecting }' },
    { name: 'config show', description: 'Effective configuration (secrets masked)', auth: 'none', params: [],
      returns: '{ home, stateSecret, key, factory, now, format }' },
    { name: 'schema', description: 'This document', auth: 'none', params: [] },
    { name: 'version', description: 'CLI version', auth: 'none', params: [] },
  ],

  events: [
    { name: 'Opened', fields: { handle: 'address', amount: 'uint256', timelock: 'uint256' } },
    { name: 'Funded', fields: { handle: 'address', amount: 'uint256', excess: 'uint256' } },
    { name: 'PuzzlePosted', fields: { handle: 'address', tradeAmount: 'uint256', puzzleHash: 'bytes32', puzzleTimelock: 'uint256', sighash: 'bytes32' } },
    { name: 'PreimageRevealed', fields: { handle: 'address', puzzleHash: 'bytes32', preimage: 'bytes32' } },
    { name: 'Closed', fields: { handle: 'address', reason: 'string' } },
    { name: 'FundsTransferred', fields: { handle: 'address', party: 'string', recipient: 'address', amount: 'uint256' } },
    { name: 'TransferFailed', fields: { handle: 'address', party: 'string', recipient: 'address', amount: 'uint256' } },
  ],
}
