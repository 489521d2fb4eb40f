/**
 * Library entry point.
 */

export * from './constants'
export * from './errors'
export * from './types'
export * from './crypto/messages'
export * from './crypto/signature'
export * from './crypto/puzzle'
export * from './holders/types'
export * from './holders/ledger'
export * from './holders/chain'
export { EscrowRegistry, FactoryCapability, toAddress, unixNow, type RegistryOptions } from './registry'
export { EscrowFactory, computeEscrowHandle, type FactoryOptions } from './factory'
export { EscrowSigner, type RoleAccounts, type TradeSignatures } from './signer'
