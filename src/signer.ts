/**
 * The five role keys of one trade, with helpers that produce the signatures
 * each escrow transition needs. Reserves only receive value and never sign,
 * but are generated here so a whole trade can be set up from one object.
 */

import type { Address, Hex, LocalAccount } from 'viem'
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts'
import { signCashout, signPuzzle, signRefund } from './crypto/signature'
import type { PuzzleTerms } from './crypto/messages'
import type { EscrowParams } from './types'

export interface RoleAccounts {
  escrowerReserve: LocalAccount
  escrowerTrade: LocalAccount
  escrowerRefund: LocalAccount
  payeeReserve: LocalAccount
  payeeTrade: LocalAccount
}

export interface TradeSignatures {
  escrowerSig: Hex
  payeeSig: Hex
}

export class EscrowSigner {
  constructor(readonly roles: RoleAccounts) {}

  /** Fresh throwaway keys for every role. */
  static random(): EscrowSigner {
    const account = () => privateKeyToAccount(generatePrivateKey())
    return new EscrowSigner({
      escrowerReserve: account(),
      escrowerTrade: account(),
      escrowerRefund: account(),
      payeeReserve: account(),
      payeeTrade: account(),
    })
  }

  params(amount: bigint, timelock: bigint): EscrowParams {
    const address = (role: keyof RoleAccounts): Address => this.roles[role].address
    return {
      amount,
      timelock,
      escrowerReserve: address('escrowerReserve'),
      escrowerTrade: address('escrowerTrade'),
      escrowerRefund: address('escrowerRefund'),
      payeeReserve: address('payeeReserve'),
      payeeTrade: address('payeeTrade'),
    }
  }

  async signCashout(handle: Address, amountTraded: bigint): Promise<TradeSignatures> {
    const [escrowerSig, payeeSig] = await Promise.all([
      signCashout(this.roles.escrowerTrade, handle, amountTraded),
      signCashout(this.roles.payeeTrade, handle, amountTraded),
    ])
    return { escrowerSig, payeeSig }
  }

  signRefund(handle: Address, amountTraded: bigint): Promise<Hex> {
    return signRefund(this.roles.escrowerRefund, handle, amountTraded)
  }

  async signPuzzle(handle: Address, terms: PuzzleTerms): Promise<TradeSignatures> {
    const [escrowerSig, payeeSig] = await Promise.all([
      signPuzzle(this.roles.escrowerTrade, handle, terms),
      signPuzzle(this.roles.payeeTrade, handle, terms),
    ])
    return { escrowerSig, payeeSig }
  }
}
