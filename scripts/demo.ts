/**
 * End-to-end walk through both settlement paths on the in-memory ledger.
 *
 * Usage:
 *   npm run demo
 */

import {
  EscrowFactory,
  EscrowRegistry,
  EscrowSigner,
  Ledger,
  LedgerAssetHolder,
  generatePreimage,
  hashPreimage,
  stateName,
} from "../src/lib";

const FACTORY = "0x0000000000000000000000000000000000000042";

async function main() {
  let now = 1_700_000_000n;
  const ledger = new Ledger();
  const registry = new EscrowRegistry({ now: () => now });
  const factory = new EscrowFactory(registry, {
    address: FACTORY,
    holders: (handle) => new LedgerAssetHolder(ledger, handle),
  });

  registry.on("Closed", (e) => console.log(`closed ${e.handle} (${e.reason})`));
  registry.on("FundsTransferred", (e) => console.log(`  ${e.party} <- ${e.amount}`));

  // Cooperative close: 1000 escrowed, 400 traded
  const signer = EscrowSigner.random();
  const params = signer.params(1000n, now + 3600n);
  const handle = factory.handleFor(params);
  ledger.deposit(handle, 1000n);
  const opened = await factory.createEscrow(params);
  console.log(`escrow ${handle} is ${stateName(opened.state)}`);

  const sigs = await signer.signCashout(handle, 400n);
  await registry.cashout(handle, 400n, sigs.escrowerSig, sigs.payeeSig);
  console.log(`escrower reserve: ${ledger.balanceOf(params.escrowerReserve)}`);
  console.log(`payee reserve:    ${ledger.balanceOf(params.payeeReserve)}`);

  // Puzzle path: 300 already traded, 200 locked behind a hash
  const second = EscrowSigner.random();
  const puzzleParams = second.params(1000n, now + 3600n);
  const puzzleHandle = factory.handleFor(puzzleParams);
  ledger.deposit(puzzleHandle, 1000n);
  await factory.createEscrow(puzzleParams);

  const preimage = generatePreimage();
  const terms = {
    prevAmountTraded: 300n,
    tradeAmount: 200n,
    puzzleHash: hashPreimage(preimage),
    puzzleTimelock: now + 600n,
  };
  const puzzleSigs = await second.signPuzzle(puzzleHandle, terms);
  await registry.postPuzzle(puzzleHandle, terms, puzzleSigs.escrowerSig, puzzleSigs.payeeSig);
  now += 60n;
  await registry.solvePuzzle(puzzleHandle, preimage);
  await registry.withdraw(puzzleHandle, "escrower");
  await registry.withdraw(puzzleHandle, "payee");
  console.log(`escrower reserve: ${ledger.balanceOf(puzzleParams.escrowerReserve)}`);
  console.log(`payee reserve:    ${ledger.balanceOf(puzzleParams.payeeReserve)}`);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
