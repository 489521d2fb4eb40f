import { getVersion } from "./version";
import { flagString, parseArgs, type Flags } from "./routing";
import { showHelp, showResourceHelp, showActionHelp, usageFor } from "./help";
import { detectFormat, output, toJsonText, type Format } from "./format";
import { EscrowError } from "./errors";
import { SCHEMA } from "./schema";
import { loadConfig, parseUnixSeconds, type Config } from "./config";
import * as commands from "./commands";

const args = process.argv.slice(2);
const parsed = parseArgs(args);

function usage(resource: string, action: string): never {
  console.error(`Usage: ${usageFor(resource, action)}`);
  process.exit(1);
}

function escrowOpts(flags: Flags): commands.EscrowOpts | null {
  const amount = flagString(flags, "amount");
  const timelock = flagString(flags, "timelock");
  const escrowerReserve = flagString(flags, "escrower-reserve");
  const escrowerTrade = flagString(flags, "escrower-trade");
  const escrowerRefund = flagString(flags, "escrower-refund");
  const payeeReserve = flagString(flags, "payee-reserve");
  const payeeTrade = flagString(flags, "payee-trade");
  if (!amount || !timelock || !escrowerReserve || !escrowerTrade || !escrowerRefund || !payeeReserve || !payeeTrade) {
    return null;
  }
  return { amount, timelock, escrowerReserve, escrowerTrade, escrowerRefund, payeeReserve, payeeTrade };
}

function puzzleOpts(flags: Flags): commands.PuzzleOpts | null {
  const prevAmount = flagString(flags, "prev-amount");
  const tradeAmount = flagString(flags, "trade-amount");
  const hash = flagString(flags, "hash");
  const timelock = flagString(flags, "timelock");
  if (!prevAmount || !tradeAmount || !hash || !timelock) return null;
  return { prevAmount, tradeAmount, hash, timelock };
}

async function handleEscrows(config: Config, action: string, cmdArgs: string[], flags: Flags): Promise<unknown> {
  const handle = cmdArgs[0];

  switch (action) {
    case "handle": {
      const opts = escrowOpts(flags);
      if (!opts) usage("escrows", action);
      return commands.escrowsHandle(config, opts);
    }
    case "create": {
      const opts = escrowOpts(flags);
      if (!opts) usage("escrows", action);
      return commands.escrowsCreate(config, opts);
    }
    case "fund": {
      const amount = flagString(flags, "amount");
      if (!handle || !amount) usage("escrows", action);
      return commands.escrowsFund(config, handle, { amount });
    }
    case "open":
      if (!handle) usage("escrows", action);
      return commands.escrowsOpen(config, handle);
    case "cashout": {
      const amount = flagString(flags, "amount");
      const escrowerSig = flagString(flags, "escrower-sig");
      const payeeSig = flagString(flags, "payee-sig");
      if (!handle || !amount || !escrowerSig || !payeeSig) usage("escrows", action);
      return commands.escrowsCashout(config, handle, { amount, escrowerSig, payeeSig });
    }
    case "refund": {
      const amount = flagString(flags, "amount");
      const sig = flagString(flags, "sig");
      if (!handle || !amount || !sig) usage("escrows", action);
      return commands.escrowsRefund(config, handle, { amount, sig });
    }
    case "force-refund":
      if (!handle) usage("escrows", action);
      return commands.escrowsForceRefund(config, handle);
    case "post-puzzle": {
      const opts = puzzleOpts(flags);
      const escrowerSig = flagString(flags, "escrower-sig");
      const payeeSig = flagString(flags, "payee-sig");
      if (!handle || !opts || !escrowerSig || !payeeSig) usage("escrows", action);
      return commands.escrowsPostPuzzle(config, handle, { ...opts, escrowerSig, payeeSig });
    }
    case "solve": {
      const preimage = flagString(flags, "preimage");
      if (!handle || !preimage) usage("escrows", action);
      return commands.escrowsSolve(config, handle, { preimage });
    }
    case "refund-puzzle":
      if (!handle) usage("escrows", action);
      return commands.escrowsRefundPuzzle(config, handle);
    case "withdraw": {
      const claimant = flagString(flags, "claimant");
      if (!handle || !claimant) usage("escrows", action);
      return commands.escrowsWithdraw(config, handle, { claimant });
    }
    case "show":
      if (!handle) usage("escrows", action);
      return commands.escrowsShow(config, handle);
    case "list":
      return commands.escrowsList(config, { state: flagString(flags, "state") });
    default:
      console.error(`Unknown action: escrows ${action}`);
      process.exit(1);
  }
}

async function handleSign(config: Config, action: string, cmdArgs: string[], flags: Flags): Promise<unknown> {
  const handle = cmdArgs[0];
  const key = flagString(flags, "key");

  switch (action) {
    case "cashout": {
      const amount = flagString(flags, "amount");
      if (!handle || !amount) usage("sign", action);
      return commands.signCashoutCmd(config, handle, { amount, key });
    }
    case "refund": {
      const amount = flagString(flags, "amount");
      if (!handle || !amount) usage("sign", action);
      return commands.signRefundCmd(config, handle, { amount, key });
    }
    case "puzzle": {
      const opts = puzzleOpts(flags);
      if (!handle || !opts) usage("sign", action);
      return commands.signPuzzleCmd(config, handle, { ...opts, key });
    }
    default:
      console.error(`Unknown action: sign ${action}`);
      process.exit(1);
  }
}

async function handleResource(
  config: Config,
  resource: string,
  action: string,
  cmdArgs: string[],
  flags: Flags,
  format: Format
): Promise<void> {
  let result: unknown;

  switch (resource) {
    case "escrows":
      result = await handleEscrows(config, action, cmdArgs, flags);
      break;

    case "sign":
      result = await handleSign(config, action, cmdArgs, flags);
      break;

    case "puzzle":
      switch (action) {
        case "new":
          result = commands.puzzleNew();
          break;
        case "hash":
          if (!cmdArgs[0]) usage("puzzle", action);
          result = commands.puzzleHash(cmdArgs[0]);
          break;
        default:
          console.error(`Unknown action: puzzle ${action}`);
          process.exit(1);
      }
      break;

    case "keys":
      switch (action) {
        case "new":
          result = commands.keysNew();
          break;
        default:
          console.error(`Unknown action: keys ${action}`);
          process.exit(1);
      }
      break;

    case "ledger":
      switch (action) {
        case "balance":
          if (!cmdArgs[0]) usage("ledger", action);
          result = commands.ledgerBalance(config, cmdArgs[0]);
          break;
        case "reject":
          if (!cmdArgs[0]) usage("ledger", action);
          result = await commands.ledgerReject(config, cmdArgs[0], { off: flags.off === true });
          break;
        default:
          console.error(`Unknown action: ledger ${action}`);
          process.exit(1);
      }
      break;

    case "config":
      switch (action) {
        case "show":
          result = commands.configShow(config);
          break;
        default:
          console.error(`Unknown action: config ${action}`);
          process.exit(1);
      }
      break;

    default:
      console.error(`Unknown resource: ${resource}`);
      process.exit(1);
  }

  output(result, format);
}

function handleMeta(command: string, format: Format): void {
  switch (command) {
    case "schema":
      output(SCHEMA, format);
      break;
    case "version":
      console.log(getVersion());
      break;
    default:
      console.error(`Unknown command: ${command}`);
      process.exit(1);
  }
}

/** Environment config with --now and --key flags layered on top. */
function resolveConfig(flags: Flags): Config {
  const config = loadConfig(process.env);
  const now = flagString(flags, "now");
  const key = flagString(flags, "key");
  return {
    ...config,
    now: now ? parseUnixSeconds(now, "--now") : config.now,
    key: key ?? config.key,
  };
}

async function main() {
  const flags = parsed.type === "resource" || parsed.type === "meta" ? parsed.flags : {};
  const format = detectFormat(flagString(flags, "format"));

  try {
    switch (parsed.type) {
      case "resource":
        await handleResource(
          resolveConfig(parsed.flags),
          parsed.resource,
          parsed.action,
          parsed.args,
          parsed.flags,
          format
        );
        break;

      case "meta":
        handleMeta(parsed.command, format);
        break;

      case "help":
        if (parsed.topic && parsed.subtopic) {
          showActionHelp(parsed.topic, parsed.subtopic);
        } else if (parsed.topic) {
          showResourceHelp(parsed.topic);
        } else {
          showHelp();
        }
        break;

      case "unknown":
        console.error(`Unknown command: ${parsed.command}`);
        console.error("Run 'xswap help' for available commands.");
        process.exit(1);
    }
  } catch (err) {
    if (err instanceof EscrowError) {
      if (format === "json") {
        console.log(toJsonText(err.toJSON()));
      } else {
        console.error(err.toHuman());
      }
      process.exit(err.exitCode);
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
