import {CliCommand, Logger, fromHex} from "@minime-proofs/utils";
import {getNodeLogger} from "@minime-proofs/logger";
import {DEFAULT_DISPLAY_DECIMALS} from "../../constants.js";
import {formatRational} from "../../checkpoint.js";
import {MinimeProofResult} from "../../types.js";
import {isELStorageProof, minimeQueryFromEL} from "../../utils/conversion.js";
import {YargsError} from "../../utils/errors.js";
import {readFile} from "../../utils/file.js";
import {verifyMinimeProof} from "../../verifier.js";
import {GlobalArgs, parseGlobalArgs} from "../options.js";

export type VerifyArgs = {
  proofFile: string;
  holder: string;
  mapIndexSlot: number;
  balance: string;
  block: string;
  storageRoot?: string;
  decimals: number;
};

export const verifyCommand: CliCommand<VerifyArgs, GlobalArgs, MinimeProofResult> = {
  command: "verify",
  describe: "Verify a token holder balance at a block against a saved eth_getProof response",
  examples: [
    {
      command:
        "verify --proofFile proof.json --holder 0x1111111111111111111111111111111111111111 --mapIndexSlot 3 --balance 1000 --block 150",
      description: "Verify a balance of 1000 at block 150 for a MiniMe token storing balances at slot 3",
    },
  ],
  options: {
    proofFile: {
      description: "JSON or YAML file with the eth_getProof result of the two checkpoint slots",
      type: "string",
      demandOption: true,
    },
    holder: {
      description: "Token holder address",
      type: "string",
      demandOption: true,
    },
    mapIndexSlot: {
      description: "Storage index of the token balances mapping",
      type: "number",
      demandOption: true,
    },
    balance: {
      description: "Claimed balance in full units",
      type: "string",
      demandOption: true,
    },
    block: {
      description: "Block number at which the balance is claimed",
      type: "string",
      demandOption: true,
    },
    storageRoot: {
      description: "Trusted storage root of the token contract, defaults to the storageHash of the proof file",
      type: "string",
    },
    decimals: {
      description: "Token decimals, only used to display the balance",
      type: "number",
      default: 0,
    },
  },
  handler: async (args) => {
    const logger = getNodeLogger(parseGlobalArgs(args));
    return verifyProofFile(args, logger.child({module: "verifier"}));
  },
};

export async function verifyProofFile(args: VerifyArgs, logger: Logger): Promise<MinimeProofResult> {
  const proof = readFile(args.proofFile);
  if (!isELStorageProof(proof)) {
    throw new YargsError(`Proof file ${args.proofFile} is not an eth_getProof result`);
  }

  const query = minimeQueryFromEL({
    proof,
    holder: args.holder,
    mapIndexSlot: args.mapIndexSlot,
    targetBalance: parseBigIntArg("balance", args.balance),
    targetBlock: parseBigIntArg("block", args.block),
  });
  if (args.storageRoot !== undefined) {
    query.storageRoot = fromHex(args.storageRoot);
  }

  const result = await verifyMinimeProof(query, {logger, decimals: args.decimals});
  const {checkpoint, nextCheckpoint, checkpointIndex} = result;

  logger.info("valid", {
    balance: formatRational(checkpoint.scaledBalance, DEFAULT_DISPLAY_DECIMALS),
    checkpointBlock: checkpoint.block,
    nextCheckpointBlock: nextCheckpoint?.block ?? null,
    checkpointIndex,
  });
  return result;
}

function parseBigIntArg(name: string, value: string): bigint {
  if (!/^(0x[0-9a-fA-F]+|[0-9]+)$/.test(value)) {
    throw new YargsError(`--${name} must be a non-negative integer, got '${value}'`);
  }
  return BigInt(value);
}
