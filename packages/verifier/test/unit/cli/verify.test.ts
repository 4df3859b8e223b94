import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {describe, it, expect, beforeAll, afterAll} from "vitest";
import yaml from "js-yaml";
import {toHex, trimLeadingZeros} from "@minime-proofs/utils";
import {ELStorageProof, MinimeProofErrorCode} from "../../../src/index.js";
import {VerifyArgs, verifyProofFile} from "../../../src/cli/cmds/verify.js";
import {YargsError} from "../../../src/utils/errors.js";
import {getMockedLogger} from "../../mocks/loggerMock.js";
import {getMinimeProofError} from "../../utils/errors.js";
import {MinimeStorage, holderFixture} from "../../utils/minimeStorage.js";

describe("cli / verify", () => {
  let tmpDir: string;
  let storage: MinimeStorage;
  let proofFile: string;

  beforeAll(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "minime-cli-"));
    storage = await MinimeStorage.create(holderFixture, 3, [
      {balance: BigInt(123456), block: BigInt(100)},
      {balance: BigInt(0), block: BigInt(200)},
    ]);

    const proofs = [await storage.getProof(0), await storage.getProof(1)];
    const elProof: ELStorageProof = {
      storageHash: toHex(storage.storageRoot),
      storageProof: proofs.map(({key, value, proof}) => ({
        key: toHex(trimLeadingZeros(key)),
        value: value.length === 0 ? "0x0" : toHex(value),
        proof: proof.map(toHex),
      })),
    };

    proofFile = path.join(tmpDir, "proof.json");
    fs.writeFileSync(proofFile, JSON.stringify(elProof));
    fs.writeFileSync(path.join(tmpDir, "proof.yml"), yaml.dump(elProof));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, {recursive: true, force: true});
  });

  function getArgs(args: Partial<VerifyArgs> = {}): VerifyArgs {
    return {
      proofFile,
      holder: toHex(holderFixture),
      mapIndexSlot: 3,
      balance: "123456",
      block: "150",
      decimals: 3,
      ...args,
    };
  }

  it("verifies a balance from a json proof file", async () => {
    const logger = getMockedLogger();
    const result = await verifyProofFile(getArgs(), logger);

    expect(result.checkpoint.balance).toBe(BigInt(123456));
    expect(logger.info).toHaveBeenCalledWith("valid", {
      balance: "123.45600",
      checkpointBlock: BigInt(100),
      nextCheckpointBlock: BigInt(200),
      checkpointIndex: BigInt(0),
    });
  });

  it("verifies a balance from a yaml proof file", async () => {
    const result = await verifyProofFile(getArgs({proofFile: path.join(tmpDir, "proof.yml")}), getMockedLogger());
    expect(result.checkpoint.block).toBe(BigInt(100));
  });

  it("accepts hex encoded numbers", async () => {
    const result = await verifyProofFile(getArgs({balance: "0x1e240", block: "0x96"}), getMockedLogger());
    expect(result.checkpoint.balance).toBe(BigInt(123456));
  });

  it("rejects a balance that does not match", async () => {
    const e = await getMinimeProofError(verifyProofFile(getArgs({balance: "123457"}), getMockedLogger()));
    expect(e.type).toEqual({
      code: MinimeProofErrorCode.BALANCE_MISMATCH,
      proofBalance: "123456",
      targetBalance: "123457",
    });
  });

  it("uses the trusted storage root over the one in the file", async () => {
    const e = await getMinimeProofError(
      verifyProofFile(getArgs({storageRoot: `0x${"bb".repeat(32)}`}), getMockedLogger())
    );
    expect(e.type).toMatchObject({code: MinimeProofErrorCode.PROOF_VERIFICATION_ERROR, index: 0});
  });

  it("rejects a malformed balance argument", async () => {
    await expect(verifyProofFile(getArgs({balance: "12.5"}), getMockedLogger())).rejects.toThrow(YargsError);
  });

  it("rejects a file that is not a storage proof", async () => {
    const invalidFile = path.join(tmpDir, "invalid.json");
    fs.writeFileSync(invalidFile, JSON.stringify({storageHash: "0x00"}));

    await expect(verifyProofFile(getArgs({proofFile: invalidFile}), getMockedLogger())).rejects.toThrow(
      `Proof file ${invalidFile} is not an eth_getProof result`
    );
  });

  it("rejects unsupported file formats", async () => {
    await expect(verifyProofFile(getArgs({proofFile: path.join(tmpDir, "proof.toml")}), getMockedLogger())).rejects.toThrow(
      "UnsupportedFileFormat"
    );
  });
});
