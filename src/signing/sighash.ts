import * as P from "micro-packed";
import { SigHash, Transaction } from "@scure/btc-signer";
import { RawOutput, VarBytes } from "@scure/btc-signer/script";
import { Bytes, concatBytes, sha256 } from "@scure/btc-signer/utils";
import { schnorr } from "@noble/curves/secp256k1";
import { ErrUnsupportedSighash, EscrowError } from "../errors";

/**
 * Output spent by a transaction input. Taproot sighashes commit to the
 * prevouts of every input, so one is needed per input, in input order.
 */
export type Prevout = {
    script: Bytes;
    amount: bigint;
};

export const TAPSCRIPT_KEY_VERSION = 0x00;
// codesep_pos when no OP_CODESEPARATOR was executed
export const NO_CODESEPARATOR = 0xffffffff;

const MAX_AMOUNT = (1n << 64n) - 1n;
const SPEND_TYPE_SCRIPT_PATH = 0x02;

// outpoint as committed by sha_prevouts: txid in wire order, then vout
const TxHashIdx = P.struct({ txid: P.bytes(32, true), index: P.U32LE });

const sighashError = (message: string) =>
    new EscrowError("SighashComputationError", message);

function wrapError(error: unknown): EscrowError {
    if (error instanceof EscrowError) return error;
    return sighashError(error instanceof Error ? error.message : String(error));
}

function checkRequest(
    tx: Transaction,
    index: number,
    prevouts: Prevout[],
    sighashType: number
): void {
    if (sighashType !== SigHash.ALL) throw ErrUnsupportedSighash;
    if (!Number.isSafeInteger(index) || index < 0 || index >= tx.inputsLength) {
        throw sighashError(
            `input index ${index} out of range (${tx.inputsLength} inputs)`
        );
    }
    if (prevouts.length !== tx.inputsLength) {
        throw sighashError(
            `expected ${tx.inputsLength} prevouts, got ${prevouts.length}`
        );
    }
    prevouts.forEach(({ amount }, i) => {
        if (amount < 0n || amount > MAX_AMOUNT) {
            throw sighashError(`prevout ${i} amount ${amount} out of range`);
        }
    });
}

/**
 * BIP341 key path signature hash.
 *
 * @throws {EscrowError} SighashComputationError if the index is out of range,
 * the prevouts do not match the inputs, an amount does not fit in 64 bits or
 * the sighash type is not ALL
 */
export function keyPathSighash(
    tx: Transaction,
    index: number,
    prevouts: Prevout[],
    sighashType: number = SigHash.ALL
): Bytes {
    checkRequest(tx, index, prevouts, sighashType);
    try {
        return tx.preimageWitnessV1(
            index,
            prevouts.map((p) => p.script),
            sighashType,
            prevouts.map((p) => p.amount)
        );
    } catch (error) {
        throw wrapError(error);
    }
}

/**
 * BIP341 common message extended with the BIP342 leaf commitment, for
 * SIGHASH_ALL and no annex. The leaf hash binds the signature to a single
 * tapleaf script.
 */
function scriptPathMessage(
    tx: Transaction,
    index: number,
    prevouts: Prevout[],
    leafHash: Bytes,
    codeSeparator: number
): Uint8Array[] {
    const inputs = [];
    for (let i = 0; i < tx.inputsLength; i++) {
        const { txid, index: vout, sequence } = tx.getInput(i);
        if (txid === undefined || vout === undefined) {
            throw sighashError(`input ${i} has no previous output`);
        }
        inputs.push({ txid, index: vout, sequence: sequence ?? 0xffffffff });
    }
    const outputs = [];
    for (let i = 0; i < tx.outputsLength; i++) {
        const { script, amount } = tx.getOutput(i);
        if (script === undefined || amount === undefined) {
            throw sighashError(`output ${i} has no script or amount`);
        }
        outputs.push({ script, amount });
    }

    return [
        P.U8.encode(0), // sighash epoch
        P.U8.encode(SigHash.ALL),
        P.I32LE.encode(tx.version),
        P.U32LE.encode(tx.lockTime),
        sha256(concatBytes(...inputs.map((i) => TxHashIdx.encode(i)))),
        sha256(concatBytes(...prevouts.map((p) => P.U64LE.encode(p.amount)))),
        sha256(concatBytes(...prevouts.map((p) => VarBytes.encode(p.script)))),
        sha256(concatBytes(...inputs.map((i) => P.U32LE.encode(i.sequence)))),
        sha256(concatBytes(...outputs.map((o) => RawOutput.encode(o)))),
        P.U8.encode(SPEND_TYPE_SCRIPT_PATH),
        P.U32LE.encode(index),
        leafHash,
        P.U8.encode(TAPSCRIPT_KEY_VERSION),
        P.U32LE.encode(codeSeparator),
    ];
}

/**
 * BIP342 script path signature hash.
 *
 * @throws {EscrowError} SighashComputationError if the index is out of range,
 * the prevouts do not match the inputs, an amount does not fit in 64 bits or
 * the sighash type is not ALL
 */
export function scriptPathSighash(
    tx: Transaction,
    index: number,
    prevouts: Prevout[],
    leafHash: Bytes,
    sighashType: number = SigHash.ALL,
    codeSeparator: number = NO_CODESEPARATOR
): Bytes {
    checkRequest(tx, index, prevouts, sighashType);
    if (leafHash.length !== 32) {
        throw sighashError(`invalid leaf hash length ${leafHash.length}`);
    }
    let message: Uint8Array[];
    try {
        message = scriptPathMessage(tx, index, prevouts, leafHash, codeSeparator);
    } catch (error) {
        throw wrapError(error);
    }
    return schnorr.utils.taggedHash("TapSighash", ...message);
}
