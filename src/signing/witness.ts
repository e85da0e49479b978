import { Transaction } from "@scure/btc-signer";
import { Bytes } from "@scure/btc-signer/utils";
import { ErrInputIndexOutOfRange } from "../errors";
import { serializeSignature, TaprootSignature } from "./signer";

/**
 * Witness stack elements, bottom of the stack first, in serialization order.
 */
export type Witness = Bytes[];

export function assembleKeyPath(signature: TaprootSignature): Witness {
    return [serializeSignature(signature)];
}

/**
 * Builds a script path witness: the signatures in the given order, then the
 * leaf script, then its control block.
 *
 * Nothing is reordered or checked here. The last signature ends up on top of
 * the stack and is consumed by the first key of the script, so for the
 * CHECKSIG multisig leaves the signatures must be passed in reverse script
 * key order (see `Escrow.Script.signingOrder`). A wrong order, or a control
 * block from another leaf, yields a witness that does not validate.
 */
export function assembleScriptPath(
    signatures: TaprootSignature[],
    lockingScript: Bytes,
    controlBlock: Bytes
): Witness {
    return [...signatures.map(serializeSignature), lockingScript, controlBlock];
}

/**
 * Returns a copy of the transaction with the witness set on one input.
 *
 * @throws {EscrowError} InputIndexOutOfRange
 */
export function withWitness(
    tx: Transaction,
    index: number,
    witness: Witness
): Transaction {
    if (!Number.isSafeInteger(index) || index < 0 || index >= tx.inputsLength) {
        throw ErrInputIndexOutOfRange(index, tx.inputsLength);
    }
    const txCpy = tx.clone();
    txCpy.updateInput(index, { finalScriptWitness: witness }, true);
    return txCpy;
}
