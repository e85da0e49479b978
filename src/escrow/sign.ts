import { Transaction } from "@scure/btc-signer";
import { Bytes, equalBytes } from "@scure/btc-signer/utils";
import { hex } from "@scure/base";
import { SingleKey } from "../identity/singleKey";
import { NostrKeys } from "../nostr/keys";
import { keyPathOutput } from "../script/base";
import { EscrowScriptType, escrowSpendInfo } from "../script/escrow";
import { keyPathSighash, Prevout, scriptPathSighash } from "../signing/sighash";
import { TaprootSignature } from "../signing/signer";
import {
    assembleKeyPath,
    assembleScriptPath,
    withWitness,
} from "../signing/witness";
import { EscrowError } from "../errors";

/**
 * Signs input 0 of a transaction spending from the signer's own key path
 * address (see `npubToAddress`) and returns the finalized copy.
 *
 * The prevout is the output spent by input 0; the transaction must have a
 * single input.
 *
 * @throws {EscrowError} InvalidEncoding or InvalidKeyMaterial for a bad nsec
 * @throws {EscrowError} SighashComputationError if the transaction has other inputs
 */
export function signResolutionTx(
    tx: Transaction,
    nsec: string,
    prevout: Prevout
): Transaction {
    const key = SingleKey.fromNsec(nsec);
    const { pkScript } = keyPathOutput(key.xOnlyPublicKey());
    if (!equalBytes(pkScript, prevout.script)) {
        throw new EscrowError(
            "InvalidParameters",
            "prevout is not the signer's key path output"
        );
    }

    const sighash = keyPathSighash(tx, 0, [prevout]);
    console.debug("resolution tx sighash", hex.encode(sighash));

    const signature = key.signKeyPath(sighash);
    return withWitness(tx, 0, assembleKeyPath(signature));
}

/**
 * Signs one escrow input along the given leaf, with the signer's untweaked
 * key. The escrow is a dispute escrow when an arbitrator npub is given.
 *
 * @throws {EscrowError} MissingVariantParameter if the leaf needs an arbitrator or timelock
 * @throws {EscrowError} LeafNotFound if the leaf is not part of the escrow
 * @example
 * ```typescript
 * const sig = signEscrowTx(tx, 0, aliceNsec, aliceNpub, bobNpub, undefined, undefined, prevouts, EscrowScriptType.Collaborative);
 * ```
 */
export function signEscrowTx(
    tx: Transaction,
    index: number,
    nsec: string,
    npub1: string,
    npub2: string,
    arbitrator: string | undefined,
    timelock: number | undefined,
    prevouts: Prevout[],
    type: EscrowScriptType
): TaprootSignature {
    const key = SingleKey.fromNsec(nsec);
    const escrow = escrowSpendInfo(
        NostrKeys.decodeNpub(npub1),
        NostrKeys.decodeNpub(npub2),
        arbitrator === undefined ? undefined : NostrKeys.decodeNpub(arbitrator),
        timelock
    );

    const script = escrow.script(type);
    console.debug("escrow locking script", hex.encode(script));

    const sighash = scriptPathSighash(
        tx,
        index,
        prevouts,
        escrow.leafHash(script)
    );
    console.debug("escrow tx sighash", hex.encode(sighash));

    return key.signScriptPath(sighash);
}

/**
 * Attaches a script path witness to one input. Signatures must already be in
 * witness order, see `Escrow.Script.signingOrder`.
 *
 * @throws {EscrowError} InputIndexOutOfRange
 */
export function combineSignatures(
    tx: Transaction,
    index: number,
    signatures: TaprootSignature[],
    lockingScript: Bytes,
    controlBlock: Bytes
): Transaction {
    return withWitness(
        tx,
        index,
        assembleScriptPath(signatures, lockingScript, controlBlock)
    );
}
