import {
    Address,
    OutScript,
    p2tr,
    type P2TR,
    TAP_LEAF_VERSION,
    tapLeafHash,
    taprootListToTree,
} from "@scure/btc-signer/payment";
import {
    Bytes,
    TAPROOT_UNSPENDABLE_KEY,
    equalBytes,
} from "@scure/btc-signer/utils";
import { TaprootControlBlock } from "@scure/btc-signer/psbt";
import { hex } from "@scure/base";
import { EscrowError } from "../errors";
import type { Network } from "../networks";

export type TapLeafScript = [
    {
        version: number;
        internalKey: Bytes;
        merklePath: Bytes[];
    },
    Bytes,
];

export function scriptFromTapLeafScript(leaf: TapLeafScript): Bytes {
    return leaf[1].subarray(0, leaf[1].length - 1); // remove the version byte
}

export function versionFromTapLeafScript(leaf: TapLeafScript): number {
    return leaf[1][leaf[1].length - 1];
}

function checkInternalKey(internalKey: Bytes): void {
    if (internalKey.length !== 32) {
        throw new EscrowError(
            "InvalidKeyMaterial",
            `invalid internal key length: expected 32, got ${internalKey.length}`
        );
    }
}

/**
 * TaprootTree is the spend info of a P2TR output committing to a list of
 * tapleaf scripts: the internal key, the merkle tree over the leaves and the
 * tweaked output key. Two trees built from the same scripts in the same order
 * are identical.
 *
 * The internal key defaults to the BIP341 unspendable point, which disables
 * the key path.
 *
 * @example
 * ```typescript
 * const tree = new TaprootTree([leafA, leafB]);
 * const address = tree.address(networks.signet);
 * const controlBlock = tree.controlBlock(leafA);
 * ```
 */
export class TaprootTree {
    readonly leaves: TapLeafScript[];
    readonly tweakedPublicKey: Bytes;
    readonly merkleRoot: Bytes;
    readonly parity: number;
    readonly scripts: Bytes[];
    readonly internalKey: Bytes;

    constructor(scripts: Bytes[], internalKey: Bytes = TAPROOT_UNSPENDABLE_KEY) {
        if (scripts.length === 0) {
            throw new EscrowError(
                "InvalidParameters",
                "taproot tree needs at least one leaf"
            );
        }
        checkInternalKey(internalKey);
        this.scripts = scripts.map((script) => Uint8Array.from(script));
        this.internalKey = Uint8Array.from(internalKey);

        const tapTree = taprootListToTree(
            this.scripts.map((script) => ({
                script,
                leafVersion: TAP_LEAF_VERSION,
            }))
        );

        let payment: ReturnType<typeof p2tr>;
        try {
            payment = p2tr(this.internalKey, tapTree, undefined, true);
        } catch (error) {
            throw new EscrowError(
                "InvalidKeyMaterial",
                `invalid taproot internal key: ${error instanceof Error ? error.message : String(error)}`
            );
        }

        if (
            !payment.tapLeafScript ||
            !payment.tapMerkleRoot ||
            payment.tapLeafScript.length !== scripts.length
        ) {
            throw new EscrowError("InvalidParameters", "invalid scripts");
        }

        this.leaves = payment.tapLeafScript;
        this.tweakedPublicKey = payment.tweakedPubkey;
        this.merkleRoot = payment.tapMerkleRoot;
        // every leaf carries the output key parity in its control byte
        this.parity = payment.tapLeafScript[0][0].version & 1;
    }

    get outputKey(): Bytes {
        return this.tweakedPublicKey;
    }

    get pkScript(): Bytes {
        return OutScript.encode({ type: "tr", pubkey: this.tweakedPublicKey });
    }

    address(network: Network): string {
        return Address(network).encode({
            type: "tr",
            pubkey: this.tweakedPublicKey,
        });
    }

    /**
     * @throws {EscrowError} LeafNotFound if the script is not committed in the tree
     */
    findLeaf(script: Bytes): TapLeafScript {
        const leaf = this.leaves.find((leaf) =>
            equalBytes(scriptFromTapLeafScript(leaf), script)
        );
        if (!leaf) {
            throw new EscrowError(
                "LeafNotFound",
                `leaf '${hex.encode(script)}' not found`
            );
        }
        return leaf;
    }

    /**
     * Serialized control block proving the script is part of this tree:
     * (leaf version | parity) || internal key || merkle path.
     *
     * @throws {EscrowError} LeafNotFound if the script is not committed in the tree
     */
    controlBlock(script: Bytes): Bytes {
        return TaprootControlBlock.encode(this.findLeaf(script)[0]);
    }

    leafHash(script: Bytes): Bytes {
        const leaf = this.findLeaf(script);
        return tapLeafHash(
            scriptFromTapLeafScript(leaf),
            versionFromTapLeafScript(leaf)
        );
    }
}

export type KeyPathOutput = {
    internalKey: Bytes;
    tweakedPublicKey: Bytes;
    pkScript: Bytes;
};

/**
 * P2TR output without a script tree: the output key is the internal key
 * tweaked with an empty merkle root, spendable only by key path.
 */
export function keyPathOutput(internalKey: Bytes): KeyPathOutput {
    checkInternalKey(internalKey);
    let payment: P2TR;
    try {
        payment = p2tr(internalKey);
    } catch (error) {
        throw new EscrowError(
            "InvalidKeyMaterial",
            `invalid taproot internal key: ${error instanceof Error ? error.message : String(error)}`
        );
    }
    return {
        internalKey,
        tweakedPublicKey: payment.tweakedPubkey,
        pkScript: payment.script,
    };
}

export function keyPathAddress(internalKey: Bytes, network: Network): string {
    return Address(network).encode({
        type: "tr",
        pubkey: keyPathOutput(internalKey).tweakedPublicKey,
    });
}

/**
 * deriveSpendInfo commits a list of leaf scripts into a taproot output.
 */
export function deriveSpendInfo(
    leaves: Bytes[],
    internalKey: Bytes = TAPROOT_UNSPENDABLE_KEY
): TaprootTree {
    return new TaprootTree(leaves, internalKey);
}
