import { Bytes } from "@scure/btc-signer/utils";
import type { TaprootSignature } from "../signing/signer";

/**
 * Identity holds a participant's secret key and produces taproot
 * signatures over precomputed sighashes.
 */
export interface Identity {
    xOnlyPublicKey(): Bytes;
    // merkleRoot defaults to empty (output without script tree)
    signKeyPath(digest: Bytes, merkleRoot?: Bytes): TaprootSignature;
    signScriptPath(digest: Bytes): TaprootSignature;
}
