import { Bytes, randomPrivateKeyBytes } from "@scure/btc-signer/utils";
import { hex } from "@scure/base";
import { Identity } from ".";
import { NostrKeys } from "../nostr/keys";
import {
    signKeyPath,
    signScriptPath,
    TaprootSignature,
} from "../signing/signer";

/**
 * In-memory single key identity. Signatures are deterministic: the same key
 * and sighash always give the same signature.
 *
 * @example
 * ```typescript
 * // Create from a Nostr secret key
 * const key = SingleKey.fromNsec("nsec1...");
 *
 * // Create from hex string
 * const key = SingleKey.fromHex("your_private_key_hex");
 *
 * // Sign a script path sighash
 * const sig = key.signScriptPath(sighash);
 * ```
 */
export class SingleKey implements Identity {
    private readonly key: Uint8Array;
    private readonly publicKey: Uint8Array;

    private constructor(key: Uint8Array | undefined) {
        this.key = key ? Uint8Array.from(key) : randomPrivateKeyBytes();
        // throws InvalidKeyMaterial on an out of range scalar
        this.publicKey = NostrKeys.publicKeyFromSecret(this.key);
    }

    static fromPrivateKey(privateKey: Uint8Array): SingleKey {
        return new SingleKey(privateKey);
    }

    static fromHex(privateKeyHex: string): SingleKey {
        return new SingleKey(hex.decode(privateKeyHex));
    }

    static fromNsec(nsec: string): SingleKey {
        return new SingleKey(NostrKeys.decodeNsec(nsec));
    }

    static random(): SingleKey {
        return new SingleKey(undefined);
    }

    xOnlyPublicKey(): Uint8Array {
        return Uint8Array.from(this.publicKey);
    }

    npub(): string {
        return NostrKeys.encodeNpub(this.publicKey);
    }

    signKeyPath(digest: Bytes, merkleRoot?: Bytes): TaprootSignature {
        return signKeyPath(this.key, digest, merkleRoot);
    }

    signScriptPath(digest: Bytes): TaprootSignature {
        return signScriptPath(this.key, digest);
    }
}
