import { SigHash } from "@scure/btc-signer";
import { Bytes, concatBytes, taprootTweakPrivKey } from "@scure/btc-signer/utils";
import { schnorr, secp256k1 } from "@noble/curves/secp256k1";
import { hex } from "@scure/base";
import { ErrInvalidKeyLength, EscrowError } from "../errors";

/**
 * Schnorr signature together with the sighash type it commits to.
 */
export type TaprootSignature = {
    signature: Bytes;
    sighashType: SigHash;
};

// BIP340 auxiliary randomness; fixed so that signing is deterministic
const ZERO_AUX_RAND = new Uint8Array(32).fill(0);

function checkSecretKey(secretKey: Bytes): void {
    if (secretKey.length !== 32) {
        throw ErrInvalidKeyLength("secret key", secretKey.length);
    }
    if (!secp256k1.utils.isValidPrivateKey(secretKey)) {
        throw new EscrowError("InvalidKeyMaterial", "invalid secret key");
    }
}

function checkDigest(digest: Bytes): void {
    if (digest.length !== 32) {
        throw new EscrowError(
            "InvalidParameters",
            `invalid sighash length: expected 32, got ${digest.length}`
        );
    }
}

/**
 * Signs a key path sighash. The secret key is tweaked first (BIP341, empty
 * merkle root unless given), so the signature verifies against the output
 * key, not the participant's own key.
 */
export function signKeyPath(
    secretKey: Bytes,
    digest: Bytes,
    merkleRoot: Bytes = new Uint8Array(0)
): TaprootSignature {
    checkSecretKey(secretKey);
    checkDigest(digest);
    const tweaked = taprootTweakPrivKey(secretKey, merkleRoot);
    return {
        signature: schnorr.sign(digest, tweaked, ZERO_AUX_RAND),
        sighashType: SigHash.ALL,
    };
}

/**
 * Signs a script path sighash with the untweaked key, the one pushed by the
 * leaf script.
 */
export function signScriptPath(
    secretKey: Bytes,
    digest: Bytes
): TaprootSignature {
    checkSecretKey(secretKey);
    checkDigest(digest);
    return {
        signature: schnorr.sign(digest, secretKey, ZERO_AUX_RAND),
        sighashType: SigHash.ALL,
    };
}

/**
 * Witness form of a signature: 64 bytes for SIGHASH_DEFAULT, otherwise the
 * sighash type is appended as a 65th byte.
 */
export function serializeSignature(sig: TaprootSignature): Bytes {
    if (sig.sighashType === SigHash.DEFAULT) return sig.signature;
    return concatBytes(sig.signature, new Uint8Array([sig.sighashType]));
}

export function parseSignature(bytes: Bytes): TaprootSignature {
    if (bytes.length === 64) {
        return { signature: bytes, sighashType: SigHash.DEFAULT };
    }
    if (bytes.length === 65 && bytes[64] === SigHash.ALL) {
        return { signature: bytes.subarray(0, 64), sighashType: SigHash.ALL };
    }
    throw new EscrowError(
        "InvalidEncoding",
        `invalid taproot signature ${hex.encode(bytes)}`
    );
}
