import { bech32, hex } from "@scure/base";
import { schnorr, secp256k1 } from "@noble/curves/secp256k1";
import { Bytes } from "@scure/btc-signer/utils";
import {
    ErrWrongNpubPrefix,
    ErrWrongNsecPrefix,
    EscrowError,
} from "../errors";

export const NPUB_PREFIX = "npub";
export const NSEC_PREFIX = "nsec";

type Bech32String = `${string}1${string}`;

function isBech32String(value: string): value is Bech32String {
    return value.lastIndexOf("1") > 0;
}

function decodeBech32(value: string): { prefix: string; bytes: Bytes } {
    if (!isBech32String(value)) {
        throw new EscrowError("InvalidEncoding", "invalid bech32 string");
    }
    try {
        const { prefix, words } = bech32.decode(value);
        return { prefix, bytes: bech32.fromWords(words) };
    } catch (error) {
        throw new EscrowError(
            "InvalidEncoding",
            `invalid bech32 string: ${error instanceof Error ? error.message : String(error)}`
        );
    }
}

function decodeKey(value: string, prefix: string, wrongPrefix: EscrowError): Bytes {
    const decoded = decodeBech32(value);
    if (decoded.prefix !== prefix) throw wrongPrefix;
    if (decoded.bytes.length !== 32) {
        throw new EscrowError(
            "InvalidEncoding",
            `invalid ${prefix} payload: expected 32 bytes, got ${decoded.bytes.length}`
        );
    }
    return decoded.bytes;
}

/**
 * Bech32 codec for Nostr keys (NIP-19 `npub` and `nsec`) and their use as
 * Bitcoin taproot key material.
 *
 * An npub carries an x-only key: it always decodes to the even-Y point, which
 * is the key a taproot leaf checks signatures against.
 *
 * @example
 * ```typescript
 * const pubkey = NostrKeys.decodeNpub("npub1...");
 * const secret = NostrKeys.decodeNsec("nsec1...");
 * NostrKeys.encodeNpub(NostrKeys.publicKeyFromSecret(secret));
 * ```
 */
export namespace NostrKeys {
    /**
     * @throws {EscrowError} InvalidEncoding on a bad checksum, prefix or length
     * @throws {EscrowError} InvalidKeyMaterial if the payload is not on the curve
     */
    export function decodeNpub(npub: string): Bytes {
        const pubkey = decodeKey(npub, NPUB_PREFIX, ErrWrongNpubPrefix);
        try {
            schnorr.utils.lift_x(schnorr.utils.bytesToNumberBE(pubkey));
        } catch (error) {
            throw new EscrowError(
                "InvalidKeyMaterial",
                "npub is not a valid x-only public key"
            );
        }
        return pubkey;
    }

    /**
     * @throws {EscrowError} InvalidEncoding on a bad checksum, prefix or length
     * @throws {EscrowError} InvalidKeyMaterial if the payload is not a valid scalar
     */
    export function decodeNsec(nsec: string): Bytes {
        const secret = decodeKey(nsec, NSEC_PREFIX, ErrWrongNsecPrefix);
        if (!secp256k1.utils.isValidPrivateKey(secret)) {
            throw new EscrowError(
                "InvalidKeyMaterial",
                "nsec is not a valid secret key"
            );
        }
        return secret;
    }

    export function encodeNpub(pubkey: Bytes): string {
        if (pubkey.length !== 32) {
            throw new EscrowError(
                "InvalidKeyMaterial",
                `invalid x-only public key length ${pubkey.length}`
            );
        }
        return bech32.encode(NPUB_PREFIX, bech32.toWords(pubkey));
    }

    export function encodeNsec(secret: Bytes): string {
        if (secret.length !== 32) {
            throw new EscrowError(
                "InvalidKeyMaterial",
                `invalid secret key length ${secret.length}`
            );
        }
        return bech32.encode(NSEC_PREFIX, bech32.toWords(secret));
    }

    export function checkNpub(npub: string): boolean {
        try {
            decodeNpub(npub);
            return true;
        } catch (error) {
            if (error instanceof EscrowError) return false;
            throw error;
        }
    }

    /**
     * x-only public key of a secret, normalized to even Y.
     */
    export function publicKeyFromSecret(secret: Bytes): Bytes {
        if (!secp256k1.utils.isValidPrivateKey(secret)) {
            throw new EscrowError("InvalidKeyMaterial", "invalid secret key");
        }
        return schnorr.getPublicKey(secret);
    }

    /** Compressed public key hex, `02` prefixed since npubs are even. */
    export function npubToHex(npub: string): string {
        return "02" + hex.encode(decodeNpub(npub));
    }

    export function nsecToHex(nsec: string): string {
        return hex.encode(decodeNsec(nsec));
    }

    /** x-only public key hex of an nsec. */
    export function nsecToPublicKeyHex(nsec: string): string {
        return hex.encode(publicKeyFromSecret(decodeNsec(nsec)));
    }
}
