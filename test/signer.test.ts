import { describe, it, expect } from "vitest";
import { hex } from "@scure/base";
import { schnorr } from "@noble/curves/secp256k1";
import { SigHash, Transaction } from "@scure/btc-signer";
import {
    SingleKey,
    assembleKeyPath,
    assembleScriptPath,
    deriveSpendInfo,
    isEscrowError,
    keyPathOutput,
    MultisigTapscript,
    parseSignature,
    serializeSignature,
    signKeyPath,
    signScriptPath,
    withWitness,
} from "../src";
import fixtures from "./fixtures/nostr.json";

const digest = new Uint8Array(32).fill(0x42);

describe("signScriptPath", () => {
    fixtures.nsec.forEach((f) => {
        it(`should verify against the x-only key of ${f.description}`, () => {
            const sig = signScriptPath(hex.decode(f.hex), digest);
            expect(sig.sighashType).toBe(SigHash.ALL);
            expect(schnorr.verify(sig.signature, digest, hex.decode(f.publicKey))).toBe(true);
        });
    });

    it("should be deterministic", () => {
        const key = SingleKey.fromNsec(fixtures.nsec[0].nsec);
        expect(hex.encode(key.signScriptPath(digest).signature)).toBe(
            hex.encode(key.signScriptPath(digest).signature)
        );
    });

    it("should reject a digest that is not 32 bytes", () => {
        expect(() =>
            signScriptPath(hex.decode(fixtures.nsec[0].hex), new Uint8Array(31))
        ).toThrow("invalid sighash length: expected 32, got 31");
    });

    it("should reject an invalid secret", () => {
        let error: unknown;
        try {
            signScriptPath(new Uint8Array(32).fill(0xff), digest);
        } catch (e) {
            error = e;
        }
        expect(isEscrowError(error, "InvalidKeyMaterial")).toBe(true);
        expect(() => signScriptPath(new Uint8Array(16), digest)).toThrow(
            "invalid secret key length: expected 32, got 16"
        );
    });
});

describe("signKeyPath", () => {
    fixtures.nsec.forEach((f) => {
        it(`should verify against the tweaked output key of ${f.description}`, () => {
            const sig = signKeyPath(hex.decode(f.hex), digest);
            const { tweakedPublicKey } = keyPathOutput(hex.decode(f.publicKey));
            expect(schnorr.verify(sig.signature, digest, tweakedPublicKey)).toBe(true);
            expect(
                schnorr.verify(sig.signature, digest, hex.decode(f.publicKey))
            ).toBe(false);
        });
    });

    describe("with a merkle root", () => {
        const [aliceFixture, bobFixture] = fixtures.nsec;
        const alice = hex.decode(aliceFixture.publicKey);
        const leaf = MultisigTapscript.encode({
            pubkeys: [hex.decode(bobFixture.publicKey)],
        }).script;
        const tree = deriveSpendInfo([leaf], alice);

        it("should verify against the output key committing to the scripts", () => {
            const sig = signKeyPath(hex.decode(aliceFixture.hex), digest, tree.merkleRoot);
            expect(
                schnorr.verify(sig.signature, digest, tree.tweakedPublicKey)
            ).toBe(true);
            expect(
                schnorr.verify(
                    sig.signature,
                    digest,
                    keyPathOutput(alice).tweakedPublicKey
                )
            ).toBe(false);
        });

        it("should sign the same through SingleKey", () => {
            const key = SingleKey.fromNsec(aliceFixture.nsec);
            const sig = key.signKeyPath(digest, tree.merkleRoot);
            expect(
                schnorr.verify(sig.signature, digest, tree.tweakedPublicKey)
            ).toBe(true);
            expect(hex.encode(sig.signature)).toBe(
                hex.encode(
                    signKeyPath(hex.decode(aliceFixture.hex), digest, tree.merkleRoot)
                        .signature
                )
            );
        });
    });
});

describe("signature encoding", () => {
    const sig = signScriptPath(hex.decode(fixtures.nsec[1].hex), digest);

    it("should append the sighash byte", () => {
        const bytes = serializeSignature(sig);
        expect(bytes).toHaveLength(65);
        expect(bytes[64]).toBe(0x01);
        expect(hex.encode(parseSignature(bytes).signature)).toBe(
            hex.encode(sig.signature)
        );
    });

    it("should keep default signatures at 64 bytes", () => {
        const bytes = serializeSignature({
            signature: sig.signature,
            sighashType: SigHash.DEFAULT,
        });
        expect(bytes).toHaveLength(64);
        expect(parseSignature(bytes).sighashType).toBe(SigHash.DEFAULT);
    });

    it("should reject other lengths and sighash bytes", () => {
        expect(() => parseSignature(new Uint8Array(63))).toThrow(
            "invalid taproot signature"
        );
        const single = Uint8Array.from([...sig.signature, 0x03]);
        expect(() => parseSignature(single)).toThrow("invalid taproot signature");
    });
});

describe("witness", () => {
    const sigA = signScriptPath(hex.decode(fixtures.nsec[0].hex), digest);
    const sigB = signScriptPath(hex.decode(fixtures.nsec[1].hex), digest);
    const script = new Uint8Array([0x51]);
    const controlBlock = new Uint8Array(33).fill(0xc0);

    it("should keep the given order", () => {
        const witness = assembleScriptPath([sigA, sigB], script, controlBlock);
        expect(witness.map(hex.encode)).toEqual([
            hex.encode(serializeSignature(sigA)),
            hex.encode(serializeSignature(sigB)),
            "51",
            hex.encode(controlBlock),
        ]);
        expect(assembleKeyPath(sigA).map(hex.encode)).toEqual([
            hex.encode(serializeSignature(sigA)),
        ]);
    });

    it("should attach the witness to a copy", () => {
        const tx = new Transaction();
        tx.addInput({ txid: hex.decode("cc".repeat(32)), index: 0 });
        const witness = assembleKeyPath(sigA);
        const signed = withWitness(tx, 0, witness);
        expect(tx.getInput(0).finalScriptWitness).toBeUndefined();
        expect(signed.getInput(0).finalScriptWitness?.map(hex.encode)).toEqual(
            witness.map(hex.encode)
        );
    });

    it("should reject an out of range input", () => {
        const tx = new Transaction();
        tx.addInput({ txid: hex.decode("cc".repeat(32)), index: 0 });
        let error: unknown;
        try {
            withWitness(tx, 1, assembleKeyPath(sigA));
        } catch (e) {
            error = e;
        }
        expect(isEscrowError(error, "InputIndexOutOfRange")).toBe(true);
    });
});
