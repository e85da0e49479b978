import { describe, it, expect } from "vitest";
import { hex } from "@scure/base";
import { TAPROOT_UNSPENDABLE_KEY } from "@scure/btc-signer/utils";
import {
    Escrow,
    EscrowScriptType,
    MultisigTapscript,
    CSVMultisigTapscript,
    buildEscrowScript,
    escrowAddress,
    escrowSpendInfo,
    isEscrowError,
    networks,
    deriveSpendInfo,
} from "../src";
import fixtures from "./fixtures/nostr.json";

const alice = hex.decode(fixtures.nsec[0].publicKey);
const bob = hex.decode(fixtures.nsec[1].publicKey);
const arbitrator = hex.decode(fixtures.nsec[2].publicKey);
const TIMELOCK = 144;

function errorOf(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    return undefined;
}

const allLeaves = [
    EscrowScriptType.Collaborative,
    EscrowScriptType.DisputeArbitrator1,
    EscrowScriptType.DisputeArbitrator2,
    EscrowScriptType.DisputeTimeout1,
    EscrowScriptType.DisputeTimeout2,
];

describe("buildEscrowScript", () => {
    it("should sort the collaborative keys", () => {
        const script = buildEscrowScript(
            alice,
            bob,
            undefined,
            undefined,
            EscrowScriptType.Collaborative
        );
        // bob's key sorts before alice's
        expect(hex.encode(script)).toBe(
            hex.encode(MultisigTapscript.encode({ pubkeys: [bob, alice] }).script)
        );
        expect(
            hex.encode(
                buildEscrowScript(
                    bob,
                    alice,
                    undefined,
                    undefined,
                    EscrowScriptType.Collaborative
                )
            )
        ).toBe(hex.encode(script));
    });

    it("should pair a participant with the arbitrator", () => {
        const script = buildEscrowScript(
            alice,
            bob,
            arbitrator,
            TIMELOCK,
            EscrowScriptType.DisputeArbitrator1
        );
        expect(hex.encode(script)).toBe(
            hex.encode(
                MultisigTapscript.encode({ pubkeys: [alice, arbitrator] }).script
            )
        );
    });

    it("should lock the unilateral leaf behind the timelock", () => {
        const script = buildEscrowScript(
            alice,
            bob,
            arbitrator,
            TIMELOCK,
            EscrowScriptType.DisputeTimeout2
        );
        const decoded = CSVMultisigTapscript.decode(script);
        expect(decoded.params.timelock).toEqual({ type: "blocks", value: 144n });
        expect(decoded.params.pubkeys.map(hex.encode)).toEqual([
            hex.encode(bob),
        ]);
    });

    it("should require the arbitrator for the arbitrator leaves", () => {
        const error = errorOf(() =>
            buildEscrowScript(
                alice,
                bob,
                undefined,
                TIMELOCK,
                EscrowScriptType.DisputeArbitrator2
            )
        );
        expect(isEscrowError(error, "MissingVariantParameter")).toBe(true);
    });

    it("should require the timelock for the timeout leaves", () => {
        const error = errorOf(() =>
            buildEscrowScript(
                alice,
                bob,
                arbitrator,
                undefined,
                EscrowScriptType.DisputeTimeout1
            )
        );
        expect(isEscrowError(error, "MissingVariantParameter")).toBe(true);
    });

    it("should reject equal participants", () => {
        expect(() =>
            buildEscrowScript(
                alice,
                alice,
                undefined,
                undefined,
                EscrowScriptType.Collaborative
            )
        ).toThrow("escrow participants must be distinct keys");
    });

    it("should reject the arbitrator as participant", () => {
        expect(() =>
            buildEscrowScript(
                alice,
                bob,
                alice,
                TIMELOCK,
                EscrowScriptType.DisputeArbitrator1
            )
        ).toThrow("arbitrator must differ from the participants");
    });

    it("should reject malformed keys", () => {
        const error = errorOf(() =>
            buildEscrowScript(
                new Uint8Array(33),
                bob,
                undefined,
                undefined,
                EscrowScriptType.Collaborative
            )
        );
        expect(isEscrowError(error, "InvalidParameters")).toBe(true);
    });
});

describe("Escrow.Script", () => {
    it("should build a single leaf collaborative tree", () => {
        const escrow = escrowSpendInfo(alice, bob);
        expect(escrow.scripts).toHaveLength(1);
        expect(escrow.collaborativeScript).toBe(
            hex.encode(escrow.script(EscrowScriptType.Collaborative))
        );
        const controlBlock = escrow.controlBlock(escrow.scripts[0]);
        expect(controlBlock).toHaveLength(33);
        expect(controlBlock[0] & 0xfe).toBe(0xc0);
        expect(hex.encode(controlBlock.subarray(1))).toBe(
            hex.encode(TAPROOT_UNSPENDABLE_KEY)
        );
    });

    it("should be commutative in the participants (collaborative)", () => {
        const ab = escrowSpendInfo(alice, bob);
        const ba = escrowSpendInfo(bob, alice);
        expect(ab.address(networks.mainnet)).toBe(ba.address(networks.mainnet));
        expect(ab.collaborativeScript).toBe(ba.collaborativeScript);
        expect(hex.encode(ab.merkleRoot)).toBe(hex.encode(ba.merkleRoot));
    });

    it("should be commutative in the participants (dispute)", () => {
        const ab = escrowSpendInfo(alice, bob, arbitrator, TIMELOCK);
        const ba = escrowSpendInfo(bob, alice, arbitrator, TIMELOCK);
        expect(ab.address(networks.signet)).toBe(ba.address(networks.signet));
        ab.scripts.forEach((script, i) => {
            expect(hex.encode(script)).toBe(hex.encode(ba.scripts[i]));
            expect(hex.encode(ab.controlBlock(script))).toBe(
                hex.encode(ba.controlBlock(script))
            );
        });
        // participant numbering follows the caller
        expect(
            hex.encode(ab.script(EscrowScriptType.DisputeArbitrator1))
        ).toBe(hex.encode(ba.script(EscrowScriptType.DisputeArbitrator2)));
    });

    it("should commit to all five dispute leaves", () => {
        const escrow = escrowSpendInfo(alice, bob, arbitrator, TIMELOCK);
        expect(escrow.scripts).toHaveLength(5);
        for (const type of allLeaves) {
            const script = escrow.script(type);
            const controlBlock = escrow.controlBlock(script);
            expect((controlBlock.length - 33) % 32).toBe(0);
            expect(controlBlock.length).toBeGreaterThan(33);
            expect(controlBlock[0] & 1).toBe(escrow.parity);
            expect(escrow.leafHash(script)).toHaveLength(32);
        }
    });

    it("should match a tree derived from the same leaves", () => {
        const escrow = escrowSpendInfo(alice, bob, arbitrator, TIMELOCK);
        const tree = deriveSpendInfo(escrow.scripts);
        expect(hex.encode(tree.outputKey)).toBe(hex.encode(escrow.outputKey));
        expect(hex.encode(tree.pkScript)).toBe(
            "5120" + hex.encode(escrow.tweakedPublicKey)
        );
    });

    it("should keep its own copy of the keys", () => {
        const p1 = Uint8Array.from(alice);
        const p2 = Uint8Array.from(bob);
        const arb = Uint8Array.from(arbitrator);
        const escrow = new Escrow.Script(Escrow.variant(p1, p2, arb, TIMELOCK));
        const collaborative = hex.encode(
            escrow.script(EscrowScriptType.Collaborative)
        );
        const address = escrow.address(networks.mutinynet);
        p1[0] ^= 0xff;
        p2[0] ^= 0xff;
        arb[0] ^= 0xff;
        expect(hex.encode(escrow.script(EscrowScriptType.Collaborative))).toBe(
            collaborative
        );
        expect(
            hex.encode(escrow.script(EscrowScriptType.DisputeArbitrator1))
        ).toBe(
            hex.encode(
                buildEscrowScript(
                    alice,
                    bob,
                    arbitrator,
                    TIMELOCK,
                    EscrowScriptType.DisputeArbitrator1
                )
            )
        );
        expect(escrow.address(networks.mutinynet)).toBe(address);
    });

    it("should copy the variant it is given", () => {
        const variant = {
            type: "collaborative" as const,
            participant1: Uint8Array.from(alice),
            participant2: Uint8Array.from(bob),
        };
        const escrow = new Escrow.Script(variant);
        variant.participant1[0] ^= 0xff;
        expect(hex.encode(escrow.script(EscrowScriptType.Collaborative))).toBe(
            escrow.collaborativeScript
        );
    });

    it("should change the address with the timelock", () => {
        const a = escrowAddress(alice, bob, arbitrator, 144, networks.mutinynet);
        const b = escrowAddress(alice, bob, arbitrator, 145, networks.mutinynet);
        expect(a).not.toBe(b);
        expect(a.startsWith("tb1p")).toBe(true);
    });

    it("should copy the scripts and internal key of a derived tree", () => {
        const leaf = Uint8Array.from(
            MultisigTapscript.encode({ pubkeys: [arbitrator] }).script
        );
        const internalKey = Uint8Array.from(alice);
        const leaves = [leaf];
        const tree = deriveSpendInfo(leaves, internalKey);
        const outputKey = hex.encode(tree.outputKey);
        const original = hex.encode(leaf);

        leaf[0] ^= 0xff;
        internalKey[0] ^= 0xff;
        leaves.push(new Uint8Array([0x51]));

        expect(tree.scripts.map(hex.encode)).toEqual([original]);
        expect(hex.encode(tree.internalKey)).toBe(hex.encode(alice));
        expect(hex.encode(tree.leafHash(hex.decode(original)))).toHaveLength(64);
        expect(hex.encode(tree.outputKey)).toBe(outputKey);
    });

    it("should not find a leaf outside the tree", () => {
        const escrow = escrowSpendInfo(alice, bob);
        const foreign = MultisigTapscript.encode({ pubkeys: [arbitrator] });
        const error = errorOf(() => escrow.controlBlock(foreign.script));
        expect(isEscrowError(error, "LeafNotFound")).toBe(true);
    });

    it("should give the witness order of the signers", () => {
        const escrow = escrowSpendInfo(alice, bob, arbitrator, TIMELOCK);
        // collaborative script checks bob then alice
        expect(
            escrow.signingOrder(EscrowScriptType.Collaborative).map(hex.encode)
        ).toEqual([hex.encode(alice), hex.encode(bob)]);
        expect(
            escrow
                .signingOrder(EscrowScriptType.DisputeArbitrator2)
                .map(hex.encode)
        ).toEqual([hex.encode(arbitrator), hex.encode(bob)]);
        expect(
            escrow.signingOrder(EscrowScriptType.DisputeTimeout1).map(hex.encode)
        ).toEqual([hex.encode(alice)]);
    });
});

describe("Escrow.variant", () => {
    it("should select the variant from the arbitrator", () => {
        expect(Escrow.variant(alice, bob).type).toBe("collaborative");
        expect(Escrow.variant(alice, bob, arbitrator, TIMELOCK).type).toBe(
            "dispute"
        );
    });

    it("should require a timelock with the arbitrator", () => {
        const error = errorOf(() => Escrow.variant(alice, bob, arbitrator));
        expect(isEscrowError(error, "MissingVariantParameter")).toBe(true);
    });

    it("should reject a timelock without arbitrator", () => {
        expect(() =>
            Escrow.variant(alice, bob, undefined, TIMELOCK)
        ).toThrow("a timelock needs an arbitrator");
    });
});
