import { Bytes, compareBytes, equalBytes } from "@scure/btc-signer/utils";
import { hex } from "@scure/base";
import {
    ErrMissingArbitrator,
    ErrMissingTimelock,
    ErrSameParticipants,
    EscrowError,
} from "../errors";
import type { Network } from "../networks";
import { blocksToRelativeTimelock } from "../utils/timelock";
import {
    CSVMultisigTapscript,
    decodeTapscript,
    MultisigTapscript,
} from "./tapscript";
import { TaprootTree } from "./base";

/**
 * Leaves of an escrow tree. The numbered leaves refer to the caller's
 * participant 1 and participant 2.
 */
export enum EscrowScriptType {
    /** both participants sign, no delay */
    Collaborative = "collaborative",
    /** participant 1 and the arbitrator sign, no delay */
    DisputeArbitrator1 = "dispute-arbitrator-1",
    /** participant 2 and the arbitrator sign, no delay */
    DisputeArbitrator2 = "dispute-arbitrator-2",
    /** participant 1 alone, after the timelock */
    DisputeTimeout1 = "dispute-timeout-1",
    /** participant 2 alone, after the timelock */
    DisputeTimeout2 = "dispute-timeout-2",
}

function checkKey(key: Bytes, what: string): Bytes {
    if (key.length !== 32) {
        throw new EscrowError(
            "InvalidParameters",
            `invalid ${what} key length: expected 32, got ${key.length}`
        );
    }
    return Uint8Array.from(key);
}

/**
 * Canonical (byte-wise ascending) order of the two participants, which makes
 * scripts and addresses independent of argument order.
 */
export function sortParticipants(a: Bytes, b: Bytes): [Bytes, Bytes] {
    return compareBytes(a, b) <= 0 ? [a, b] : [b, a];
}

/**
 * buildEscrowScript returns the locking script of one escrow leaf.
 *
 * @throws {EscrowError} MissingVariantParameter when the leaf needs an arbitrator or a timelock that was not given
 * @throws {EscrowError} InvalidParameters on malformed keys, equal participants or an out of range timelock
 * @example
 * ```typescript
 * const script = buildEscrowScript(alice, bob, undefined, undefined, EscrowScriptType.Collaborative);
 * ```
 */
export function buildEscrowScript(
    participant1: Bytes,
    participant2: Bytes,
    arbitrator: Bytes | undefined,
    timelock: number | undefined,
    type: EscrowScriptType
): Bytes {
    const p1 = checkKey(participant1, "participant");
    const p2 = checkKey(participant2, "participant");
    if (equalBytes(p1, p2)) throw ErrSameParticipants;

    switch (type) {
        case EscrowScriptType.Collaborative:
            return MultisigTapscript.encode({
                pubkeys: sortParticipants(p1, p2),
            }).script;

        case EscrowScriptType.DisputeArbitrator1:
        case EscrowScriptType.DisputeArbitrator2: {
            if (!arbitrator) throw ErrMissingArbitrator;
            const arb = checkKey(arbitrator, "arbitrator");
            const participant =
                type === EscrowScriptType.DisputeArbitrator1 ? p1 : p2;
            if (equalBytes(arb, participant)) {
                throw new EscrowError(
                    "InvalidParameters",
                    "arbitrator must differ from the participants"
                );
            }
            return MultisigTapscript.encode({ pubkeys: [participant, arb] })
                .script;
        }

        case EscrowScriptType.DisputeTimeout1:
        case EscrowScriptType.DisputeTimeout2: {
            if (timelock === undefined) throw ErrMissingTimelock;
            return CSVMultisigTapscript.encode({
                timelock: blocksToRelativeTimelock(timelock),
                pubkeys: [type === EscrowScriptType.DisputeTimeout1 ? p1 : p2],
            }).script;
        }
    }
}

/**
 * Escrow contract between two participants, with an optional arbitrated
 * dispute resolution.
 *
 * - **collaborative**: a single 2-of-2 leaf, both participants sign.
 * - **dispute**: the collaborative leaf, plus for each participant a leaf
 *   co-signed by the arbitrator (available immediately) and a leaf the
 *   participant signs alone once the relative timelock has elapsed.
 *
 * Participants are sorted before the tree is built, so swapping them yields
 * the same address and control blocks.
 *
 * @example
 * ```typescript
 * const escrow = new Escrow.Script({
 *   type: "dispute",
 *   participant1: alice,
 *   participant2: bob,
 *   arbitrator: carol,
 *   timelock: daysToBlocks(7),
 * });
 * const address = escrow.address(networks.mutinynet);
 * ```
 */
export namespace Escrow {
    export type Variant =
        | {
              type: "collaborative";
              participant1: Bytes;
              participant2: Bytes;
          }
        | {
              type: "dispute";
              participant1: Bytes;
              participant2: Bytes;
              arbitrator: Bytes;
              timelock: number;
          };

    function copyVariant(variant: Variant): Variant {
        const participant1 = Uint8Array.from(variant.participant1);
        const participant2 = Uint8Array.from(variant.participant2);
        if (variant.type === "dispute") {
            return {
                type: "dispute",
                participant1,
                participant2,
                arbitrator: Uint8Array.from(variant.arbitrator),
                timelock: variant.timelock,
            };
        }
        return { type: "collaborative", participant1, participant2 };
    }

    export class Script extends TaprootTree {
        readonly variant: Variant;
        readonly collaborativeScript: string;

        constructor(params: Variant) {
            const variant = copyVariant(params);
            const [a, b] = sortParticipants(
                checkKey(variant.participant1, "participant"),
                checkKey(variant.participant2, "participant")
            );
            const build = (type: EscrowScriptType) =>
                variant.type === "dispute"
                    ? buildEscrowScript(
                          a,
                          b,
                          variant.arbitrator,
                          variant.timelock,
                          type
                      )
                    : buildEscrowScript(a, b, undefined, undefined, type);

            const leaves =
                variant.type === "dispute"
                    ? [
                          EscrowScriptType.Collaborative,
                          EscrowScriptType.DisputeArbitrator1,
                          EscrowScriptType.DisputeArbitrator2,
                          EscrowScriptType.DisputeTimeout1,
                          EscrowScriptType.DisputeTimeout2,
                      ]
                    : [EscrowScriptType.Collaborative];

            super(leaves.map(build));

            this.variant = variant;
            this.collaborativeScript = hex.encode(this.scripts[0]);
        }

        /**
         * Locking script of a leaf, with the numbering of the variant's
         * participant1 and participant2.
         */
        script(type: EscrowScriptType): Bytes {
            const { variant } = this;
            const script =
                variant.type === "dispute"
                    ? buildEscrowScript(
                          variant.participant1,
                          variant.participant2,
                          variant.arbitrator,
                          variant.timelock,
                          type
                      )
                    : buildEscrowScript(
                          variant.participant1,
                          variant.participant2,
                          undefined,
                          undefined,
                          type
                      );
            // LeafNotFound if the leaf is not part of this variant
            this.findLeaf(script);
            return script;
        }

        /**
         * Public keys in the order their signatures go into the witness: the
         * key checked last by the script comes first.
         */
        signingOrder(type: EscrowScriptType): Bytes[] {
            return [...decodeTapscript(this.script(type)).params.pubkeys].reverse();
        }
    }

    export function variant(
        participant1: Bytes,
        participant2: Bytes,
        arbitrator?: Bytes,
        timelock?: number
    ): Variant {
        if (arbitrator) {
            if (timelock === undefined) throw ErrMissingTimelock;
            return copyVariant({
                type: "dispute",
                participant1,
                participant2,
                arbitrator,
                timelock,
            });
        }
        if (timelock !== undefined) {
            throw new EscrowError(
                "InvalidParameters",
                "a timelock needs an arbitrator"
            );
        }
        return copyVariant({ type: "collaborative", participant1, participant2 });
    }
}

/**
 * Taproot spend info of an escrow: dispute when an arbitrator is given,
 * collaborative otherwise.
 */
export function escrowSpendInfo(
    participant1: Bytes,
    participant2: Bytes,
    arbitrator?: Bytes,
    timelock?: number
): Escrow.Script {
    return new Escrow.Script(
        Escrow.variant(participant1, participant2, arbitrator, timelock)
    );
}

export function escrowAddress(
    participant1: Bytes,
    participant2: Bytes,
    arbitrator: Bytes | undefined,
    timelock: number | undefined,
    network: Network
): string {
    return escrowSpendInfo(
        participant1,
        participant2,
        arbitrator,
        timelock
    ).address(network);
}
