import * as bip68 from "bip68";
import { Bytes } from "@scure/btc-signer/utils";
import { Script, ScriptNum, ScriptType } from "@scure/btc-signer/script";
import { hex } from "@scure/base";
import { EscrowError } from "../errors";

/**
 * RelativeTimelock describes a CHECKSEQUENCEVERIFY delay.
 *
 * @example
 * ```typescript
 * const timelock = { value: 144n, type: "blocks" }; // 1 day in blocks
 * const timelock = { value: 512n, type: "seconds" }; // 8 minutes in seconds
 * ```
 */
export type RelativeTimelock = {
    value: bigint;
    type: "seconds" | "blocks";
};

export enum TapscriptType {
    Multisig = "multisig",
    CSVMultisig = "csv-multisig",
}

/**
 * EscrowTapscript is a decoded leaf script: its kind, the parameters it was
 * built from and the raw bytes.
 */
export interface EscrowTapscript<T extends TapscriptType, Params> {
    type: T;
    params: Params;
    script: Uint8Array;
}

export type AnyTapscript = MultisigTapscript.Type | CSVMultisigTapscript.Type;

const invalidScript = (message: string) =>
    new EscrowError("InvalidParameters", message);

function checkPubkeys(pubkeys: Bytes[]): void {
    if (pubkeys.length === 0) {
        throw invalidScript("At least 1 pubkey is required");
    }
    for (const pubkey of pubkeys) {
        if (pubkey.length !== 32) {
            throw invalidScript(
                `Invalid pubkey length: expected 32, got ${pubkey.length}`
            );
        }
    }
}

/**
 * decodeTapscript recognizes the leaf scripts built by this library.
 *
 * @throws {EscrowError} InvalidParameters if the script matches no known template
 * @example
 * ```typescript
 * const tapscript = decodeTapscript(leafScript);
 * console.log("type:", tapscript.type);
 * ```
 */
export function decodeTapscript(script: Uint8Array): AnyTapscript {
    const decoders = [MultisigTapscript.decode, CSVMultisigTapscript.decode];

    for (const decode of decoders) {
        try {
            return decode(script);
        } catch (error) {
            continue;
        }
    }

    throw invalidScript(
        `Failed to decode: script ${hex.encode(script)} is not a valid tapscript`
    );
}

/**
 * N-of-N signature check, every key must sign.
 *
 * <pubkey> CHECKSIGVERIFY <pubkey> CHECKSIG
 *
 * The interpreter consumes signatures from the top of the stack in key order,
 * so the witness carries them reversed: the signature for the last key first.
 */
export namespace MultisigTapscript {
    export type Type = EscrowTapscript<TapscriptType.Multisig, Params>;

    export type Params = {
        pubkeys: Bytes[];
    };

    export function encode(params: Params): Type {
        checkPubkeys(params.pubkeys);

        const asm: ScriptType = [];
        params.pubkeys.forEach((pubkey, i) => {
            asm.push(pubkey);
            asm.push(
                i < params.pubkeys.length - 1 ? "CHECKSIGVERIFY" : "CHECKSIG"
            );
        });

        return {
            type: TapscriptType.Multisig,
            params,
            script: Script.encode(asm),
        };
    }

    export function decode(script: Uint8Array): Type {
        if (script.length === 0) {
            throw invalidScript("Failed to decode: script is empty");
        }

        const asm = Script.decode(script);
        if (asm.length % 2 !== 0) {
            throw invalidScript("Invalid multisig script: odd number of ops");
        }

        const pubkeys: Bytes[] = [];
        for (let i = 0; i < asm.length; i += 2) {
            const pubkey = asm[i];
            if (!(pubkey instanceof Uint8Array) || pubkey.length !== 32) {
                throw invalidScript("Expected a 32-byte pubkey push");
            }
            const expected =
                i === asm.length - 2 ? "CHECKSIG" : "CHECKSIGVERIFY";
            if (asm[i + 1] !== expected) {
                throw invalidScript(`Expected ${expected} after pubkey`);
            }
            pubkeys.push(pubkey);
        }

        const reconstructed = encode({ pubkeys });
        if (hex.encode(reconstructed.script) !== hex.encode(script)) {
            throw invalidScript(
                "Invalid script format: script reconstruction mismatch"
            );
        }

        return { type: TapscriptType.Multisig, params: { pubkeys }, script };
    }

    export function is(tapscript: AnyTapscript): tapscript is Type {
        return tapscript.type === TapscriptType.Multisig;
    }
}

/**
 * Relative timelock followed by a multisig: every key must sign, and only once
 * the input's sequence reaches the BIP68 delay.
 *
 * <sequence> CHECKSEQUENCEVERIFY DROP <pubkey> CHECKSIG
 *
 * @example
 * ```typescript
 * const leaf = CSVMultisigTapscript.encode({
 *     timelock: { type: "blocks", value: 144n },
 *     pubkeys: [participant],
 * });
 * ```
 */
export namespace CSVMultisigTapscript {
    export type Type = EscrowTapscript<TapscriptType.CSVMultisig, Params>;

    export type Params = {
        timelock: RelativeTimelock;
    } & MultisigTapscript.Params;

    export function sequence(timelock: RelativeTimelock): number {
        return bip68.encode(
            timelock.type === "blocks"
                ? { blocks: Number(timelock.value) }
                : { seconds: Number(timelock.value) }
        );
    }

    export function encode(params: Params): Type {
        checkPubkeys(params.pubkeys);
        if (params.timelock.value <= 0n) {
            throw invalidScript("Timelock must be positive");
        }

        // a plain number keeps the push minimal (OP_1..OP_16 for small delays)
        const asm: ScriptType = [
            sequence(params.timelock),
            "CHECKSEQUENCEVERIFY",
            "DROP",
        ];
        const multisigScript = MultisigTapscript.encode(params);

        return {
            type: TapscriptType.CSVMultisig,
            params,
            script: new Uint8Array([
                ...Script.encode(asm),
                ...multisigScript.script,
            ]),
        };
    }

    export function decode(script: Uint8Array): Type {
        if (script.length === 0) {
            throw invalidScript("Failed to decode: script is empty");
        }

        const asm = Script.decode(script);
        if (asm.length < 5) {
            throw invalidScript("Invalid script: too short (expected at least 5)");
        }

        const [sequenceOp, csv, drop] = asm;
        if (csv !== "CHECKSEQUENCEVERIFY" || drop !== "DROP") {
            throw invalidScript(
                "Invalid script: expected CHECKSEQUENCEVERIFY DROP"
            );
        }

        let sequenceNum: number;
        if (typeof sequenceOp === "number") {
            sequenceNum = sequenceOp;
        } else if (sequenceOp instanceof Uint8Array) {
            sequenceNum = Number(ScriptNum().decode(sequenceOp));
        } else {
            throw invalidScript("Invalid script: expected sequence number");
        }

        const multisig = MultisigTapscript.decode(
            Script.encode(asm.slice(3))
        );

        const decoded = bip68.decode(sequenceNum);
        let timelock: RelativeTimelock;
        if (decoded.blocks !== undefined) {
            timelock = { type: "blocks", value: BigInt(decoded.blocks) };
        } else if (decoded.seconds !== undefined) {
            timelock = { type: "seconds", value: BigInt(decoded.seconds) };
        } else {
            throw invalidScript(`Invalid sequence ${sequenceNum}`);
        }

        const reconstructed = encode({ timelock, ...multisig.params });
        if (hex.encode(reconstructed.script) !== hex.encode(script)) {
            throw invalidScript(
                "Invalid script format: script reconstruction mismatch"
            );
        }

        return {
            type: TapscriptType.CSVMultisig,
            params: { timelock, ...multisig.params },
            script,
        };
    }

    export function is(tapscript: AnyTapscript): tapscript is Type {
        return tapscript.type === TapscriptType.CSVMultisig;
    }
}
