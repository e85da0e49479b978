import { SigHash, Transaction } from "@scure/btc-signer";
import { Script, ScriptNum, ScriptType } from "@scure/btc-signer/script";
import { tapLeafHash, TAP_LEAF_VERSION } from "@scure/btc-signer/payment";
import {
    Bytes,
    compareBytes,
    equalBytes,
    taprootTweakPubkey,
} from "@scure/btc-signer/utils";
import { schnorr } from "@noble/curves/secp256k1";
import { ErrInputIndexOutOfRange, ErrVerification, EscrowError } from "../errors";
import { keyPathSighash, Prevout, scriptPathSighash } from "../signing/sighash";
import { parseSignature, TaprootSignature } from "../signing/signer";

const ANNEX_TAG = 0x50;
const CONTROL_BASE_SIZE = 33;
const CONTROL_NODE_SIZE = 32;
const CONTROL_MAX_NODES = 128;

// BIP68 / BIP112
const SEQUENCE_DISABLE_FLAG = 0x80000000;
const SEQUENCE_TYPE_FLAG = 0x00400000;
const SEQUENCE_MASK = 0x0000ffff;

const fail = (reason: string) => ErrVerification(reason);

function outputKeyOf(prevout: Prevout): Bytes {
    const { script } = prevout;
    if (script.length !== 34 || script[0] !== 0x51 || script[1] !== 0x20) {
        throw fail("prevout is not a P2TR output");
    }
    return script.subarray(2);
}

function checkSignature(
    sigBytes: Bytes,
    pubkey: Bytes,
    digest: () => Bytes
): boolean {
    let sig: TaprootSignature;
    try {
        sig = parseSignature(sigBytes);
    } catch (error) {
        throw fail(`malformed signature (${sigBytes.length} bytes)`);
    }
    if (sig.sighashType !== SigHash.ALL) {
        throw fail("only SIGHASH_ALL signatures are accepted");
    }
    return schnorr.verify(sig.signature, digest(), pubkey);
}

function tapBranch(a: Bytes, b: Bytes): Bytes {
    return compareBytes(a, b) < 0
        ? schnorr.utils.taggedHash("TapBranch", a, b)
        : schnorr.utils.taggedHash("TapBranch", b, a);
}

/**
 * Tweaks an x-only internal key with a merkle root, returning the x-only
 * output key and its parity.
 */
function tweakPublicKey(internalKey: Bytes, merkleRoot: Bytes): [Bytes, number] {
    try {
        return taprootTweakPubkey(internalKey, merkleRoot);
    } catch (error) {
        throw fail(
            `invalid internal key: ${error instanceof Error ? error.message : String(error)}`
        );
    }
}

function castToBool(value: Bytes): boolean {
    for (let i = 0; i < value.length; i++) {
        if (value[i] !== 0) {
            // negative zero
            return !(i === value.length - 1 && value[i] === 0x80);
        }
    }
    return false;
}

function encodeNum(value: bigint): Bytes {
    return ScriptNum().encode(value);
}

function decodeNum(value: Bytes, maxLength = 4): bigint {
    try {
        return ScriptNum(maxLength).decode(value);
    } catch (error) {
        throw fail("invalid script number");
    }
}

function checkSequence(tx: Transaction, index: number, required: bigint): void {
    if (required < 0n) throw fail("negative CHECKSEQUENCEVERIFY argument");
    const lock = Number(required & 0xffffffffn);
    if ((lock & SEQUENCE_DISABLE_FLAG) !== 0) return;

    if (tx.version < 2) throw fail("CHECKSEQUENCEVERIFY needs version 2");
    const sequence = tx.getInput(index).sequence ?? 0xffffffff;
    if ((sequence & SEQUENCE_DISABLE_FLAG) !== 0) {
        throw fail("input sequence has relative locktime disabled");
    }
    if ((sequence & SEQUENCE_TYPE_FLAG) !== (lock & SEQUENCE_TYPE_FLAG)) {
        throw fail("relative locktime type mismatch");
    }
    if ((sequence & SEQUENCE_MASK) < (lock & SEQUENCE_MASK)) {
        throw fail(
            `relative locktime not reached: ${sequence & SEQUENCE_MASK} < ${lock & SEQUENCE_MASK}`
        );
    }
}

function executeTapscript(
    script: Bytes,
    witnessStack: Bytes[],
    tx: Transaction,
    index: number,
    prevouts: Prevout[],
    leafHash: Bytes
): void {
    let ops: ScriptType;
    try {
        ops = Script.decode(script);
    } catch (error) {
        throw fail("undecodable tapscript");
    }

    let digest: Bytes | undefined;
    const sighash = (): Bytes => {
        if (!digest) digest = scriptPathSighash(tx, index, prevouts, leafHash);
        return digest;
    };

    const stack = [...witnessStack];
    const pop = (): Bytes => {
        const top = stack.pop();
        if (top === undefined) throw fail("stack underflow");
        return top;
    };
    // BIP342 signature opcode semantics: empty signature is false, an invalid
    // non-empty signature aborts the script.
    const sigOp = (sig: Bytes, pubkey: Bytes): boolean => {
        if (pubkey.length === 0) throw fail("empty public key");
        if (sig.length === 0) return false;
        if (pubkey.length !== 32) return true; // unknown key type
        if (!checkSignature(sig, pubkey, sighash)) {
            throw fail("signature verification failed");
        }
        return true;
    };

    for (const op of ops) {
        if (op instanceof Uint8Array) {
            stack.push(op);
            continue;
        }
        if (typeof op === "number") {
            stack.push(encodeNum(BigInt(op)));
            continue;
        }
        switch (op) {
            case "CHECKSIG": {
                const pubkey = pop();
                const ok = sigOp(pop(), pubkey);
                stack.push(ok ? encodeNum(1n) : new Uint8Array(0));
                break;
            }
            case "CHECKSIGVERIFY": {
                const pubkey = pop();
                if (!sigOp(pop(), pubkey)) {
                    throw fail("CHECKSIGVERIFY failed");
                }
                break;
            }
            case "CHECKSIGADD": {
                const pubkey = pop();
                const n = decodeNum(pop());
                const ok = sigOp(pop(), pubkey);
                stack.push(encodeNum(ok ? n + 1n : n));
                break;
            }
            case "NUMEQUAL": {
                const b = decodeNum(pop());
                const a = decodeNum(pop());
                stack.push(encodeNum(a === b ? 1n : 0n));
                break;
            }
            case "NUMEQUALVERIFY": {
                const b = decodeNum(pop());
                const a = decodeNum(pop());
                if (a !== b) throw fail("NUMEQUALVERIFY failed");
                break;
            }
            case "CHECKSEQUENCEVERIFY": {
                const top = stack[stack.length - 1];
                if (top === undefined) throw fail("stack underflow");
                checkSequence(tx, index, decodeNum(top, 5));
                break;
            }
            case "DROP":
                pop();
                break;
            case "VERIFY":
                if (!castToBool(pop())) throw fail("VERIFY failed");
                break;
            default:
                throw fail(`unsupported opcode ${op}`);
        }
    }

    if (stack.length !== 1) {
        throw fail(`stack must end with one element, got ${stack.length}`);
    }
    if (!castToBool(stack[0])) throw fail("script evaluated to false");
}

/**
 * Checks a P2TR input's witness against the output it spends, under the
 * BIP341/342 rules for the scripts this library builds: key path spends,
 * and script path spends of multisig, CHECKSIGADD and CSV leaves.
 *
 * @throws {EscrowError} VerificationFailed with the reason when the spend is invalid
 * @throws {EscrowError} InputIndexOutOfRange
 * @example
 * ```typescript
 * verifyTaprootInput(signedTx, 0, [{ script: escrow.pkScript, amount: 100_000n }]);
 * ```
 */
export function verifyTaprootInput(
    tx: Transaction,
    index: number,
    prevouts: Prevout[]
): void {
    if (!Number.isSafeInteger(index) || index < 0 || index >= tx.inputsLength) {
        throw ErrInputIndexOutOfRange(index, tx.inputsLength);
    }
    if (prevouts.length !== tx.inputsLength) {
        throw fail(
            `expected ${tx.inputsLength} prevouts, got ${prevouts.length}`
        );
    }
    const outputKey = outputKeyOf(prevouts[index]);

    const witness = tx.getInput(index).finalScriptWitness;
    if (!witness || witness.length === 0) throw fail("missing witness");
    const last = witness[witness.length - 1];
    if (witness.length >= 2 && last.length > 0 && last[0] === ANNEX_TAG) {
        throw fail("annex is not supported");
    }

    try {
        if (witness.length === 1) {
            const ok = checkSignature(last, outputKey, () =>
                keyPathSighash(tx, index, prevouts)
            );
            if (!ok) throw fail("key path signature verification failed");
            return;
        }

        const controlBlock = last;
        const script = witness[witness.length - 2];
        const nodes = controlBlock.length - CONTROL_BASE_SIZE;
        if (
            nodes < 0 ||
            nodes % CONTROL_NODE_SIZE !== 0 ||
            nodes / CONTROL_NODE_SIZE > CONTROL_MAX_NODES
        ) {
            throw fail(`invalid control block length ${controlBlock.length}`);
        }
        const leafVersion = controlBlock[0] & 0xfe;
        if (leafVersion !== TAP_LEAF_VERSION) {
            throw fail(`unsupported leaf version ${leafVersion}`);
        }
        const parity = controlBlock[0] & 1;
        const internalKey = controlBlock.subarray(1, CONTROL_BASE_SIZE);

        const leafHash = tapLeafHash(script, leafVersion);
        let root = leafHash;
        for (let i = CONTROL_BASE_SIZE; i < controlBlock.length; i += CONTROL_NODE_SIZE) {
            root = tapBranch(root, controlBlock.subarray(i, i + CONTROL_NODE_SIZE));
        }

        const [tweaked, tweakedParity] = tweakPublicKey(internalKey, root);
        if (!equalBytes(tweaked, outputKey) || tweakedParity !== parity) {
            throw fail("control block does not commit to the output key");
        }

        executeTapscript(
            script,
            witness.slice(0, -2),
            tx,
            index,
            prevouts,
            leafHash
        );
    } catch (error) {
        if (error instanceof EscrowError) {
            if (error.kind === "VerificationFailed") throw error;
            throw fail(error.message);
        }
        throw error;
    }
}
