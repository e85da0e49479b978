import { SingleKey } from "./identity/singleKey";
import type { Identity } from "./identity";
import { NostrKeys } from "./nostr/keys";
import {
    EscrowError,
    isEscrowError,
    ErrWrongNpubPrefix,
    ErrWrongNsecPrefix,
    ErrMissingArbitrator,
    ErrMissingTimelock,
    ErrSameParticipants,
    ErrUnsupportedSighash,
} from "./errors";
import type { EscrowErrorKind } from "./errors";
import { networks, getNetwork, parseNetwork } from "./networks";
import type { Network, NetworkName, NetworkTag } from "./networks";
import {
    TaprootTree,
    deriveSpendInfo,
    keyPathOutput,
    keyPathAddress,
    scriptFromTapLeafScript,
} from "./script/base";
import type { TapLeafScript, KeyPathOutput } from "./script/base";
import {
    TapscriptType,
    MultisigTapscript,
    CSVMultisigTapscript,
    decodeTapscript,
} from "./script/tapscript";
import type {
    RelativeTimelock,
    EscrowTapscript,
    AnyTapscript,
} from "./script/tapscript";
import {
    Escrow,
    EscrowScriptType,
    buildEscrowScript,
    sortParticipants,
    escrowSpendInfo,
    escrowAddress,
} from "./script/escrow";
import { verifyTaprootInput } from "./script/verify";
import { keyPathSighash, scriptPathSighash } from "./signing/sighash";
import type { Prevout } from "./signing/sighash";
import {
    signKeyPath,
    signScriptPath,
    serializeSignature,
    parseSignature,
} from "./signing/signer";
import type { TaprootSignature } from "./signing/signer";
import {
    assembleKeyPath,
    assembleScriptPath,
    withWitness,
} from "./signing/witness";
import type { Witness } from "./signing/witness";
import {
    signResolutionTx,
    signEscrowTx,
    combineSignatures,
} from "./escrow/sign";
import { npubToAddress } from "./escrow/address";
import {
    BLOCKS_PER_DAY,
    BLOCKS_PER_HOUR,
    daysToBlocks,
    hoursToBlocks,
    daysHoursToBlocks,
    blocksToRelativeTimelock,
} from "./utils/timelock";

export {
    // Keys
    SingleKey,
    NostrKeys,
    npubToAddress,

    // Errors
    EscrowError,
    isEscrowError,
    ErrWrongNpubPrefix,
    ErrWrongNsecPrefix,
    ErrMissingArbitrator,
    ErrMissingTimelock,
    ErrSameParticipants,
    ErrUnsupportedSighash,

    // Networks
    networks,
    getNetwork,
    parseNetwork,

    // Script related
    TaprootTree,
    deriveSpendInfo,
    keyPathOutput,
    keyPathAddress,
    scriptFromTapLeafScript,
    TapscriptType,
    MultisigTapscript,
    CSVMultisigTapscript,
    decodeTapscript,
    Escrow,
    EscrowScriptType,
    buildEscrowScript,
    sortParticipants,
    escrowSpendInfo,
    escrowAddress,
    verifyTaprootInput,

    // Signing
    keyPathSighash,
    scriptPathSighash,
    signKeyPath,
    signScriptPath,
    serializeSignature,
    parseSignature,
    assembleKeyPath,
    assembleScriptPath,
    withWitness,
    signResolutionTx,
    signEscrowTx,
    combineSignatures,

    // Timelocks
    BLOCKS_PER_DAY,
    BLOCKS_PER_HOUR,
    daysToBlocks,
    hoursToBlocks,
    daysHoursToBlocks,
    blocksToRelativeTimelock,
};

export type {
    Identity,
    EscrowErrorKind,
    Network,
    NetworkName,
    NetworkTag,
    TapLeafScript,
    KeyPathOutput,
    RelativeTimelock,
    EscrowTapscript,
    AnyTapscript,
    Prevout,
    TaprootSignature,
    Witness,
};
