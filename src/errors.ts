export type EscrowErrorKind =
    | "InvalidEncoding"
    | "InvalidKeyMaterial"
    | "UnsupportedNetwork"
    | "MissingVariantParameter"
    | "InvalidParameters"
    | "LeafNotFound"
    | "SighashComputationError"
    | "InputIndexOutOfRange"
    | "VerificationFailed";

export class EscrowError extends Error {
    constructor(
        readonly kind: EscrowErrorKind,
        message: string
    ) {
        super(message);
        this.name = "EscrowError";
    }
}

export function isEscrowError(
    error: unknown,
    kind?: EscrowErrorKind
): error is EscrowError {
    return (
        error instanceof EscrowError && (kind === undefined || error.kind === kind)
    );
}

export const ErrWrongNpubPrefix = new EscrowError(
    "InvalidEncoding",
    "wrong prefix for npub"
);
export const ErrWrongNsecPrefix = new EscrowError(
    "InvalidEncoding",
    "wrong prefix for nsec"
);
export const ErrMissingArbitrator = new EscrowError(
    "MissingVariantParameter",
    "dispute escrow requires an arbitrator"
);
export const ErrMissingTimelock = new EscrowError(
    "MissingVariantParameter",
    "dispute escrow requires a timelock"
);
export const ErrSameParticipants = new EscrowError(
    "InvalidParameters",
    "escrow participants must be distinct keys"
);
export const ErrUnsupportedSighash = new EscrowError(
    "SighashComputationError",
    "only SIGHASH_ALL is supported"
);

export const ErrInvalidKeyLength = (what: string, length: number) =>
    new EscrowError(
        "InvalidKeyMaterial",
        `invalid ${what} length: expected 32, got ${length}`
    );
export const ErrInputIndexOutOfRange = (index: number, length: number) =>
    new EscrowError(
        "InputIndexOutOfRange",
        `input index ${index} out of range (${length} inputs)`
    );
export const ErrVerification = (reason: string) =>
    new EscrowError("VerificationFailed", reason);
