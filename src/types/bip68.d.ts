// bip68 ships no type declarations.
declare module "bip68" {
    /** Relative lock, either a block count or seconds (in 512 s units). */
    export interface RelativeLock {
        blocks?: number;
        seconds?: number;
    }

    /** Encodes a relative lock into an nSequence value. */
    export function encode(lock: RelativeLock): number;

    /** Decodes an nSequence value; an empty object when the lock is disabled. */
    export function decode(sequence: number): RelativeLock;
}
