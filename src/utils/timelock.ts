import { EscrowError } from "../errors";
import type { RelativeTimelock } from "../script/tapscript";

// Blocks come in 10-minute intervals on average.
export const BLOCKS_PER_HOUR = 6;
export const BLOCKS_PER_DAY = 24 * BLOCKS_PER_HOUR;

// BIP68 height-based locks are limited to 16 bits.
export const MAX_RELATIVE_BLOCKS = 0xffff;

function assertCount(value: number, what: string): void {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new EscrowError(
            "InvalidParameters",
            `${what} must be a non-negative integer, got ${value}`
        );
    }
}

export function daysToBlocks(days: number): number {
    assertCount(days, "days");
    return days * BLOCKS_PER_DAY;
}

export function hoursToBlocks(hours: number): number {
    assertCount(hours, "hours");
    return hours * BLOCKS_PER_HOUR;
}

export function daysHoursToBlocks(days: number, hours: number): number {
    return daysToBlocks(days) + hoursToBlocks(hours);
}

/**
 * Wraps a block count into a CHECKSEQUENCEVERIFY timelock.
 *
 * @throws {EscrowError} InvalidParameters if blocks is 0 or above 65535
 */
export function blocksToRelativeTimelock(blocks: number): RelativeTimelock {
    assertCount(blocks, "timelock");
    if (blocks === 0 || blocks > MAX_RELATIVE_BLOCKS) {
        throw new EscrowError(
            "InvalidParameters",
            `timelock must be between 1 and ${MAX_RELATIVE_BLOCKS} blocks, got ${blocks}`
        );
    }
    return { type: "blocks", value: BigInt(blocks) };
}
