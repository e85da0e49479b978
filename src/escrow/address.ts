import { NostrKeys } from "../nostr/keys";
import type { Network } from "../networks";
import { keyPathAddress } from "../script/base";

/**
 * Key path P2TR address of a Nostr public key: where a participant receives
 * funds before moving them into an escrow.
 */
export function npubToAddress(npub: string, network: Network): string {
    return keyPathAddress(NostrKeys.decodeNpub(npub), network);
}
