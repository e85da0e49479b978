import { NETWORK, TEST_NETWORK } from "@scure/btc-signer";
import { EscrowError } from "./errors";

export type NetworkName = "mainnet" | "testnet" | "signet" | "mutinynet";

/**
 * Human-facing network tags, as exchanged with the escrow front end.
 * Mutinynet is a custom signet and shares its address parameters.
 */
export type NetworkTag = "Mainnet" | "Testnet" | "Signet" | "Mutinynet";

export interface Network {
    bech32: string;
    pubKeyHash: number;
    scriptHash: number;
    wif: number;
}

export const networks: Record<NetworkName, Network> = {
    mainnet: { ...NETWORK },
    testnet: { ...TEST_NETWORK },
    signet: { ...TEST_NETWORK },
    mutinynet: { ...TEST_NETWORK },
};

const TAGS: Record<NetworkTag, NetworkName> = {
    Mainnet: "mainnet",
    Testnet: "testnet",
    Signet: "signet",
    Mutinynet: "mutinynet",
};

function isNetworkTag(tag: string): tag is NetworkTag {
    return Object.prototype.hasOwnProperty.call(TAGS, tag);
}

export const getNetwork = (network: NetworkName): Network => {
    return networks[network];
};

/**
 * parseNetwork maps a network tag to its network name.
 *
 * @throws {EscrowError} UnsupportedNetwork for any other tag
 * @example
 * ```typescript
 * const network = getNetwork(parseNetwork("Mutinynet"));
 * ```
 */
export function parseNetwork(tag: string): NetworkName {
    if (!isNetworkTag(tag)) {
        throw new EscrowError("UnsupportedNetwork", `invalid network: ${tag}`);
    }
    return TAGS[tag];
}
