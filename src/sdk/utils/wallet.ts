import {
    createWalletClient,
    publicActions,
    type Chain,
    type Transport,
} from "viem";

export const createWriteClient = (
    transport: Transport,
    chain?: Chain,
    pollingInterval?: number,
) =>
    createWalletClient({transport, chain, pollingInterval}).extend(publicActions);

export type WriteClient = ReturnType<typeof createWriteClient>;
