import {defineChain, http, webSocket, type Chain, type Transport} from "viem";

export const DEFAULT_RPC_URL = "http://127.0.0.1:8545";

let rpcUrlOverride: string | undefined;

const env = (key: string) => {
    const value = process.env[key];
    if (!value) {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
};

export function detectConnectionSettings(): {
    rpcUrl: string;
    wsUrl?: string;
    chainId?: number;
} {
    const wsUrl = env("WS_URL");
    const rawChainId = env("ARKIV_CHAIN_ID");
    const chainId = rawChainId ? Number(rawChainId) : undefined;
    return {
        rpcUrl: env("ARKIV_RPC_URL") ?? env("RPC_URL") ?? wsUrl ?? DEFAULT_RPC_URL,
        wsUrl,
        chainId:
            chainId !== undefined && Number.isSafeInteger(chainId) && chainId > 0
                ? chainId
                : undefined,
    };
}

export function setRpcUrl(url: string | undefined) {
    const trimmed = url?.trim();
    rpcUrlOverride = trimmed && trimmed.length > 0 ? trimmed : undefined;
}

export function getRpcUrl(): string {
    return rpcUrlOverride ?? detectConnectionSettings().rpcUrl;
}

export const isWebSocketUrl = (url: string) => /^wss?:\/\//i.test(url);

export function getTransport(url: string = getRpcUrl()): Transport {
    return isWebSocketUrl(url) ? webSocket(url) : http(url);
}

export function defineArkivChain(
    chainId: number,
    rpcUrl: string = getRpcUrl(),
): Chain {
    const urls = isWebSocketUrl(rpcUrl)
        ? {http: [], webSocket: [rpcUrl]}
        : {http: [rpcUrl]};
    return defineChain({
        id: chainId,
        name: "Arkiv",
        nativeCurrency: {name: "Ether", symbol: "ETH", decimals: 18},
        rpcUrls: {default: urls},
    });
}
