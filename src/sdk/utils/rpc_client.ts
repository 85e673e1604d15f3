import {
    createClient,
    getAddress,
    RpcError,
    RpcRequestError,
    rpcSchema,
    type Address,
    type Chain,
    type Hex,
    type Transport,
} from "viem";

import {
    assertEntityKey,
    RPC_GET_ALL_ENTITY_KEYS,
    RPC_GET_ENTITIES_OF_OWNER,
    RPC_GET_ENTITIES_TO_EXPIRE_AT_BLOCK,
    RPC_GET_ENTITY_COUNT,
    RPC_GET_ENTITY_METADATA,
    RPC_GET_STORAGE_VALUE,
    RPC_QUERY_ENTITIES,
    type ArkivRpcSchema,
    type EntityKey,
    type RpcEntityMetadata,
} from "../../contract";
import {ArkivError, EntityNotFoundError} from "../../errors";
import type {EntityMetadata, QueryResult} from "../types";
import {getTransport} from "./connection_helper";

const NOT_FOUND = /not found/i;

const buildClient = (transport: Transport, chain?: Chain) =>
    createClient({transport, chain, rpcSchema: rpcSchema<ArkivRpcSchema>()});

type StorageRpc = ReturnType<typeof buildClient>;

export const decodePayload = (value: string | null | undefined): Uint8Array =>
    value ? Uint8Array.from(Buffer.from(value, "base64")) : new Uint8Array();

/**
 * True when the node answered that the entity does not exist. Only JSON-RPC
 * error replies count; an HTTP 404 from the endpoint is not an answer.
 */
export const isEntityNotFound = (error: unknown): boolean => {
    if (error instanceof EntityNotFoundError) {
        return true;
    }
    if (error instanceof RpcError || error instanceof RpcRequestError) {
        return NOT_FOUND.test(error.details);
    }
    return false;
};

const MAX_BLOCK = BigInt(Number.MAX_SAFE_INTEGER);

// The node takes block numbers as JSON numbers.
export const toBlockParam = (blockNumber: bigint | number): number => {
    const value =
        typeof blockNumber === "bigint"
            ? blockNumber
            : Number.isSafeInteger(blockNumber)
              ? BigInt(blockNumber)
              : -1n;
    if (value < 0n || value > MAX_BLOCK) {
        throw new ArkivError(
            `block number must be a non-negative safe integer, got: ${blockNumber}`,
        );
    }
    return Number(value);
};

export const toEntityMetadata = (
    entityKey: EntityKey,
    raw: RpcEntityMetadata,
): EntityMetadata => ({
    entityKey,
    owner: getAddress(raw.owner),
    expiresAtBlock: BigInt(raw.expiresAtBlock),
    stringAnnotations: (raw.stringAnnotations ?? []).map(({key, value}) => ({key, value})),
    numericAnnotations: (raw.numericAnnotations ?? []).map(({key, value}) => ({key, value})),
});

/** Node-specific storage reads (`golembase_*`) over the same transport as the viem client. */
export class RpcClient {
    private readonly client: StorageRpc;

    constructor(options: { transport?: Transport; chain?: Chain } = {}) {
        this.client = buildClient(options.transport ?? getTransport(), options.chain);
    }

    async getStorageValue(entityKey: EntityKey): Promise<Uint8Array> {
        const value = await this.client.request({
            method: RPC_GET_STORAGE_VALUE,
            params: [assertEntityKey(entityKey)],
        });
        return decodePayload(value);
    }

    async getEntityMetadata(entityKey: EntityKey): Promise<EntityMetadata> {
        const key = assertEntityKey(entityKey);
        const raw = await this.client.request({
            method: RPC_GET_ENTITY_METADATA,
            params: [key],
        });
        if (!raw) {
            throw new EntityNotFoundError(key);
        }
        return toEntityMetadata(key, raw);
    }

    async getEntityCount(): Promise<number> {
        return this.client.request({method: RPC_GET_ENTITY_COUNT});
    }

    async getAllEntityKeys(): Promise<Hex[]> {
        return (await this.client.request({method: RPC_GET_ALL_ENTITY_KEYS})) ?? [];
    }

    async getEntitiesOfOwner(owner: Address): Promise<Hex[]> {
        const keys = await this.client.request({
            method: RPC_GET_ENTITIES_OF_OWNER,
            params: [getAddress(owner)],
        });
        return keys ?? [];
    }

    async getEntitiesToExpireAtBlock(blockNumber: bigint | number): Promise<Hex[]> {
        const keys = await this.client.request({
            method: RPC_GET_ENTITIES_TO_EXPIRE_AT_BLOCK,
            params: [toBlockParam(blockNumber)],
        });
        return keys ?? [];
    }

    async queryEntities(query: string): Promise<QueryResult[]> {
        const rows = await this.client.request({
            method: RPC_QUERY_ENTITIES,
            params: [query],
        });
        return (rows ?? []).map((row) => ({
            entityKey: row.key,
            payload: decodePayload(row.value),
        }));
    }
}
