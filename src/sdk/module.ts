import type {Address, Hex} from "viem";

import type {
    CreateReceipt,
    DeleteReceipt,
    EntityInput,
    EntityKey,
    ExtendReceipt,
    Operations,
    TransactionReceipt,
    TxParams,
    UpdateReceipt,
} from "../contract";
import type {Arkiv} from "./client";
import {buildQuery, entityExists, readEntities, readEntity} from "./reader";
import type {Entity, EntityMetadata, QueryResult} from "./types";
import type {ReadSpeed} from "./utils/read_speed";
import {
    createEntity,
    deleteEntity,
    executeOperations,
    extendEntity,
    updateEntity,
    type WriterContext,
} from "./writer";

/** The `arkiv.*` namespace: entity writes and storage reads. */
export class ArkivModule {
    readonly client: Arkiv;

    constructor(client: Arkiv) {
        this.client = client;
    }

    isAvailable(): boolean {
        return true;
    }

    private get writer(): WriterContext {
        return {
            client: this.client.client,
            chain: this.client.chain ?? null,
            getSigner: () => this.client.defaultAccount,
            logger: this.client.logger,
        };
    }

    createEntity(
        input: EntityInput = {},
        txParams?: TxParams,
    ): Promise<CreateReceipt & { txHash: Hex }> {
        return createEntity(this.writer, input, txParams);
    }

    updateEntity(
        entityKey: EntityKey,
        input: EntityInput = {},
        txParams?: TxParams,
    ): Promise<UpdateReceipt & { txHash: Hex }> {
        return updateEntity(this.writer, entityKey, input, txParams);
    }

    deleteEntity(
        entityKey: EntityKey,
        txParams?: TxParams,
    ): Promise<DeleteReceipt & { txHash: Hex }> {
        return deleteEntity(this.writer, entityKey, txParams);
    }

    extendEntity(
        entityKey: EntityKey,
        numberOfBlocks: number,
        txParams?: TxParams,
    ): Promise<ExtendReceipt & { txHash: Hex }> {
        return extendEntity(this.writer, entityKey, numberOfBlocks, txParams);
    }

    execute(
        operations: Partial<Operations>,
        txParams?: TxParams,
    ): Promise<TransactionReceipt> {
        return executeOperations(this.writer, operations, txParams);
    }

    getEntity(entityKey: EntityKey): Promise<Entity> {
        return readEntity(this.client.rpc, entityKey);
    }

    getEntities(
        entityKeys: readonly EntityKey[],
        options: { speed?: ReadSpeed } = {},
    ): Promise<Entity[]> {
        return readEntities(this.client.rpc, entityKeys, options);
    }

    exists(entityKey: EntityKey): Promise<boolean> {
        return entityExists(this.client.rpc, entityKey);
    }

    getStorageValue(entityKey: EntityKey): Promise<Uint8Array> {
        return this.client.rpc.getStorageValue(entityKey);
    }

    getEntityMetadata(entityKey: EntityKey): Promise<EntityMetadata> {
        return this.client.rpc.getEntityMetadata(entityKey);
    }

    getEntityCount(): Promise<number> {
        return this.client.rpc.getEntityCount();
    }

    getAllEntityKeys(): Promise<Hex[]> {
        return this.client.rpc.getAllEntityKeys();
    }

    getEntitiesOfOwner(owner: Address): Promise<Hex[]> {
        return this.client.rpc.getEntitiesOfOwner(owner);
    }

    getEntitiesToExpireAtBlock(blockNumber: bigint | number): Promise<Hex[]> {
        return this.client.rpc.getEntitiesToExpireAtBlock(blockNumber);
    }

    queryEntities(query: string): Promise<QueryResult[]> {
        return this.client.rpc.queryEntities(query);
    }

    buildQuery(filter: Parameters<typeof buildQuery>[0]): string {
        return buildQuery(filter);
    }
}
