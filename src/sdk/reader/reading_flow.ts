import {assertEntityKey, mergeAnnotations, type EntityKey} from "../../contract";
import {EntityNotFoundError} from "../../errors";
import type {Entity} from "../types";
import {READ_SPEED_PROFILES, resolveReadSpeed} from "../utils/read_speed";
import {isEntityNotFound, type RpcClient} from "../utils/rpc_client";
import {mapWithConcurrency} from "../utils/throttle";

export async function readEntity(
    rpc: RpcClient,
    entityKey: EntityKey,
): Promise<Entity> {
    const key = assertEntityKey(entityKey);
    try {
        const [metadata, payload] = await Promise.all([
            rpc.getEntityMetadata(key),
            rpc.getStorageValue(key),
        ]);
        return {
            entityKey: key,
            payload,
            annotations: mergeAnnotations(
                metadata.stringAnnotations,
                metadata.numericAnnotations,
            ),
            metadata,
        };
    } catch (error) {
        if (isEntityNotFound(error) && !(error instanceof EntityNotFoundError)) {
            throw new EntityNotFoundError(key, {cause: error});
        }
        throw error;
    }
}

export async function entityExists(
    rpc: RpcClient,
    entityKey: EntityKey,
): Promise<boolean> {
    try {
        await rpc.getEntityMetadata(entityKey);
        return true;
    } catch (error) {
        if (isEntityNotFound(error)) {
            return false;
        }
        throw error;
    }
}

export async function readEntities(
    rpc: RpcClient,
    entityKeys: readonly EntityKey[],
    options: { speed?: string } = {},
): Promise<Entity[]> {
    const keys = entityKeys.map(assertEntityKey);
    return mapWithConcurrency(
        keys,
        READ_SPEED_PROFILES[resolveReadSpeed(options.speed)],
        (key) => readEntity(rpc, key),
    );
}
