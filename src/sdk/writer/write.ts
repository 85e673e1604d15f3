import type {Hex} from "viem";

import {
    createOperations,
    toCreateOperation,
    toDeleteOperation,
    toExtendOperation,
    toUpdateOperation,
    type CreateReceipt,
    type DeleteReceipt,
    type EntityInput,
    type EntityKey,
    type ExtendReceipt,
    type Operations,
    type TransactionReceipt,
    type TxParams,
    type UpdateReceipt,
} from "../../contract";
import {ArkivError} from "../../errors";
import {sendOperations, type WriterContext} from "./writer_utils";

type WithTxHash<T> = T & { txHash: Hex };

const single = <T>(items: T[], label: string, txHash: Hex): T => {
    const [first] = items;
    if (!first) {
        throw new ArkivError(`${label} event missing from receipt of ${txHash}`);
    }
    return first;
};

export async function createEntity(
    context: WriterContext,
    input: EntityInput = {},
    txParams?: TxParams,
): Promise<WithTxHash<CreateReceipt>> {
    const operations = createOperations({creates: [toCreateOperation(input)]});
    const receipt = await sendOperations(context, operations, txParams);
    return {...single(receipt.creates, "create", receipt.txHash), txHash: receipt.txHash};
}

export async function updateEntity(
    context: WriterContext,
    entityKey: EntityKey,
    input: EntityInput = {},
    txParams?: TxParams,
): Promise<WithTxHash<UpdateReceipt>> {
    const operations = createOperations({
        updates: [toUpdateOperation(entityKey, input)],
    });
    const receipt = await sendOperations(context, operations, txParams);
    return {...single(receipt.updates, "update", receipt.txHash), txHash: receipt.txHash};
}

export async function deleteEntity(
    context: WriterContext,
    entityKey: EntityKey,
    txParams?: TxParams,
): Promise<WithTxHash<DeleteReceipt>> {
    const operations = createOperations({deletes: [toDeleteOperation(entityKey)]});
    const receipt = await sendOperations(context, operations, txParams);
    return {...single(receipt.deletes, "delete", receipt.txHash), txHash: receipt.txHash};
}

export async function extendEntity(
    context: WriterContext,
    entityKey: EntityKey,
    numberOfBlocks: number,
    txParams?: TxParams,
): Promise<WithTxHash<ExtendReceipt>> {
    const operations = createOperations({
        extensions: [toExtendOperation(entityKey, numberOfBlocks)],
    });
    const receipt = await sendOperations(context, operations, txParams);
    return {
        ...single(receipt.extensions, "extend", receipt.txHash),
        txHash: receipt.txHash,
    };
}

export async function executeOperations(
    context: WriterContext,
    operations: Partial<Operations>,
    txParams?: TxParams,
): Promise<TransactionReceipt> {
    return sendOperations(context, createOperations(operations), txParams);
}
