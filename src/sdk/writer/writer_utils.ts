import type {Account, Address, Chain, Hex} from "viem";

import {toReceipt, toTxParams, type Operations, type TransactionReceipt, type TxParams} from "../../contract";
import {ArkivError, TransactionFailedError} from "../../errors";
import type {Logger} from "../utils/logger";
import type {WriteClient} from "../utils/wallet";

export type WriterContext = {
    client: WriteClient;
    chain: Chain | null;
    getSigner: () => Account | Address | undefined;
    logger: Logger;
};

export async function sendOperations(
    context: WriterContext,
    operations: Operations,
    txParams?: TxParams,
): Promise<TransactionReceipt> {
    const account = context.getSigner();
    if (!account) {
        throw new ArkivError("no account configured; add a named account or a default address");
    }
    const request = toTxParams(operations, txParams);
    context.logger.debug(
        `sending ${operations.creates.length} create(s), ${operations.updates.length} update(s), ` +
            `${operations.deletes.length} delete(s), ${operations.extensions.length} extension(s)`,
        {bytes: (request.data.length - 2) / 2},
    );

    const txHash: Hex = await context.client.sendTransaction({
        ...request,
        account,
        chain: context.chain,
    });
    context.logger.info(`sent storage tx ${txHash}`);

    const receipt = await context.client.waitForTransactionReceipt({hash: txHash});
    if (receipt.status !== "success") {
        throw new TransactionFailedError(txHash, receipt.status);
    }
    return toReceipt(txHash, receipt.blockNumber, receipt.logs);
}
