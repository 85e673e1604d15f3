import { isAddressEqual, parseEventLogs, toHex, type Hex, type Log } from "viem";

import { EVENTS_ABI } from "./abi";
import {
  CREATED_EVENT,
  DELETED_EVENT,
  ENTITY_KEY_BYTES,
  EXTENDED_EVENT,
  STORAGE_ADDRESS,
  UPDATED_EVENT,
} from "./constants";
import type { EntityKey, TransactionReceipt } from "./types";

export const entityKeyFromUint = (value: bigint): EntityKey =>
  toHex(value, { size: ENTITY_KEY_BYTES });

export function toReceipt(
  txHash: Hex,
  blockNumber: bigint | null,
  logs: readonly Log[],
): TransactionReceipt {
  const receipt: TransactionReceipt = {
    txHash,
    blockNumber,
    creates: [],
    updates: [],
    extensions: [],
    deletes: [],
  };

  const storageLogs = logs.filter((log) =>
    isAddressEqual(log.address, STORAGE_ADDRESS),
  );
  const events = parseEventLogs({ abi: EVENTS_ABI, logs: storageLogs });

  for (const event of events) {
    switch (event.eventName) {
      case CREATED_EVENT:
        receipt.creates.push({
          entityKey: entityKeyFromUint(event.args.entityKey),
          expirationBlock: event.args.expirationBlock,
        });
        break;
      case UPDATED_EVENT:
        receipt.updates.push({
          entityKey: entityKeyFromUint(event.args.entityKey),
          expirationBlock: event.args.expirationBlock,
        });
        break;
      case DELETED_EVENT:
        receipt.deletes.push({
          entityKey: entityKeyFromUint(event.args.entityKey),
        });
        break;
      case EXTENDED_EVENT:
        receipt.extensions.push({
          entityKey: entityKeyFromUint(event.args.entityKey),
          oldExpirationBlock: event.args.oldExpirationBlock,
          newExpirationBlock: event.args.newExpirationBlock,
        });
        break;
    }
  }
  return receipt;
}
