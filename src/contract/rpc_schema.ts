import type { Address, Hex } from "viem";

import type {
  RPC_GET_ALL_ENTITY_KEYS,
  RPC_GET_ENTITIES_OF_OWNER,
  RPC_GET_ENTITIES_TO_EXPIRE_AT_BLOCK,
  RPC_GET_ENTITY_COUNT,
  RPC_GET_ENTITY_METADATA,
  RPC_GET_STORAGE_VALUE,
  RPC_QUERY_ENTITIES,
} from "./constants";

export type RpcAnnotation<T> = {
  key: string;
  value: T;
};

export type RpcEntityMetadata = {
  expiresAtBlock: number;
  owner: Address;
  payload?: string;
  stringAnnotations: RpcAnnotation<string>[] | null;
  numericAnnotations: RpcAnnotation<number>[] | null;
};

// Payloads travel base64-encoded.
export type RpcQueryResult = {
  key: Hex;
  value: string;
};

export type ArkivRpcSchema = [
  {
    Method: typeof RPC_GET_STORAGE_VALUE;
    Parameters: [Hex];
    ReturnType: string;
  },
  {
    Method: typeof RPC_GET_ENTITY_METADATA;
    Parameters: [Hex];
    ReturnType: RpcEntityMetadata | null;
  },
  {
    Method: typeof RPC_GET_ENTITIES_TO_EXPIRE_AT_BLOCK;
    Parameters: [number];
    ReturnType: Hex[] | null;
  },
  {
    Method: typeof RPC_GET_ENTITY_COUNT;
    Parameters?: undefined;
    ReturnType: number;
  },
  {
    Method: typeof RPC_GET_ALL_ENTITY_KEYS;
    Parameters?: undefined;
    ReturnType: Hex[] | null;
  },
  {
    Method: typeof RPC_GET_ENTITIES_OF_OWNER;
    Parameters: [Address];
    ReturnType: Hex[] | null;
  },
  {
    Method: typeof RPC_QUERY_ENTITIES;
    Parameters: [string];
    ReturnType: RpcQueryResult[] | null;
  },
];
