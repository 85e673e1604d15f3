import type {Address} from "viem";

import type {
    Annotations,
    EntityKey,
    NumericAnnotation,
    StringAnnotation,
} from "../contract";

export type EntityMetadata = {
    entityKey: EntityKey;
    owner: Address;
    expiresAtBlock: bigint;
    stringAnnotations: StringAnnotation[];
    numericAnnotations: NumericAnnotation[];
};

export type Entity = {
    entityKey: EntityKey;
    payload: Uint8Array;
    annotations: Annotations;
    metadata: EntityMetadata;
};

export type QueryResult = {
    entityKey: EntityKey;
    payload: Uint8Array;
};
