import type { Address, Hex } from "viem";

export type EntityKey = Hex;

// Numbers must be non-negative integers.
export type AnnotationValue = string | number;

export type Annotation<T extends AnnotationValue = AnnotationValue> = {
  key: string;
  value: T;
};

export type StringAnnotation = Annotation<string>;
export type NumericAnnotation = Annotation<number>;

export type Annotations = Record<string, AnnotationValue>;

export type CreateOp = {
  data: Uint8Array;
  btl: number;
  stringAnnotations: StringAnnotation[];
  numericAnnotations: NumericAnnotation[];
};

export type UpdateOp = CreateOp & {
  entityKey: EntityKey;
};

export type DeleteOp = {
  entityKey: EntityKey;
};

export type ExtendOp = {
  entityKey: EntityKey;
  numberOfBlocks: number;
};

export type Operations = {
  creates: CreateOp[];
  updates: UpdateOp[];
  deletes: DeleteOp[];
  extensions: ExtendOp[];
};

export type CreateReceipt = {
  entityKey: EntityKey;
  expirationBlock: bigint;
};

export type UpdateReceipt = {
  entityKey: EntityKey;
  expirationBlock: bigint;
};

export type ExtendReceipt = {
  entityKey: EntityKey;
  oldExpirationBlock: bigint;
  newExpirationBlock: bigint;
};

export type DeleteReceipt = {
  entityKey: EntityKey;
};

export type TransactionReceipt = {
  txHash: Hex;
  blockNumber: bigint | null;
  creates: CreateReceipt[];
  updates: UpdateReceipt[];
  extensions: ExtendReceipt[];
  deletes: DeleteReceipt[];
};

/** Fields of a write tx the caller may set; to/value/data belong to the SDK. */
export type TxParams = {
  gas?: bigint;
  nonce?: number;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
};

export type StorageTxRequest = TxParams & {
  to: Address;
  value: bigint;
  data: Hex;
};
