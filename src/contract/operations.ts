import {
  bytesToHex,
  isHex,
  numberToHex,
  size,
  stringToHex,
  toRlp,
  type Hex,
} from "viem";

import { ArkivError } from "../errors";
import { createAnnotation, splitAnnotations } from "./annotations";
import { ENTITY_KEY_BYTES, STORAGE_ADDRESS } from "./constants";
import type {
  Annotation,
  Annotations,
  CreateOp,
  DeleteOp,
  EntityKey,
  ExtendOp,
  Operations,
  StorageTxRequest,
  TxParams,
  UpdateOp,
} from "./types";

type RlpItem = Hex | RlpItem[];

export type EntityInput = {
  payload?: Uint8Array;
  annotations?: Annotations;
  btl?: number;
};

export const assertEntityKey = (entityKey: string): EntityKey => {
  if (!isHex(entityKey, { strict: true }) || size(entityKey) !== ENTITY_KEY_BYTES) {
    throw new ArkivError(`invalid entity key: ${entityKey}`);
  }
  return entityKey;
};

const assertBlockCount = (label: string, value: number) => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ArkivError(`${label} must be a non-negative integer, got: ${value}`);
  }
  return value;
};

export const toCreateOperation = ({
  payload,
  annotations,
  btl = 0,
}: EntityInput = {}): CreateOp => {
  const [stringAnnotations, numericAnnotations] = splitAnnotations(annotations);
  return {
    data: payload ?? new Uint8Array(),
    btl: assertBlockCount("btl", btl),
    stringAnnotations,
    numericAnnotations,
  };
};

export const toUpdateOperation = (
  entityKey: EntityKey,
  input: EntityInput = {},
): UpdateOp => ({
  entityKey: assertEntityKey(entityKey),
  ...toCreateOperation(input),
});

export const toDeleteOperation = (entityKey: EntityKey): DeleteOp => ({
  entityKey: assertEntityKey(entityKey),
});

export const toExtendOperation = (
  entityKey: EntityKey,
  numberOfBlocks: number,
): ExtendOp => ({
  entityKey: assertEntityKey(entityKey),
  numberOfBlocks: assertBlockCount("numberOfBlocks", numberOfBlocks),
});

const checkCreate = (op: CreateOp): CreateOp => ({
  data: op.data,
  btl: assertBlockCount("btl", op.btl),
  stringAnnotations: op.stringAnnotations.map(({ key, value }) =>
    createAnnotation(key, value),
  ),
  numericAnnotations: op.numericAnnotations.map(({ key, value }) =>
    createAnnotation(key, value),
  ),
});

// Hand-built ops get the same checks as the builders above.
export const createOperations = ({
  creates = [],
  updates = [],
  deletes = [],
  extensions = [],
}: Partial<Operations>): Operations => {
  if (
    creates.length === 0 &&
    updates.length === 0 &&
    deletes.length === 0 &&
    extensions.length === 0
  ) {
    throw new ArkivError("At least one operation must be provided");
  }
  return {
    creates: creates.map(checkCreate),
    updates: updates.map((op) => ({
      entityKey: assertEntityKey(op.entityKey),
      ...checkCreate(op),
    })),
    deletes: deletes.map((op) => toDeleteOperation(op.entityKey)),
    extensions: extensions.map((op) =>
      toExtendOperation(op.entityKey, op.numberOfBlocks),
    ),
  };
};

// RLP integers are minimal big-endian; zero is the empty string.
const encodeUint = (value: number | bigint): Hex =>
  BigInt(value) === 0n ? "0x" : numberToHex(value);

const encodeAnnotation = ({ key, value }: Annotation): RlpItem => [
  stringToHex(key),
  typeof value === "string" ? stringToHex(value) : encodeUint(value),
];

const encodeCreate = (op: CreateOp): RlpItem => [
  encodeUint(op.btl),
  bytesToHex(op.data),
  op.stringAnnotations.map(encodeAnnotation),
  op.numericAnnotations.map(encodeAnnotation),
];

const encodeUpdate = (op: UpdateOp): RlpItem => [
  op.entityKey,
  encodeUint(op.btl),
  bytesToHex(op.data),
  op.stringAnnotations.map(encodeAnnotation),
  op.numericAnnotations.map(encodeAnnotation),
];

export const rlpEncodeOperations = (operations: Operations): Hex =>
  toRlp([
    operations.creates.map(encodeCreate),
    operations.updates.map(encodeUpdate),
    operations.deletes.map((op) => [op.entityKey]),
    operations.extensions.map((op) => [
      op.entityKey,
      encodeUint(op.numberOfBlocks),
    ]),
  ]);

export const toTxParams = (
  operations: Operations,
  txParams: TxParams = {},
): StorageTxRequest => ({
  ...txParams,
  to: STORAGE_ADDRESS,
  value: 0n,
  data: rlpEncodeOperations(operations),
});
