import type { Address } from "viem";

// Precompile-style storage address; every entity write is a tx to it.
export const STORAGE_ADDRESS: Address =
  "0x0000000000000000000000000000000060138453";

export const CREATED_EVENT = "GolemBaseStorageEntityCreated";
export const UPDATED_EVENT = "GolemBaseStorageEntityUpdated";
export const DELETED_EVENT = "GolemBaseStorageEntityDeleted";
export const EXTENDED_EVENT = "GolemBaseStorageEntityBTLExtended";

export const RPC_GET_STORAGE_VALUE = "golembase_getStorageValue";
export const RPC_GET_ENTITY_METADATA = "golembase_getEntityMetaData";
export const RPC_GET_ENTITIES_TO_EXPIRE_AT_BLOCK =
  "golembase_getEntitiesToExpireAtBlock";
export const RPC_GET_ENTITY_COUNT = "golembase_getEntityCount";
export const RPC_GET_ALL_ENTITY_KEYS = "golembase_getAllEntityKeys";
export const RPC_GET_ENTITIES_OF_OWNER = "golembase_getEntitiesOfOwner";
export const RPC_QUERY_ENTITIES = "golembase_queryEntities";

export const ENTITY_KEY_BYTES = 32;
