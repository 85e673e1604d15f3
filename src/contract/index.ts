export * from "./abi";
export * from "./annotations";
export * from "./constants";
export * from "./operations";
export * from "./receipt";
export * from "./rpc_schema";
export * from "./types";
