import * as contract from "./contract";
import {Arkiv, createArkivClient, type ArkivClientOptions} from "./sdk/client";
import {ArkivModule} from "./sdk/module";
import {NamedAccount, ETHEREUM_DEFAULT_PATH, type HdPath} from "./sdk/account/named_account";
import {
    decryptKeystore,
    encryptKeystore,
    parseKeystore,
    type KeystoreOptions,
    type KeystoreV3,
} from "./sdk/account/keystore";
import {
    DEFAULT_RPC_URL,
    defineArkivChain,
    detectConnectionSettings,
    getRpcUrl,
    getTransport,
    setRpcUrl,
} from "./sdk/utils/connection_helper";
import {RpcClient} from "./sdk/utils/rpc_client";

export {
    contract,
    Arkiv,
    createArkivClient,
    ArkivModule,
    NamedAccount,
    ETHEREUM_DEFAULT_PATH,
    RpcClient,
    decryptKeystore,
    encryptKeystore,
    parseKeystore,
    DEFAULT_RPC_URL,
    defineArkivChain,
    detectConnectionSettings,
    getRpcUrl,
    getTransport,
    setRpcUrl,
};
export type {ArkivClientOptions, HdPath, KeystoreOptions, KeystoreV3};

export * from "./errors";
export * from "./sdk/reader";
export * from "./sdk/writer";
export * from "./sdk/types";
export * from "./sdk/utils/logger";
export type {ReadSpeed} from "./sdk/utils/read_speed";
export type {
    Annotation,
    AnnotationValue,
    Annotations,
    CreateReceipt,
    DeleteReceipt,
    EntityInput,
    EntityKey,
    ExtendReceipt,
    NumericAnnotation,
    Operations,
    StringAnnotation,
    TransactionReceipt,
    TxParams,
    UpdateReceipt,
} from "./contract";
