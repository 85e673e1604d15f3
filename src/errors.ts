import type {Hex} from "viem";

export class ArkivError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ArkivError";
    }
}

export class AccountNameError extends ArkivError {
    constructor(message = "Account name must be a non-empty string.") {
        super(message);
        this.name = "AccountNameError";
    }
}

export class NamedAccountNotFoundError extends ArkivError {
    readonly accountName: string;

    constructor(accountName: string) {
        super(`Named account not found: ${accountName}`);
        this.name = "NamedAccountNotFoundError";
        this.accountName = accountName;
    }
}

export class EntityNotFoundError extends ArkivError {
    readonly entityKey: Hex;

    constructor(entityKey: Hex, options?: { cause?: unknown }) {
        super(`entity not found: ${entityKey}`, options);
        this.name = "EntityNotFoundError";
        this.entityKey = entityKey;
    }
}

export class TransactionFailedError extends ArkivError {
    readonly txHash: Hex;

    constructor(txHash: Hex, status: string) {
        super(`transaction ${txHash} failed with status ${status}`);
        this.name = "TransactionFailedError";
        this.txHash = txHash;
    }
}

export class KeystoreError extends ArkivError {
    constructor(message: string) {
        super(message);
        this.name = "KeystoreError";
    }
}
