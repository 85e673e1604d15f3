import {readFileSync} from "node:fs";
import {bytesToHex, hexToBytes, isHex, type Address, type Hex} from "viem";
import {
    generatePrivateKey,
    mnemonicToAccount,
    privateKeyToAccount,
    type PrivateKeyAccount,
} from "viem/accounts";

import {AccountNameError, ArkivError} from "../../errors";
import {decryptKeystore, encryptKeystore, type KeystoreOptions} from "./keystore";

export type HdPath = `m/44'/60'/${string}`;

export const ETHEREUM_DEFAULT_PATH: HdPath = "m/44'/60'/0'/0/0";

const checkAndTrim = (name: string) => {
    const trimmed = typeof name === "string" ? name.trim() : "";
    if (trimmed.length === 0) {
        throw new AccountNameError();
    }
    return trimmed;
};

const normalizePrivateKey = (privateKey: string | Uint8Array): Hex => {
    if (privateKey instanceof Uint8Array) {
        return bytesToHex(privateKey);
    }
    const prefixed = privateKey.startsWith("0x") ? privateKey : `0x${privateKey}`;
    if (!isHex(prefixed)) {
        throw new ArkivError("private key must be hex");
    }
    return prefixed;
};

/**
 * A local signing key with a human-readable name, so several accounts can
 * be registered on one client and switched between by name.
 */
export class NamedAccount {
    readonly name: string;
    readonly account: PrivateKeyAccount;
    private readonly privateKey: Hex;

    constructor(name: string, privateKey: string | Uint8Array) {
        this.name = checkAndTrim(name);
        this.privateKey = normalizePrivateKey(privateKey);
        this.account = privateKeyToAccount(this.privateKey);
    }

    get address(): Address {
        return this.account.address;
    }

    get key(): Hex {
        return this.privateKey;
    }

    toString(): string {
        return `${this.name} (${this.address})`;
    }

    static create(name: string): NamedAccount {
        return new NamedAccount(name, generatePrivateKey());
    }

    static fromPrivateKey(name: string, privateKey: string | Uint8Array): NamedAccount {
        return new NamedAccount(name, privateKey);
    }

    static fromMnemonic(
        name: string,
        mnemonic: string,
        options: { passphrase?: string; path?: HdPath } = {},
    ): NamedAccount {
        const hdAccount = mnemonicToAccount(mnemonic, {
            passphrase: options.passphrase,
            path: options.path ?? ETHEREUM_DEFAULT_PATH,
        });
        const privateKey = hdAccount.getHdKey().privateKey;
        if (!privateKey) {
            throw new ArkivError("mnemonic did not yield a private key");
        }
        return new NamedAccount(name, privateKey);
    }

    static fromWallet(name: string, walletJson: string, password: string): NamedAccount {
        return new NamedAccount(name, decryptKeystore(walletJson, password));
    }

    static fromWalletFile(name: string, path: string, password: string): NamedAccount {
        return NamedAccount.fromWallet(name, readFileSync(path, "utf8"), password);
    }

    exportWallet(password: string, options: KeystoreOptions = {}): string {
        const keystore = encryptKeystore(
            hexToBytes(this.privateKey),
            this.address,
            password,
            options,
        );
        return JSON.stringify(keystore);
    }
}
