import type {Account, Address, Chain, Transport} from "viem";

import {NamedAccountNotFoundError} from "../errors";
import {NamedAccount} from "./account/named_account";
import {ArkivModule} from "./module";
import {
    defineArkivChain,
    detectConnectionSettings,
    getRpcUrl,
    getTransport,
} from "./utils/connection_helper";
import {createConsoleLogger, type Logger} from "./utils/logger";
import {RpcClient} from "./utils/rpc_client";
import {createWriteClient, type WriteClient} from "./utils/wallet";

export type ArkivClientOptions = {
    rpcUrl?: string;
    transport?: Transport;
    chain?: Chain;
    chainId?: number;
    account?: NamedAccount;
    privateKey?: string;
    defaultAddress?: Address;
    pollingInterval?: number;
    logger?: Logger;
};

const resolveChain = (options: ArkivClientOptions, rpcUrl: string) => {
    if (options.chain) {
        return options.chain;
    }
    const chainId = options.chainId ?? detectConnectionSettings().chainId;
    return chainId !== undefined ? defineArkivChain(chainId, rpcUrl) : undefined;
};

/**
 * viem client plus the `arkiv` entity namespace and a registry of named
 * accounts. Whatever works on the viem client works on `client.client`.
 */
export class Arkiv {
    static readonly ACCOUNT_NAME_DEFAULT = "default";

    readonly client: WriteClient;
    readonly rpc: RpcClient;
    readonly chain: Chain | undefined;
    readonly arkiv: ArkivModule;
    readonly logger: Logger;
    readonly accounts = new Map<string, NamedAccount>();

    private readonly defaultAddress: Address | undefined;
    private signerName: string | undefined;

    constructor(options: ArkivClientOptions = {}) {
        const rpcUrl = options.rpcUrl ?? getRpcUrl();
        const transport = options.transport ?? getTransport(rpcUrl);
        this.chain = resolveChain(options, rpcUrl);
        this.logger = options.logger ?? createConsoleLogger();
        this.client = createWriteClient(transport, this.chain, options.pollingInterval);
        this.rpc = new RpcClient({transport, chain: this.chain});
        this.defaultAddress = options.defaultAddress;

        const account =
            options.account ??
            (options.privateKey
                ? NamedAccount.fromPrivateKey(Arkiv.ACCOUNT_NAME_DEFAULT, options.privateKey)
                : undefined);
        if (account) {
            this.addAccount(account);
            this.switchTo(account.name);
        }

        this.arkiv = new ArkivModule(this);
    }

    get currentSigner(): string | undefined {
        return this.signerName;
    }

    /** Account used for writes: the current named account, else the node-managed default address. */
    get defaultAccount(): Account | Address | undefined {
        const current = this.signerName ? this.accounts.get(this.signerName) : undefined;
        return current ? current.account : this.defaultAddress;
    }

    addAccount(account: NamedAccount): void {
        this.accounts.set(account.name, account);
    }

    switchTo(name: string): NamedAccount {
        const account = this.accounts.get(name);
        if (!account) {
            throw new NamedAccountNotFoundError(name);
        }
        this.signerName = account.name;
        this.logger.debug(`switched signer to ${account.toString()}`);
        return account;
    }

    async isConnected(): Promise<boolean> {
        try {
            await this.client.getChainId();
            return true;
        } catch (error) {
            this.logger.debug("node is not reachable", error);
            return false;
        }
    }
}

export const createArkivClient = (options: ArkivClientOptions = {}) =>
    new Arkiv(options);
