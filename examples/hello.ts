import {readFileSync} from "node:fs";
import {homedir} from "node:os";
import {resolve} from "node:path";

import {createArkivClient, getRpcUrl, NamedAccount, setRpcUrl} from "../src";

const RPC_URL = process.env.ARKIV_RPC_URL ?? getRpcUrl();
setRpcUrl(RPC_URL);

function expandHome(pathValue: string) {
    if (!pathValue.startsWith("~/")) {
        return pathValue;
    }
    return resolve(homedir(), pathValue.slice(2));
}

function parseWalletArg(): string | null {
    const argv = process.argv.slice(2);
    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];
        if (arg === "--wallet" || arg === "-w") {
            const next = argv[i + 1];
            if (!next || next.startsWith("-")) {
                throw new Error("Missing value for --wallet/-w");
            }
            return next;
        }
        if (arg.startsWith("--wallet=")) {
            return arg.slice("--wallet=".length);
        }
    }
    return null;
}

function loadAccountFromWallet(pathValue: string): NamedAccount {
    const resolved = expandHome(pathValue);
    const password = process.env.ARKIV_WALLET_PASSWORD ?? "";
    try {
        return NamedAccount.fromWallet("hello", readFileSync(resolved, "utf8"), password);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`Failed to load wallet from ${resolved}: ${message}`);
    }
}

function loadAccountFromEnv(): NamedAccount | null {
    const privateKey = process.env.ARKIV_PRIVATE_KEY ?? process.env.PRIVATE_KEY;
    if (privateKey) {
        return NamedAccount.fromPrivateKey("hello", privateKey);
    }
    const walletPath = process.env.ARKIV_WALLET_PATH;
    return walletPath ? loadAccountFromWallet(walletPath) : null;
}

const cliWalletPath = parseWalletArg();
const account = cliWalletPath
    ? loadAccountFromWallet(cliWalletPath)
    : loadAccountFromEnv() ?? NamedAccount.create("hello");
const client = createArkivClient({account});

async function main() {
    console.log(`Using RPC: ${RPC_URL}`);
    console.log(`Signer: ${account.toString()}`);

    if (!(await client.isConnected())) {
        throw new Error(`Node at ${RPC_URL} is not reachable`);
    }

    console.log("Creating entity...");
    const created = await client.arkiv.createEntity({
        payload: new TextEncoder().encode("hello"),
        annotations: {type: "greeting", version: 1},
        btl: 60,
    });
    console.log("tx:", created.txHash);
    console.log("entity:", created.entityKey, "expires at", created.expirationBlock);

    console.log("Reading back...");
    const entity = await client.arkiv.getEntity(created.entityKey);
    console.log("payload:", new TextDecoder().decode(entity.payload));
    console.log("annotations:", entity.annotations);

    const query = client.arkiv.buildQuery({annotations: {type: "greeting"}});
    const matches = await client.arkiv.queryEntities(query);
    console.log(`query "${query}" matched ${matches.length} entit(y/ies)`);

    console.log("Deleting...");
    const deleted = await client.arkiv.deleteEntity(created.entityKey);
    console.log("deleted:", deleted.entityKey);
}

main().catch((err) => {
    console.error(err);
    process.exit(1);
});
