import assert from "node:assert/strict";
import {mkdtempSync, rmSync, writeFileSync} from "node:fs";
import {tmpdir} from "node:os";
import {join} from "node:path";
import {
  english,
  generateMnemonic,
  mnemonicToAccount,
  privateKeyToAccount,
} from "viem/accounts";

import {NamedAccount} from "../../src/sdk/account/named_account";
import {decryptKeystore, parseKeystore} from "../../src/sdk/account/keystore";
import {AccountNameError, KeystoreError} from "../../src/errors";

const PRIVATE_KEY = `0x${"01".repeat(32)}` as const;
const PASSWORD = "test-secret";

// Web3 Secret Storage pbkdf2 test vector
const PBKDF2_VECTOR = {
  crypto: {
    cipher: "aes-128-ctr",
    cipherparams: {iv: "6087dab2f9fdbbfaddc31a909735c1e6"},
    ciphertext: "5318b4d5bcd28de64ee5559e671353e16f075ecae9f99c7a79a38af5f869aa46",
    kdf: "pbkdf2",
    kdfparams: {
      c: 262144,
      dklen: 32,
      prf: "hmac-sha256",
      salt: "ae3cd4e7013836a3df6bd7241b12db061dbe2c6785853cce422d148a624ce0bd",
    },
    mac: "517ead924a9d0dc3124507e3393d175ce3ff7c1e96529c6c555ce9e51205e9b2",
  },
  id: "3198bc9c-6672-5ab3-d995-4942343ae5b6",
  version: 3,
};
const PBKDF2_VECTOR_KEY =
  "0x7a28b5ba57c53603b0b07b56bba752f7784bf506fa95edc395f5cf6c7514fe9d";

async function testNamedAccount() {
  const expected = privateKeyToAccount(PRIVATE_KEY).address;

  const alice = new NamedAccount("  alice  ", PRIVATE_KEY);
  assert.equal(alice.name, "alice");
  assert.equal(alice.address, expected);
  assert.equal(alice.key, PRIVATE_KEY);
  assert.equal(alice.toString(), `alice (${expected})`);

  assert.equal(NamedAccount.fromPrivateKey("bob", "01".repeat(32)).address, expected);
  assert.equal(
    NamedAccount.fromPrivateKey("bob", new Uint8Array(32).fill(1)).key,
    PRIVATE_KEY,
  );

  assert.throws(() => NamedAccount.create("   "), AccountNameError);
  assert.throws(
    () => NamedAccount.create(""),
    /Account name must be a non-empty string\./,
  );
  assert.throws(
    () => NamedAccount.fromPrivateKey("bad", "0xnothex"),
    /private key must be hex/,
  );

  const random = NamedAccount.create("random");
  assert.match(random.address, /^0x[0-9a-fA-F]{40}$/);
  assert.notEqual(random.address, NamedAccount.create("random").address);
}

async function testMnemonic() {
  const mnemonic = generateMnemonic(english);

  const first = NamedAccount.fromMnemonic("hd", mnemonic);
  assert.equal(first.address, mnemonicToAccount(mnemonic).address);

  const second = NamedAccount.fromMnemonic("hd", mnemonic, {
    path: "m/44'/60'/0'/0/1",
  });
  assert.equal(second.address, mnemonicToAccount(mnemonic, {addressIndex: 1}).address);
  assert.notEqual(first.address, second.address);
}

async function testKeystore() {
  const account = new NamedAccount("wallet", PRIVATE_KEY);

  const scryptJson = account.exportWallet(PASSWORD, {n: 1024});
  const scryptKeystore = parseKeystore(scryptJson);
  assert.equal(scryptKeystore.version, 3);
  assert.equal(scryptKeystore.address, account.address.slice(2).toLowerCase());
  assert.equal(scryptKeystore.crypto.kdf, "scrypt");
  if (scryptKeystore.crypto.kdf === "scrypt") {
    assert.deepEqual(
      {
        n: scryptKeystore.crypto.kdfparams.n,
        r: scryptKeystore.crypto.kdfparams.r,
        p: scryptKeystore.crypto.kdfparams.p,
        dklen: scryptKeystore.crypto.kdfparams.dklen,
      },
      {n: 1024, r: 8, p: 1, dklen: 32},
    );
  }
  const restored = NamedAccount.fromWallet("restored", scryptJson, PASSWORD);
  assert.equal(restored.name, "restored");
  assert.equal(restored.key, PRIVATE_KEY);
  assert.equal(restored.address, account.address);

  const pbkdf2Json = account.exportWallet(PASSWORD, {kdf: "pbkdf2", c: 1000});
  assert.equal(parseKeystore(pbkdf2Json).crypto.kdf, "pbkdf2");
  assert.equal(NamedAccount.fromWallet("p", pbkdf2Json, PASSWORD).key, PRIVATE_KEY);

  // older tools capitalise the crypto section
  const legacyJson = pbkdf2Json.replace('"crypto":', '"Crypto":');
  assert.notEqual(legacyJson, pbkdf2Json);
  assert.deepEqual(
    Array.from(decryptKeystore(legacyJson, PASSWORD)),
    new Array<number>(32).fill(1),
  );

  assert.throws(
    () => NamedAccount.fromWallet("w", pbkdf2Json, "wrong-password"),
    KeystoreError,
  );
  assert.throws(
    () => decryptKeystore(scryptJson, "wrong-password"),
    /keystore MAC mismatch/,
  );
  assert.throws(() => parseKeystore("nope"), /keystore is not valid JSON/);
  assert.throws(
    () => parseKeystore('{"version":1}'),
    /unsupported keystore version: 1/,
  );
  assert.throws(
    () => parseKeystore('{"version":3}'),
    /keystore is missing the crypto section/,
  );
}

async function testKnownKeystore() {
  const json = JSON.stringify(PBKDF2_VECTOR);
  assert.equal(
    Buffer.from(decryptKeystore(json, "testpassword")).toString("hex"),
    PBKDF2_VECTOR_KEY.slice(2),
  );
  const account = NamedAccount.fromWallet("vector", json, "testpassword");
  assert.equal(account.key, PBKDF2_VECTOR_KEY);
  assert.equal(account.address, privateKeyToAccount(PBKDF2_VECTOR_KEY).address);
  assert.throws(() => decryptKeystore(json, PASSWORD), /keystore MAC mismatch/);
}

async function testWalletFile() {
  const dir = mkdtempSync(join(tmpdir(), "arkiv-wallet-"));
  try {
    const account = new NamedAccount("file", PRIVATE_KEY);
    const walletPath = join(dir, "wallet.json");
    writeFileSync(walletPath, account.exportWallet(PASSWORD, {kdf: "pbkdf2", c: 1000}));

    const loaded = NamedAccount.fromWalletFile("file", walletPath, PASSWORD);
    assert.equal(loaded.address, account.address);
    assert.throws(() => NamedAccount.fromWalletFile("file", join(dir, "missing.json"), PASSWORD));
  } finally {
    rmSync(dir, {recursive: true, force: true});
  }
}

async function main() {
  await testNamedAccount();
  await testMnemonic();
  await testKeystore();
  await testKnownKeystore();
  await testWalletFile();
  console.log("account test ok");
}

main().catch((error) => {
  console.error("account test failed", error);
  process.exitCode = 1;
});
