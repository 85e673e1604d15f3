// Web3 Secret Storage (keystore v3) for local accounts.
// Same layout as geth/eth-account wallet files: scrypt or pbkdf2 KDF,
// aes-128-ctr cipher, keccak256(derivedKey[16..32] ++ ciphertext) as MAC.

import {randomUUID, createCipheriv, createDecipheriv} from "node:crypto";
import {pbkdf2} from "@noble/hashes/pbkdf2";
import {scrypt} from "@noble/hashes/scrypt";
import {sha256} from "@noble/hashes/sha256";
import {keccak_256} from "@noble/hashes/sha3";
import {bytesToHex, concatBytes, hexToBytes, randomBytes} from "@noble/hashes/utils";

import {KeystoreError} from "../../errors";

const CIPHER = "aes-128-ctr";
const DKLEN = 32;

export type ScryptParams = {
    dklen: number;
    n: number;
    r: number;
    p: number;
    salt: string;
};

export type Pbkdf2Params = {
    dklen: number;
    c: number;
    prf: "hmac-sha256";
    salt: string;
};

export type KeystoreCrypto =
    | {
          cipher: typeof CIPHER;
          cipherparams: { iv: string };
          ciphertext: string;
          kdf: "scrypt";
          kdfparams: ScryptParams;
          mac: string;
      }
    | {
          cipher: typeof CIPHER;
          cipherparams: { iv: string };
          ciphertext: string;
          kdf: "pbkdf2";
          kdfparams: Pbkdf2Params;
          mac: string;
      };

export type KeystoreV3 = {
    version: 3;
    id: string;
    address: string;
    crypto: KeystoreCrypto;
};

export type KeystoreOptions =
    | { kdf?: "scrypt"; n?: number; r?: number; p?: number }
    | { kdf: "pbkdf2"; c?: number };

export const DEFAULT_SCRYPT = {n: 262_144, r: 8, p: 1} as const;
export const DEFAULT_PBKDF2_ITERATIONS = 262_144;

const strip0x = (value: string) =>
    value.startsWith("0x") || value.startsWith("0X") ? value.slice(2) : value;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (source: Record<string, unknown>, key: string): string => {
    const value = source[key];
    if (typeof value !== "string" || value.length === 0) {
        throw new KeystoreError(`keystore field "${key}" must be a string`);
    }
    return value;
};

const readInteger = (source: Record<string, unknown>, key: string): number => {
    const value = source[key];
    if (typeof value !== "number" || !Number.isSafeInteger(value) || value <= 0) {
        throw new KeystoreError(`keystore field "${key}" must be a positive integer`);
    }
    return value;
};

const readRecord = (
    source: Record<string, unknown>,
    key: string,
): Record<string, unknown> => {
    const value = source[key];
    if (!isRecord(value)) {
        throw new KeystoreError(`keystore field "${key}" must be an object`);
    }
    return value;
};

const readHex = (source: Record<string, unknown>, key: string): string => {
    const value = strip0x(readString(source, key));
    if (!/^([0-9a-fA-F]{2})+$/.test(value)) {
        throw new KeystoreError(`keystore field "${key}" must be hex`);
    }
    return value.toLowerCase();
};

function parseCrypto(source: Record<string, unknown>): KeystoreCrypto {
    const cipher = readString(source, "cipher");
    if (cipher !== CIPHER) {
        throw new KeystoreError(`unsupported keystore cipher: ${cipher}`);
    }
    const cipherparams = {iv: readHex(readRecord(source, "cipherparams"), "iv")};
    const ciphertext = readHex(source, "ciphertext");
    const mac = readHex(source, "mac");
    const kdf = readString(source, "kdf");
    const params = readRecord(source, "kdfparams");

    if (kdf === "scrypt") {
        return {
            cipher,
            cipherparams,
            ciphertext,
            kdf,
            kdfparams: {
                dklen: readInteger(params, "dklen"),
                n: readInteger(params, "n"),
                r: readInteger(params, "r"),
                p: readInteger(params, "p"),
                salt: readHex(params, "salt"),
            },
            mac,
        };
    }
    if (kdf === "pbkdf2") {
        const prf = readString(params, "prf");
        if (prf !== "hmac-sha256") {
            throw new KeystoreError(`unsupported pbkdf2 prf: ${prf}`);
        }
        return {
            cipher,
            cipherparams,
            ciphertext,
            kdf,
            kdfparams: {
                dklen: readInteger(params, "dklen"),
                c: readInteger(params, "c"),
                prf,
                salt: readHex(params, "salt"),
            },
            mac,
        };
    }
    throw new KeystoreError(`unsupported keystore kdf: ${kdf}`);
}

export function parseKeystore(walletJson: string): KeystoreV3 {
    let parsed: unknown;
    try {
        parsed = JSON.parse(walletJson);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new KeystoreError(`keystore is not valid JSON: ${reason}`);
    }
    if (!isRecord(parsed)) {
        throw new KeystoreError("keystore must be a JSON object");
    }
    if (parsed.version !== 3) {
        throw new KeystoreError(`unsupported keystore version: ${String(parsed.version)}`);
    }
    // geth writes "crypto", some older tools "Crypto"
    const cryptoSource = isRecord(parsed.crypto) ? parsed.crypto : parsed.Crypto;
    if (!isRecord(cryptoSource)) {
        throw new KeystoreError("keystore is missing the crypto section");
    }
    return {
        version: 3,
        id: typeof parsed.id === "string" ? parsed.id : "",
        address: typeof parsed.address === "string" ? strip0x(parsed.address).toLowerCase() : "",
        crypto: parseCrypto(cryptoSource),
    };
}

const deriveKey = (password: string, crypto: KeystoreCrypto): Uint8Array => {
    const salt = hexToBytes(crypto.kdfparams.salt);
    if (crypto.kdf === "scrypt") {
        const {n, r, p, dklen} = crypto.kdfparams;
        return scrypt(password, salt, {N: n, r, p, dkLen: dklen});
    }
    const {c, dklen} = crypto.kdfparams;
    return pbkdf2(sha256, password, salt, {c, dkLen: dklen});
};

const computeMac = (derivedKey: Uint8Array, ciphertext: Uint8Array) =>
    keccak_256(concatBytes(derivedKey.slice(16, 32), ciphertext));

const aes128Ctr = (
    mode: "encrypt" | "decrypt",
    key: Uint8Array,
    iv: Uint8Array,
    data: Uint8Array,
): Uint8Array => {
    const cipher =
        mode === "encrypt"
            ? createCipheriv(CIPHER, key, iv)
            : createDecipheriv(CIPHER, key, iv);
    return Uint8Array.from(Buffer.concat([cipher.update(data), cipher.final()]));
};

export function decryptKeystore(walletJson: string, password: string): Uint8Array {
    const keystore = parseKeystore(walletJson);
    const {crypto} = keystore;
    if (crypto.kdfparams.dklen < DKLEN) {
        throw new KeystoreError(`keystore dklen must be at least ${DKLEN}`);
    }
    const derivedKey = deriveKey(password, crypto);
    const ciphertext = hexToBytes(crypto.ciphertext);
    if (bytesToHex(computeMac(derivedKey, ciphertext)) !== crypto.mac) {
        throw new KeystoreError("keystore MAC mismatch (wrong password?)");
    }
    return aes128Ctr(
        "decrypt",
        derivedKey.slice(0, 16),
        hexToBytes(crypto.cipherparams.iv),
        ciphertext,
    );
}

export function encryptKeystore(
    privateKey: Uint8Array,
    address: string,
    password: string,
    options: KeystoreOptions = {},
): KeystoreV3 {
    const salt = bytesToHex(randomBytes(32));
    const iv = randomBytes(16);
    const crypto: KeystoreCrypto =
        options.kdf === "pbkdf2"
            ? {
                  cipher: CIPHER,
                  cipherparams: {iv: bytesToHex(iv)},
                  ciphertext: "",
                  kdf: "pbkdf2",
                  kdfparams: {
                      dklen: DKLEN,
                      c: options.c ?? DEFAULT_PBKDF2_ITERATIONS,
                      prf: "hmac-sha256",
                      salt,
                  },
                  mac: "",
              }
            : {
                  cipher: CIPHER,
                  cipherparams: {iv: bytesToHex(iv)},
                  ciphertext: "",
                  kdf: "scrypt",
                  kdfparams: {
                      dklen: DKLEN,
                      n: options.n ?? DEFAULT_SCRYPT.n,
                      r: options.r ?? DEFAULT_SCRYPT.r,
                      p: options.p ?? DEFAULT_SCRYPT.p,
                      salt,
                  },
                  mac: "",
              };

    const derivedKey = deriveKey(password, crypto);
    const ciphertext = aes128Ctr("encrypt", derivedKey.slice(0, 16), iv, privateKey);
    crypto.ciphertext = bytesToHex(ciphertext);
    crypto.mac = bytesToHex(computeMac(derivedKey, ciphertext));

    return {
        version: 3,
        id: randomUUID(),
        address: strip0x(address).toLowerCase(),
        crypto,
    };
}
