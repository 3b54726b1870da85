/**
 * Encrypted on-disk storage for session cookies.
 *
 * File layout (JSON, UTF-8):
 *   { format, version, kdf: { name: "scrypt", N, r, p }, salt, iv, tag, ciphertext }
 * Binary fields are base64. The key is derived with scrypt from the passphrase
 * and a per-file salt; the cookies are sealed with AES-256-GCM.
 */
import { createCipheriv, createDecipheriv, randomBytes, scrypt } from "node:crypto";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { AuthError, UserInputError, VaultVersionError } from "../shared/errors.js";
import { outputFile } from "../shared/fs.js";
import type { SessionCookie } from "./session.js";

export const VAULT_FORMAT = "lecturecap-vault";
export const VAULT_VERSION = 1;

const CIPHER = "aes-256-gcm";
const KEY_LENGTH = 32;
const SALT_LENGTH = 16;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

export interface ScryptParams {
  N: number;
  r: number;
  p: number;
}

export const DEFAULT_SCRYPT_PARAMS: ScryptParams = { N: 2 ** 15, r: 8, p: 1 };

// Upper bounds for parameters read back from a file
const MAX_SCRYPT_N = 2 ** 20;
const MAX_SCRYPT_R = 32;
const MAX_SCRYPT_P = 16;
const MAX_SCRYPT_MEMORY = 256 * 1024 * 1024;

/**
 * What the vault protects.
 */
export interface VaultContents {
  origin: string;
  cookies: SessionCookie[];
  savedAt: string;
}

const cookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string().optional(),
  path: z.string().optional(),
  expires: z.number().optional(),
});

const contentsSchema = z.object({
  origin: z.url(),
  cookies: z.array(cookieSchema),
  savedAt: z.iso.datetime(),
});

const headerSchema = z.object({
  format: z.string(),
  version: z.number(),
});

const envelopeSchema = z.object({
  format: z.literal(VAULT_FORMAT),
  version: z.literal(VAULT_VERSION),
  kdf: z.object({
    name: z.literal("scrypt"),
    N: z.number().int(),
    r: z.number().int(),
    p: z.number().int(),
  }),
  salt: z.base64(),
  iv: z.base64(),
  tag: z.base64(),
  ciphertext: z.base64(),
});

type VaultEnvelope = z.infer<typeof envelopeSchema>;

/** Bytes OpenSSL allocates for scrypt with these parameters */
function scryptMemory(params: ScryptParams): number {
  return 128 * params.r * (params.N + params.p + 2);
}

function deriveKey(passphrase: string, salt: Buffer, params: ScryptParams): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(
      passphrase.normalize("NFKC"),
      salt,
      KEY_LENGTH,
      { N: params.N, r: params.r, p: params.p, maxmem: scryptMemory(params) + 1024 * 1024 },
      (error, key) => {
        if (error) reject(error);
        else resolve(key);
      }
    );
  });
}

function assertPassphrase(passphrase: string): void {
  if (passphrase.length === 0) {
    throw new UserInputError("The vault passphrase must not be empty");
  }
}

function isPowerOfTwo(value: number): boolean {
  return value > 1 && (value & (value - 1)) === 0;
}

function checkKdfBounds(params: ScryptParams): void {
  const valid =
    isPowerOfTwo(params.N) &&
    params.N <= MAX_SCRYPT_N &&
    params.r >= 1 &&
    params.r <= MAX_SCRYPT_R &&
    params.p >= 1 &&
    params.p <= MAX_SCRYPT_P &&
    scryptMemory(params) <= MAX_SCRYPT_MEMORY;
  if (!valid) {
    throw new AuthError("Vault file is corrupt or was tampered with", {
      details: "Key derivation parameters out of range",
    });
  }
}

/**
 * Encrypts a cookie bundle. Returns the bytes to persist.
 */
export async function encrypt(
  contents: VaultContents,
  passphrase: string,
  params: ScryptParams = DEFAULT_SCRYPT_PARAMS
): Promise<Buffer> {
  assertPassphrase(passphrase);

  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const key = await deriveKey(passphrase, salt, params);

  const cipher = createCipheriv(CIPHER, key, iv, { authTagLength: TAG_LENGTH });
  const plaintext = Buffer.from(JSON.stringify(contents), "utf-8");
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  const envelope: VaultEnvelope = {
    format: VAULT_FORMAT,
    version: VAULT_VERSION,
    kdf: { name: "scrypt", N: params.N, r: params.r, p: params.p },
    salt: salt.toString("base64"),
    iv: iv.toString("base64"),
    tag: cipher.getAuthTag().toString("base64"),
    ciphertext: ciphertext.toString("base64"),
  };

  return Buffer.from(JSON.stringify(envelope, null, 2), "utf-8");
}

/**
 * Reads the envelope, checking format and version before anything else.
 */
function parseEnvelope(bytes: Uint8Array): VaultEnvelope {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString("utf-8"));
  } catch (error) {
    throw new AuthError("Vault file is corrupt or was tampered with", { cause: error });
  }

  const header = headerSchema.safeParse(raw);
  if (!header.success) {
    throw new AuthError("Vault file is corrupt or was tampered with", {
      details: "Missing format or version",
    });
  }
  if (header.data.format !== VAULT_FORMAT || header.data.version !== VAULT_VERSION) {
    throw new VaultVersionError(
      header.data.format === VAULT_FORMAT ? header.data.version : header.data.format,
      VAULT_VERSION
    );
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new AuthError("Vault file is corrupt or was tampered with", {
      details: z.prettifyError(envelope.error),
    });
  }
  return envelope.data;
}

/**
 * Decrypts vault bytes. Fails with AuthError on a wrong passphrase or any
 * tampering; never returns partially decrypted data.
 */
export async function decrypt(bytes: Uint8Array, passphrase: string): Promise<VaultContents> {
  assertPassphrase(passphrase);

  const envelope = parseEnvelope(bytes);
  const params: ScryptParams = { N: envelope.kdf.N, r: envelope.kdf.r, p: envelope.kdf.p };
  checkKdfBounds(params);

  const salt = Buffer.from(envelope.salt, "base64");
  const iv = Buffer.from(envelope.iv, "base64");
  const tag = Buffer.from(envelope.tag, "base64");
  if (salt.length !== SALT_LENGTH || iv.length !== IV_LENGTH || tag.length !== TAG_LENGTH) {
    throw new AuthError("Vault file is corrupt or was tampered with", {
      details: "Unexpected salt, iv or tag length",
    });
  }

  let key: Buffer;
  try {
    key = await deriveKey(passphrase, salt, params);
  } catch (error) {
    throw new AuthError("Vault file is corrupt or was tampered with", {
      details: "Key derivation parameters rejected",
      cause: error,
    });
  }

  let plaintext: Buffer;
  try {
    const decipher = createDecipheriv(CIPHER, key, iv, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(tag);
    plaintext = Buffer.concat([
      decipher.update(Buffer.from(envelope.ciphertext, "base64")),
      decipher.final(),
    ]);
  } catch (error) {
    throw new AuthError("Wrong passphrase, or the vault file was modified", { cause: error });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(plaintext.toString("utf-8"));
  } catch (error) {
    throw new AuthError("Vault contents are unreadable", { cause: error });
  }

  const contents = contentsSchema.safeParse(decoded);
  if (!contents.success) {
    throw new AuthError("Vault contents are unreadable", {
      details: z.prettifyError(contents.error),
    });
  }
  return contents.data;
}

/**
 * Encrypts and writes the vault to exactly `path`.
 */
export async function saveVault(
  path: string,
  contents: VaultContents,
  passphrase: string,
  params?: ScryptParams
): Promise<void> {
  const bytes = await encrypt(contents, passphrase, params);
  await outputFile(path, bytes, { mode: 0o600 });
}

/**
 * Reads and decrypts the vault at `path`.
 */
export async function loadVault(path: string, passphrase: string): Promise<VaultContents> {
  const bytes = await readFile(path);
  return decrypt(bytes, passphrase);
}
