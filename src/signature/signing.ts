import { createPrivateKey, createPublicKey, generateKeyPairSync, sign, type KeyObject } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { HarnessError, errorMessage } from "../util/errors";

// letsencrypt-auto checks updates with `openssl dgst -sha256 -verify`, so the
// detached signature is a raw RSA PKCS#1 v1.5 signature over SHA-256.
export const SIGNATURE_DIGEST = "sha256";

export interface SigningKeypairFiles {
  privateKeyPath: string;
  publicKeyPath: string;
  publicKeyPem: string;
}

export function signDetached(content: Buffer | string, privateKey: KeyObject | string): Buffer {
  const key = typeof privateKey === "string" ? parsePrivateKey(privateKey, "inline key") : privateKey;
  if (key.asymmetricKeyType !== "rsa") {
    throw new HarnessError(`signing key must be RSA, got ${key.asymmetricKeyType ?? "unknown"}`);
  }
  return sign(SIGNATURE_DIGEST, Buffer.from(content), key);
}

export async function loadSigningKey(privateKeyPath: string): Promise<KeyObject> {
  const resolved = path.resolve(privateKeyPath);
  const raw = await readFile(resolved, "utf8").catch(() => {
    throw new HarnessError(`private key file not found: ${privateKeyPath}`);
  });
  return parsePrivateKey(raw, resolved);
}

export function publicKeyPemFromPrivate(privateKey: KeyObject): string {
  const exported = createPublicKey(privateKey).export({ format: "pem", type: "spki" });
  return typeof exported === "string" ? exported : exported.toString("utf8");
}

export function generateSigningKey(): KeyObject {
  const { privateKey } = generateKeyPairSync("rsa", { modulusLength: 2048 });
  return privateKey;
}

export async function generateSigningKeypair(outDir: string, baseName = "le-auto-test"): Promise<SigningKeypairFiles> {
  const resolved = path.resolve(outDir);
  await mkdir(resolved, { recursive: true });

  const privateKey = generateSigningKey();
  const privatePem = privateKey.export({ format: "pem", type: "pkcs8" });
  const publicKeyPem = publicKeyPemFromPrivate(privateKey);

  const privateKeyPath = path.join(resolved, `${baseName}.private.pem`);
  const publicKeyPath = path.join(resolved, `${baseName}.public.pem`);
  await writeFile(privateKeyPath, privatePem, { mode: 0o600 });
  await writeFile(publicKeyPath, publicKeyPem, "utf8");

  return { privateKeyPath, publicKeyPath, publicKeyPem };
}

function parsePrivateKey(raw: string, label: string): KeyObject {
  try {
    return createPrivateKey(raw);
  } catch (error) {
    throw new HarnessError(`failed to parse private key ${label}: ${errorMessage(error)}`);
  }
}
