import { createHash, createPublicKey, verify, type KeyObject } from "node:crypto";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { HarnessError, errorMessage } from "../util/errors";
import { SIGNATURE_DIGEST } from "./signing";

export type VerificationStatus = "verified" | "invalid";

export interface VerificationResult {
  ok: boolean;
  status: VerificationStatus;
  digest: string;
  message: string;
}

export function verifyDetached(
  content: Buffer | string,
  signature: Buffer,
  publicKey: KeyObject | string
): VerificationResult {
  const bytes = Buffer.from(content);
  const digest = createHash(SIGNATURE_DIGEST).update(bytes).digest("hex");

  let key: KeyObject;
  try {
    key = typeof publicKey === "string" ? createPublicKey(publicKey) : publicKey;
  } catch (error) {
    throw new HarnessError(`failed to parse public key: ${errorMessage(error)}`);
  }

  let ok: boolean;
  try {
    ok = verify(SIGNATURE_DIGEST, bytes, key, signature);
  } catch (error) {
    return { ok: false, status: "invalid", digest, message: `signature rejected: ${errorMessage(error)}` };
  }

  if (!ok) {
    return { ok: false, status: "invalid", digest, message: "signature verification failed" };
  }

  return { ok: true, status: "verified", digest, message: "verified" };
}

export async function verifyDetachedFiles(
  contentPath: string,
  signaturePath: string,
  publicKeyPath: string
): Promise<VerificationResult> {
  const [content, signature, publicKey] = await Promise.all([
    readRequired(contentPath, "artifact"),
    readRequired(signaturePath, "signature"),
    readRequired(publicKeyPath, "public key")
  ]);
  return verifyDetached(content, signature, publicKey.toString("utf8"));
}

export function enforceVerifiedOrThrow(result: VerificationResult, label: string): void {
  if (result.ok) return;
  throw new HarnessError(`${label}: ${result.message}`);
}

async function readRequired(filePath: string, label: string): Promise<Buffer> {
  try {
    return await readFile(path.resolve(filePath));
  } catch {
    throw new HarnessError(`${label} file not found: ${filePath}`);
  }
}
