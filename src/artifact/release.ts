import type { KeyObject } from "node:crypto";
import { ReleaseArtifact, ReleaseTamper } from "../types";
import { publicKeyPemFromPrivate, signDetached } from "../signature/signing";
import { enforceVerifiedOrThrow, verifyDetached } from "../signature/verify";
import { ArtifactBuilder } from "./build";

export const TAMPER_MARKER = "\n# tampered after signing\n";

/**
 * Builds and signs one release. `signature` tampering inverts every signature
 * byte; `content` tampering appends a line after signing, so the digest no
 * longer matches.
 */
export async function prepareRelease(
  builder: ArtifactBuilder,
  version: string,
  signingKey: KeyObject,
  tamper: ReleaseTamper = "none"
): Promise<ReleaseArtifact> {
  const built = await builder.build(version);
  const signature = signDetached(built, signingKey);

  enforceVerifiedOrThrow(
    verifyDetached(built, signature, publicKeyPemFromPrivate(signingKey)),
    `release ${version} failed its own signature check`
  );

  if (tamper === "signature") {
    return { version, content: built, signature: invertBytes(signature), tamper };
  }

  if (tamper === "content") {
    return { version, content: Buffer.concat([built, Buffer.from(TAMPER_MARKER, "utf8")]), signature, tamper };
  }

  return { version, content: built, signature, tamper };
}

function invertBytes(bytes: Buffer): Buffer {
  const out = Buffer.alloc(bytes.length);
  for (let i = 0; i < bytes.length; i += 1) {
    out[i] = bytes[i] ^ 0xff;
  }
  return out;
}
