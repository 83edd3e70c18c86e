import type { KeyObject } from 'node:crypto';
import type { DownloadedBundle } from '@shared/contracts';
import type { SignatureVerifier } from '@main/services/crypto/SignatureVerifier';

export type BundleVerification = { ok: true; verified: boolean } | { ok: false; reason: string };

// A null key means the source publishes no key: the archive is accepted unverified.
export async function verifyBundle(
  bundle: DownloadedBundle,
  publicKey: KeyObject | null,
  verifier: SignatureVerifier
): Promise<BundleVerification> {
  if (!bundle.archiveFile) {
    return { ok: false, reason: 'Bundle has no archive.' };
  }

  if (!publicKey) {
    return { ok: true, verified: false };
  }

  if (!bundle.signatureFile) {
    return { ok: false, reason: 'Bundle has no signature but the source publishes a public key.' };
  }

  const valid = await verifier.verify(bundle.archiveFile, bundle.signatureFile, publicKey);
  return valid ? { ok: true, verified: true } : { ok: false, reason: 'Archive signature does not match the public key.' };
}
