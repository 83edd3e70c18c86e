import crypto, { type KeyObject } from 'node:crypto';
import fs from 'node:fs';

export interface SignatureVerifier {
  loadPublicKey(bytes: Buffer): KeyObject;
  verify(filePath: string, signaturePath: string, publicKey: KeyObject): Promise<boolean>;
}

/**
 * Detached signatures over whole files. Keys are PEM (`PUBLIC KEY` or
 * `RSA PUBLIC KEY`) or DER SPKI. Signature files hold base64 text or raw
 * bytes. RSA and EC keys verify with SHA-256; Ed25519/Ed448 take no digest.
 */
export class NodeSignatureVerifier implements SignatureVerifier {
  loadPublicKey(bytes: Buffer): KeyObject {
    if (bytes.length === 0) {
      throw new Error('public key is empty');
    }

    const text = bytes.toString('utf-8');
    if (text.includes('-----BEGIN')) {
      return crypto.createPublicKey({ key: text, format: 'pem' });
    }

    return crypto.createPublicKey({ key: bytes, format: 'der', type: 'spki' });
  }

  async verify(filePath: string, signaturePath: string, publicKey: KeyObject): Promise<boolean> {
    try {
      const [data, signatureRaw] = await Promise.all([
        fs.promises.readFile(filePath),
        fs.promises.readFile(signaturePath)
      ]);
      const signature = decodeSignature(signatureRaw);
      if (!signature) {
        return false;
      }

      return crypto.verify(digestFor(publicKey), data, publicKey, signature);
    } catch {
      return false;
    }
  }
}

function digestFor(publicKey: KeyObject): string | null {
  const type = publicKey.asymmetricKeyType;
  return type === 'ed25519' || type === 'ed448' ? null : 'sha256';
}

function decodeSignature(raw: Buffer): Buffer | null {
  if (raw.length === 0) {
    return null;
  }

  const text = raw.toString('utf-8').replace(/-----[A-Z ]+-----/g, '').replace(/\s+/g, '');
  if (text && /^[A-Za-z0-9+/]+={0,2}$/.test(text) && text.length % 4 === 0) {
    const decoded = Buffer.from(text, 'base64');
    if (decoded.length > 0) {
      return decoded;
    }
  }

  return raw;
}
