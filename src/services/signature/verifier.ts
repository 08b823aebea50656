import crypto from 'node:crypto';
import type { VerificationResult } from '@/types/config';

/**
 * Checks detached signatures against a set of trusted public keys.
 *
 * EC and RSA keys verify a SHA-256 digest (ECDSA signatures are DER encoded);
 * Ed25519 and Ed448 keys sign the payload directly.
 */
export class SignatureVerifier {
  constructor(private readonly keys: readonly crypto.KeyObject[]) {}

  /**
   * @returns true when the signature validates under any trusted key
   */
  verify(payload: Uint8Array, signature: Uint8Array): boolean {
    return this.check(payload, signature).verified;
  }

  check(payload: Uint8Array, signature: Uint8Array): VerificationResult {
    if (this.keys.length === 0) {
      return { verified: false, reason: 'no-trusted-keys' };
    }

    let primitiveFailed = false;

    for (const key of this.keys) {
      try {
        if (verifyWithKey(key, payload, signature)) {
          return { verified: true, payload };
        }
      } catch {
        // A throwing key counts as a non-match; the remaining keys still get a chance
        primitiveFailed = true;
      }
    }

    return {
      verified: false,
      reason: primitiveFailed ? 'verification-error' : 'signature-mismatch',
    };
  }
}

function verifyWithKey(key: crypto.KeyObject, payload: Uint8Array, signature: Uint8Array): boolean {
  switch (key.asymmetricKeyType) {
    case 'ed25519':
    case 'ed448':
      return crypto.verify(null, payload, key, signature);
    case 'ec':
      return crypto.verify('sha256', payload, { key, dsaEncoding: 'der' }, signature);
    case 'rsa':
      return crypto.verify('sha256', payload, key, signature);
    default:
      throw new Error(`Unsupported key type: ${key.asymmetricKeyType ?? 'unknown'}`);
  }
}
