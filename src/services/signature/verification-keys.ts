import crypto from 'node:crypto';
import { ConfigurationError } from '@/errors';

const PEM_PUBLIC_KEY_BLOCK = /-----BEGIN PUBLIC KEY-----[\s\S]+?-----END PUBLIC KEY-----/g;

/**
 * Parse the trusted verification keys supplied through configuration.
 *
 * Accepts either one or more PEM `PUBLIC KEY` blocks (escaped `\n` sequences
 * are turned back into newlines) or a comma-separated list of base64 DER SPKI keys.
 */
export function parseVerificationKeys(raw: string): crypto.KeyObject[] {
  // Handle escaped newlines from single-line env values
  const normalized = raw.replace(/\\n/g, '\n').trim();

  const pemBlocks = normalized.match(PEM_PUBLIC_KEY_BLOCK);
  const keys = pemBlocks
    ? pemBlocks.map((pem, index) => importKey(index, () => crypto.createPublicKey(pem)))
    : normalized
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean)
        .map((base64, index) =>
          importKey(index, () =>
            crypto.createPublicKey({
              key: Buffer.from(base64, 'base64'),
              format: 'der',
              type: 'spki',
            }),
          ),
        );

  if (keys.length === 0) {
    throw new ConfigurationError('No verification keys configured');
  }

  return keys;
}

function importKey(index: number, load: () => crypto.KeyObject): crypto.KeyObject {
  try {
    return load();
  } catch (error) {
    throw new ConfigurationError(`Verification key #${index + 1} could not be parsed`, { cause: error });
  }
}
