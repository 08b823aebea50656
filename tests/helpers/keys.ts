import crypto from 'node:crypto';

export interface SigningKey {
  publicKey: crypto.KeyObject;
  privateKey: crypto.KeyObject;
  sign(payload: Uint8Array): Uint8Array;
}

export function generateEcKey(): SigningKey {
  const { publicKey, privateKey } = crypto.generateKeyPairSync('ec', { namedCurve: 'prime256v1' });
  return {
    publicKey,
    privateKey,
    sign: (payload) => new Uint8Array(crypto.sign('sha256', payload, privateKey)),
  };
}

export function generateEd25519Key(): SigningKey {
  const { publicKey, privateKey } = crypto.generateKeyPairSync('ed25519');
  return {
    publicKey,
    privateKey,
    sign: (payload) => new Uint8Array(crypto.sign(null, payload, privateKey)),
  };
}

export function toPem(key: crypto.KeyObject): string {
  return key.export({ type: 'spki', format: 'pem' }).toString();
}

export function toBase64Spki(key: crypto.KeyObject): string {
  return key.export({ type: 'spki', format: 'der' }).toString('base64');
}

export const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);
