/**
 * RSA key pairs and RSA-OAEP key wrapping on Node's built-in crypto module
 */

import {
  generateKeyPair,
  publicEncrypt,
  privateDecrypt,
  constants,
} from 'crypto';
import { promisify } from 'util';
import type { KeyPairMaterial, KeyWrappingProvider } from './types.js';

const generateKeyPairAsync = promisify(generateKeyPair);

const OAEP_HASH = 'sha256';

export class NodeKeyWrappingProvider implements KeyWrappingProvider {
  readonly name = 'node:crypto (RSA-OAEP)';

  async generateKeyPair(bits: number): Promise<KeyPairMaterial> {
    const { privateKey, publicKey } = await generateKeyPairAsync('rsa', {
      modulusLength: bits,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    });
    return { privateKey, publicKey };
  }

  async wrap(data: Buffer, publicKeyPem: string): Promise<Buffer> {
    return publicEncrypt(
      { key: publicKeyPem, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: OAEP_HASH },
      data
    );
  }

  async unwrap(ciphertext: Buffer, privateKeyPem: string): Promise<Buffer> {
    return privateDecrypt(
      { key: privateKeyPem, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: OAEP_HASH },
      ciphertext
    );
  }
}

