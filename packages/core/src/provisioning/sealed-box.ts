/**
 * libsodium sealed boxes
 *
 * GitHub Actions secrets must be encrypted with the repository's Curve25519
 * public key before upload. Only GitHub holds the matching private key.
 */

import sodium from 'libsodium-wrappers';
import type { SecretSealer } from '../spi/index.js';

export async function sealSecret(plaintext: string, publicKey: string): Promise<string> {
  await sodium.ready;
  const key = sodium.from_base64(publicKey, sodium.base64_variants.ORIGINAL);
  const sealed = sodium.crypto_box_seal(sodium.from_string(plaintext), key);
  return sodium.to_base64(sealed, sodium.base64_variants.ORIGINAL);
}

export const sodiumSealer: SecretSealer = {
  seal: sealSecret,
};
