/**
 * Private key loading for key-pair authentication.
 */

import { createPrivateKey } from 'crypto';
import { readFile } from 'fs/promises';

/**
 * Read a PEM private key, decrypting it with the passphrase when given, and
 * return it as unencrypted PKCS#8 PEM, the form the driver accepts.
 */
export async function loadPrivateKey(path: string, passphrase?: string): Promise<string> {
  const pem = await readFile(path, 'utf8');
  const key = createPrivateKey({ key: pem, format: 'pem', passphrase });
  return key.export({ format: 'pem', type: 'pkcs8' }).toString();
}
