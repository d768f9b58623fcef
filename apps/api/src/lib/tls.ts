// ---------------------------------------------------------------------------
// TLS material, loaded once at start-up
// ---------------------------------------------------------------------------

import { readFile } from "node:fs/promises";
import { createSecureContext } from "node:tls";
import { TlsConfigError, errorMessage } from "./errors.js";

export interface TlsMaterial {
  readonly cert: Buffer;
  readonly key: Buffer;
}

/**
 * Reads a PEM certificate and private key and checks that they form a usable
 * pair. Throws TlsConfigError on a missing file, malformed PEM or a key that
 * does not match the certificate.
 */
export async function loadTlsMaterial(
  certPath: string,
  keyPath: string,
): Promise<TlsMaterial> {
  let cert: Buffer;
  let key: Buffer;
  try {
    [cert, key] = await Promise.all([readFile(certPath), readFile(keyPath)]);
  } catch (err) {
    throw new TlsConfigError(
      `failed to read TLS material (cert: ${certPath}, key: ${keyPath}): ${errorMessage(err)}`,
      { cause: err },
    );
  }

  try {
    createSecureContext({ cert, key });
  } catch (err) {
    throw new TlsConfigError(
      `invalid TLS material (cert: ${certPath}, key: ${keyPath}): ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return Object.freeze({ cert, key });
}
