/**
 * @module db/credentials
 * Resolves authentication material from the environment and the
 * private key file.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import { ConnectionCredentials, KeyPairCredentials } from './types';
import { ConfigurationError, toError } from '../core/errors';

/** Environment variable holding the account password. */
export const PASSWORD_ENV_VAR = 'SNOWSQL_PWD';

/** Environment variable holding the private key passphrase. */
export const PASSPHRASE_ENV_VAR = 'SNOWSQL_PRIVATE_KEY_PASSPHRASE';

/**
 * Picks the authentication method from the environment.
 *
 * A password always wins; a key pair is used only when a key file was given
 * and its passphrase is set. Only the environment is consulted, so a missing
 * credential is reported before any file or network access.
 *
 * @param privateKeyFile - Path from `--private-key-file`, if any
 * @param env - Environment to read (defaults to `process.env`)
 * @throws ConfigurationError if neither method is available
 */
export function ResolveCredentials(
  privateKeyFile: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): ConnectionCredentials {
  const password = env[PASSWORD_ENV_VAR];
  if (password !== undefined) {
    return { Kind: 'password', Password: password };
  }

  const passphrase = env[PASSPHRASE_ENV_VAR];
  if (privateKeyFile && passphrase !== undefined) {
    return { Kind: 'key-pair', PrivateKeyFile: privateKeyFile, Passphrase: passphrase };
  }

  throw new ConfigurationError(
    `No value set in ${PASSWORD_ENV_VAR} environment variable, and either the private key file ` +
      `or the ${PASSPHRASE_ENV_VAR} environment variable is not set. One of these ` +
      `authentication methods must be used to connect to Snowflake.`
  );
}

/**
 * Reads and decrypts the PEM private key, returning it as an unencrypted
 * PKCS#8 PEM string the driver accepts.
 *
 * @throws ConfigurationError if the file cannot be read or the passphrase is wrong
 */
export function LoadPrivateKey(credentials: KeyPairCredentials): string {
  let pem: string;
  try {
    pem = fs.readFileSync(credentials.PrivateKeyFile, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read private key file ${credentials.PrivateKeyFile}`,
      toError(err)
    );
  }

  try {
    const key = crypto.createPrivateKey({
      key: pem,
      format: 'pem',
      passphrase: credentials.Passphrase,
    });
    return key.export({ format: 'pem', type: 'pkcs8' }).toString();
  } catch (err) {
    throw new ConfigurationError(
      `Cannot decrypt private key file ${credentials.PrivateKeyFile}: ${toError(err).message}`,
      toError(err)
    );
  }
}
