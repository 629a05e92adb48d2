/**
 * @module db/types
 * Connection and statement types shared by the engine and the Snowflake transport.
 */

/**
 * Password authentication, read from `SNOWSQL_PWD`.
 */
export interface PasswordCredentials {
  Kind: 'password';
  Password: string;
}

/**
 * Key-pair authentication: an encrypted PEM private key on disk plus the
 * passphrase that unlocks it (read from `SNOWSQL_PRIVATE_KEY_PASSPHRASE`).
 */
export interface KeyPairCredentials {
  Kind: 'key-pair';
  PrivateKeyFile: string;
  Passphrase: string;
}

export type ConnectionCredentials = PasswordCredentials | KeyPairCredentials;

/**
 * Identifies the Snowflake account and session every statement runs under.
 */
export interface ConnectionConfig {
  /** Account identifier, e.g. `ly12345.us-east-2.aws` */
  Account: string;

  /** Login name; also recorded as INSTALLED_BY in the change history */
  User: string;

  /** Role to assume for every session */
  Role: string;

  /** Warehouse that runs the statements */
  Warehouse: string;

  /** How to authenticate */
  Credentials: ConnectionCredentials;
}

/** A single bound parameter value. */
export type SqlBind = string | number;

/** One result row, keyed by upper-case column name. */
export type SqlRow = Record<string, unknown>;

/**
 * A single statement (or, with `MultiStatement`, a whole script) to run.
 */
export interface SqlRequest {
  /** Database to use for the session; omitted for account-level statements */
  Database?: string;

  /** Statement text; `?` marks positional binds */
  SQL: string;

  /** Positional bind values */
  Binds?: SqlBind[];

  /** Allow any number of `;`-separated statements in `SQL` */
  MultiStatement?: boolean;
}

/**
 * The one capability the engine needs from a database: run a statement
 * against a named database and return its rows, or reject.
 */
export interface SqlExecutor {
  Execute(request: SqlRequest): Promise<SqlRow[]>;
}
