/**
 * @module db/connection
 * Snowflake transport for Floe.
 *
 * Every statement gets its own connection: open, run one statement, close.
 * Deployments are strictly sequential and short, so there is no pool, and
 * a connection never outlives the call that opened it.
 */

import * as snowflake from 'snowflake-sdk';
import { ConnectionConfig, SqlExecutor, SqlRequest, SqlRow } from './types';
import { LoadPrivateKey } from './credentials';
import { ConnectionError, toError } from '../core/errors';

/**
 * Called with every request just before it is sent.
 */
export type QueryCallback = (request: SqlRequest) => void;

/**
 * Runs statements against a Snowflake account, one scoped connection per call.
 */
export class SnowflakeConnectionManager implements SqlExecutor {
  private readonly config: ConnectionConfig;
  private readonly onQuery?: QueryCallback;
  private privateKey: string | null = null;

  /**
   * @param config - Account, session and credential settings
   * @param onQuery - Optional hook that sees every statement (verbose tracing)
   */
  constructor(config: ConnectionConfig, onQuery?: QueryCallback) {
    this.config = config;
    this.onQuery = onQuery;
  }

  /**
   * Opens a connection to `request.Database`, runs the statement and
   * closes the connection on every exit path.
   *
   * @returns The rows the statement produced (empty for DDL and DML)
   * @throws ConnectionError if the connection cannot be opened
   */
  async Execute(request: SqlRequest): Promise<SqlRow[]> {
    this.onQuery?.(request);
    const connection = await this.open(request.Database);

    let rows: SqlRow[];
    try {
      rows = await this.run(connection, request);
    } catch (err) {
      // The statement error is the one worth reporting
      await this.close(connection).catch(() => undefined);
      throw err;
    }

    await this.close(connection);
    return rows;
  }

  private buildOptions(database?: string): snowflake.ConnectionOptions {
    const options: snowflake.ConnectionOptions = {
      account: this.config.Account,
      username: this.config.User,
      role: this.config.Role,
      warehouse: this.config.Warehouse,
    };

    if (database) {
      options.database = database;
    }

    const credentials = this.config.Credentials;
    if (credentials.Kind === 'password') {
      options.password = credentials.Password;
    } else {
      if (this.privateKey === null) {
        this.privateKey = LoadPrivateKey(credentials);
      }
      options.authenticator = 'SNOWFLAKE_JWT';
      options.privateKey = this.privateKey;
    }

    return options;
  }

  private open(database?: string): Promise<snowflake.Connection> {
    const connection = snowflake.createConnection(this.buildOptions(database));

    return new Promise((resolve, reject) => {
      connection.connect((err) => {
        if (err) {
          reject(new ConnectionError(err.message, toError(err)));
          return;
        }
        resolve(connection);
      });
    });
  }

  private run(connection: snowflake.Connection, request: SqlRequest): Promise<SqlRow[]> {
    return new Promise((resolve, reject) => {
      connection.execute({
        sqlText: request.SQL,
        binds: request.Binds,
        parameters: request.MultiStatement ? { MULTI_STATEMENT_COUNT: 0 } : undefined,
        complete: (err, _statement, rows) => {
          if (err) {
            reject(toError(err));
            return;
          }
          resolve(rows ?? []);
        },
      });
    });
  }

  private close(connection: snowflake.Connection): Promise<void> {
    return new Promise((resolve, reject) => {
      connection.destroy((err) => {
        if (err) {
          reject(new ConnectionError(err.message, toError(err)));
          return;
        }
        resolve();
      });
    });
  }
}
