import { Account, NewAccount } from '../types';
import {
  logger,
  accountSpecSchema,
  ConfigurationError,
  ConflictError,
  StorageError,
  errorMessage,
  pgErrorCode,
} from '../utils';
import { Queryable } from './database';

const UNIQUE_VIOLATION = '23505';

interface AccountRow {
  id: number;
  displayName: string;
  remoteId: string;
}

function toAccount(row: AccountRow): Account {
  return { id: Number(row.id), displayName: row.displayName, remoteId: row.remoteId };
}

/** Parses the administrative `"<DisplayName>,<RemoteID>"` input. */
export function parseAccountSpec(input: string): NewAccount {
  const result = accountSpecSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid format for --add-user: ${result.error.issues[0]?.message ?? 'malformed input'}`,
      { input }
    );
  }
  return result.data;
}

/**
 * Catalog of tracked accounts. Accounts are only ever created here, from the
 * administrative entry points; ingestion reads the list once per cycle.
 */
export class AccountRegistry {
  private db: Queryable;

  constructor(db: Queryable) {
    this.db = db;
  }

  async add(displayName: string, remoteId: string): Promise<Account> {
    try {
      const result = await this.db.query<AccountRow>(
        `INSERT INTO accounts (display_name, remote_id) VALUES ($1, $2)
         RETURNING id, display_name AS "displayName", remote_id AS "remoteId"`,
        [displayName, remoteId]
      );
      const account = toAccount(result.rows[0]);
      logger.info('Registry', `Account '${displayName}' with profile ID '${remoteId}' added`, { id: account.id });
      return account;
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        throw new ConflictError(`Account '${displayName}' already exists`, { displayName });
      }
      throw new StorageError(`Failed to add account ${displayName}`, { displayName, error: errorMessage(error) });
    }
  }

  async list(): Promise<Account[]> {
    try {
      const result = await this.db.query<AccountRow>(
        `SELECT id, display_name AS "displayName", remote_id AS "remoteId"
         FROM accounts ORDER BY id ASC`
      );
      return result.rows.map(toAccount);
    } catch (error) {
      throw new StorageError('Failed to list accounts', { error: errorMessage(error) });
    }
  }
}
