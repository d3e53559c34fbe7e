import BetterSqlite3 from "better-sqlite3";
import env from "./env";

export type SqliteConnection = BetterSqlite3.Database;

// better-sqlite3 transactions are synchronous, so the callback must be too.
type SqliteTransactionCallback<T> = (connection: SqliteConnection) => T;

export interface DatabaseOptions {
  /** File path or ':memory:'. Defaults to SQLITE_PATH. */
  path?: string;
  fileMustExist?: boolean;
}

const MEMORY_PATH = ":memory:";

export class Database {
  private static instance: Database | undefined;
  private db: SqliteConnection;
  readonly path: string;

  constructor(options: DatabaseOptions = {}) {
    this.path = options.path ?? env.SQLITE_PATH;

    try {
      this.db = new BetterSqlite3(this.path, {
        fileMustExist: options.fileMustExist ?? false,
      });
    } catch (error) {
      console.error(
        "Failed to open SQLite database at " + this.path + ":",
        error
      );
      throw error;
    }

    if (this.path !== MEMORY_PATH) {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");
  }

  /**
   * Process-wide database at SQLITE_PATH, closed on SIGTERM.
   */
  static shared(): Database {
    if (!Database.instance) {
      const database = new Database();
      process.on("SIGTERM", () => {
        database.shutdown().catch((error) => {
          console.error("Error shutting down SQLite:", error);
        });
      });
      Database.instance = database;
    }
    return Database.instance;
  }

  /**
   * Provides direct access to the better-sqlite3 connection.
   */
  getDB(): SqliteConnection {
    return this.db;
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Runs `fn` inside BEGIN/COMMIT. Any exception thrown by `fn` rolls the
   * transaction back and is re-thrown.
   */
  withTransaction<T>(fn: SqliteTransactionCallback<T>): T {
    const transaction = this.db.transaction((): T => fn(this.db));
    try {
      return transaction();
    } catch (e) {
      console.error("Error during transaction, rolled back:", e);
      throw e;
    }
  }

  /**
   * Closes the connection. Safe to call twice.
   */
  async shutdown(): Promise<void> {
    if (!this.db.open) {
      return;
    }
    this.db.close();
    if (Database.instance === this) {
      Database.instance = undefined;
    }
  }
}
