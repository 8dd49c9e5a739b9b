import { type DatabaseError, databaseError, errorMessage } from '@code-inquiry/shared';
import { err, ok, type Result } from 'neverthrow';
import { writeFileSync } from 'node:fs';
import type { BindParams, Database } from 'sql.js';

export interface DbServiceOptions {
    shutdownHooks?: boolean;
}

export class DbService {
    private shutdownHandlers: (() => void)[] = [];

    constructor(
        private db: Database,
        private dbPath: string,
        options: DbServiceOptions = {},
    ) {
        if (options.shutdownHooks ?? true) {
            this.registerShutdownHooks();
        }
    }

    /**
     * Execute a SELECT query and return all matching rows as typed objects.
     * Statement is prepared, bound, stepped through, and freed within this call.
     */
    query<T>(sql: string, params?: BindParams): Result<T[], DatabaseError> {
        try {
            const stmt = this.db.prepare(sql);
            if (params) stmt.bind(params);

            const rows: T[] = [];
            while (stmt.step()) {
                rows.push(stmt.getAsObject() as T);
            }
            stmt.free();
            return ok(rows);
        } catch (e) {
            return err(databaseError(`Query failed: ${errorMessage(e)}`, e));
        }
    }

    queryOne<T>(sql: string, params?: BindParams): Result<T | undefined, DatabaseError> {
        return this.query<T>(sql, params).map((rows) => rows[0]);
    }

    /**
     * Execute an INSERT/UPDATE/DELETE statement and return the number of rows modified.
     */
    execute(sql: string, params?: BindParams): Result<{ changes: number }, DatabaseError> {
        try {
            this.db.run(sql, params);
            return ok({ changes: this.db.getRowsModified() });
        } catch (e) {
            return err(databaseError(`Execute failed: ${errorMessage(e)}`, e));
        }
    }

    /**
     * Export the database to the configured file path.
     * db.export() frees all open prepared statements, so none may be held across this call.
     */
    save(): Result<void, DatabaseError> {
        if (this.dbPath === ':memory:') return ok(undefined);
        try {
            writeFileSync(this.dbPath, Buffer.from(this.db.export()));
            return ok(undefined);
        } catch (e) {
            return err(databaseError(`Save failed: ${errorMessage(e)}`, e));
        }
    }

    close(): Result<void, DatabaseError> {
        this.removeShutdownHooks();

        return this.save().andThen(() => {
            try {
                this.db.close();
                return ok(undefined);
            } catch (e) {
                return err(databaseError(`Close failed: ${errorMessage(e)}`, e));
            }
        });
    }

    private registerShutdownHooks(): void {
        const handler = () => {
            const result = this.close();
            if (result.isErr()) {
                console.error('[db] Failed to close database on shutdown:', result.error.message);
            }
            process.exit(0);
        };
        this.shutdownHandlers.push(handler);
        process.on('SIGINT', handler);
        process.on('SIGTERM', handler);
    }

    private removeShutdownHooks(): void {
        for (const handler of this.shutdownHandlers) {
            process.removeListener('SIGINT', handler);
            process.removeListener('SIGTERM', handler);
        }
        this.shutdownHandlers = [];
    }
}
