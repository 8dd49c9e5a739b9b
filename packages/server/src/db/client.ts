import { type AppError, databaseError, errorMessage } from '@code-inquiry/shared';
import { err, ok, type Result } from 'neverthrow';
import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import initSqlJs, { type Database } from 'sql.js';

export type { Database } from 'sql.js';

export const SCHEMA_VERSION = '1';

function applySchema(db: Database): void {
    const schemaPath = fileURLToPath(new URL('./schema.sql', import.meta.url));
    db.run(readFileSync(schemaPath, 'utf-8'));
    runMigrations(db);
}

/**
 * Initialize sql.js and either load an existing DB file or create a new one.
 * Runs the schema DDL and migrations.
 */
export async function initDatabase(dbPath: string): Promise<Result<Database, AppError>> {
    try {
        const SQL = await initSqlJs();

        let db: Database;
        if (existsSync(dbPath)) {
            db = new SQL.Database(readFileSync(dbPath));
        } else {
            mkdirSync(dirname(dbPath), { recursive: true });
            db = new SQL.Database();
        }

        applySchema(db);
        return ok(db);
    } catch (e) {
        return err(databaseError(`Failed to initialize database at ${dbPath}: ${errorMessage(e)}`, e));
    }
}

/**
 * Initialize an in-memory database (for tests).
 */
export async function initInMemoryDatabase(): Promise<Result<Database, AppError>> {
    try {
        const SQL = await initSqlJs();
        const db = new SQL.Database();
        applySchema(db);
        return ok(db);
    } catch (e) {
        return err(databaseError(`Failed to initialize in-memory database: ${errorMessage(e)}`, e));
    }
}

export function runMigrations(db: Database): void {
    const result = db.exec("SELECT value FROM app_config WHERE key = 'schema_version'");
    const currentVersion = result.length > 0 ? result[0].values[0][0] : null;

    if (currentVersion === null) {
        // Fresh DB: schema.sql already ran, just record the version
        db.run("INSERT INTO app_config (key, value) VALUES ('schema_version', ?)", [SCHEMA_VERSION]);
    }
}
