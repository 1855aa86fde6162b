import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../services/logging';

export type SqliteDatabase = Database.Database;

/**
 * Opens the document store. `:memory:` is accepted for tests and tooling.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
    if (dbPath !== ':memory:') {
        const dbDir = path.dirname(path.resolve(dbPath));
        if (!fs.existsSync(dbDir)) {
            fs.mkdirSync(dbDir, { recursive: true });
        }
    }

    const db = new Database(dbPath === ':memory:' ? dbPath : path.resolve(dbPath));
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    return db;
}

function getSchemaContent(): string {
    let schemaPath = path.join(__dirname, 'schema.sql');

    // Fallback for compiled dist directory
    if (!fs.existsSync(schemaPath)) {
        schemaPath = path.join(process.cwd(), 'src', 'db', 'schema.sql');
    }

    if (!fs.existsSync(schemaPath)) {
        throw new Error(`Schema file not found at: ${schemaPath}`);
    }

    return fs.readFileSync(schemaPath, 'utf-8');
}

export function initDatabase(db: SqliteDatabase): void {
    try {
        db.exec(getSchemaContent());

        const tables = db.prepare(
            "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'"
        ).all() as { name: string }[];
        logger.info('Database initialized', { tables: tables.map(t => t.name) });
    } catch (error) {
        logger.error('Database initialization failed', { error });
        throw error;
    }
}

export function closeDatabase(db: SqliteDatabase): void {
    try {
        db.close();
        logger.info('Database closed');
    } catch (err) {
        logger.error('Error closing database', { error: err });
    }
}

/** Opens the store and applies the schema in one step. */
export function createDatabase(dbPath: string): SqliteDatabase {
    const db = openDatabase(dbPath);
    initDatabase(db);
    return db;
}
