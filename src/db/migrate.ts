import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import type { Logger } from '../log.js';

// Built files land in dist/src/db; the .sql files stay in the source tree
export const MIGRATIONS_DIR = path.basename(path.resolve(__dirname, '..', '..')) === 'dist'
    ? path.resolve(__dirname, '..', '..', '..', 'src', 'db', 'migrations')
    : path.join(__dirname, 'migrations');

function stripOuterTransactions(sql: string): string {
    return sql
        .replace(/\bBEGIN(?:\s+TRANSACTION)?\s*;?/gi, "")
        .replace(/\bCOMMIT\s*;?/gi, "");
}

/**
 * Apply every *.sql file in `dir` not yet recorded in `_migrations`, in file
 * name order. Each file runs inside its own savepoint.
 */
export function migrateDb(db: Database.Database, log: Pick<Logger, 'info' | 'error'>, dir: string = MIGRATIONS_DIR): string[] {
    db.exec("CREATE TABLE IF NOT EXISTS _migrations(name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL);");

    const appliedRows = db.prepare('SELECT name FROM _migrations').pluck().all().map(String);
    const appliedSet = new Set(appliedRows);

    if (!fs.existsSync(dir)) throw new Error(`migrations directory missing: ${dir}`);
    const files = fs.readdirSync(dir).filter(f => f.endsWith('.sql')).sort();
    const applied: string[] = [];

    for (const file of files) {
        if (appliedSet.has(file)) continue;
        const sql = stripOuterTransactions(fs.readFileSync(path.join(dir, file), 'utf8')).trim();
        const spName = `mig_${file.replace(/[^a-zA-Z0-9]/g, '_')}`;
        db.exec(`SAVEPOINT ${spName};`);
        try {
            db.exec(sql);
            db.prepare("INSERT INTO _migrations(name, applied_at) VALUES (?, ?)").run(file, Date.now());
            db.exec(`RELEASE ${spName};`);
            applied.push(file);
            log.info({ msg: 'migrate', file });
        } catch (e) {
            db.exec(`ROLLBACK TO ${spName};`);
            db.exec(`RELEASE ${spName};`);
            log.error({ msg: 'migrate_error', file, error: String(e), sqlPreview: sql.substring(0, 200) });
            throw e;
        }
    }
    return applied;
}
