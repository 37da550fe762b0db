import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { runMigrations } from "./sqliteMigrations";

const IN_MEMORY = ":memory:";

export function resolveDatabasePath(configured?: string): string {
    if (configured) {
        if (configured === IN_MEMORY) {
            return configured;
        }
        return path.isAbsolute(configured) ? configured : path.join(process.cwd(), configured);
    }
    return path.join(process.cwd(), "data", "triage.db");
}

function configureDatabase(db: Database.Database): void {
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
}

export function openDatabase(configuredPath?: string): Database.Database {
    const dbPath = resolveDatabasePath(configuredPath);
    if (dbPath !== IN_MEMORY) {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    configureDatabase(db);
    runMigrations(db);
    return db;
}
