import type Database from "better-sqlite3";

type Migration = {
    id: string;
    statements: string[];
};

const migrations: Migration[] = [
    {
        id: "001_triage_records",
        statements: [
            `
            CREATE TABLE IF NOT EXISTS triage_records (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                sender TEXT NOT NULL,
                subject TEXT NOT NULL,
                body TEXT NOT NULL,
                sent_date TEXT NOT NULL,
                sentiment TEXT NOT NULL CHECK(sentiment IN ('positive', 'negative', 'neutral')),
                priority TEXT NOT NULL CHECK(priority IN ('urgent', 'normal')),
                extracted_info_json TEXT NOT NULL,
                ai_response TEXT NOT NULL,
                status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'sent')),
                created_at TEXT NOT NULL
            )
            `,
            `
            CREATE INDEX IF NOT EXISTS idx_triage_records_created_at ON triage_records(created_at)
            `,
            `
            CREATE INDEX IF NOT EXISTS idx_triage_records_sender_subject ON triage_records(sender, subject)
            `,
        ],
    },
    {
        id: "002_mail_tokens",
        statements: [
            `
            CREATE TABLE IF NOT EXISTS mail_tokens (
                id INTEGER PRIMARY KEY CHECK (id = 1),
                account_email TEXT NOT NULL,
                encrypted_token_json TEXT NOT NULL,
                updated_at TEXT NOT NULL
            )
            `,
        ],
    },
];

function ensureMigrationsTable(db: Database.Database): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
            id TEXT PRIMARY KEY,
            applied_at TEXT NOT NULL
        )
    `);
}

export function runMigrations(db: Database.Database): void {
    ensureMigrationsTable(db);
    const applied = db.prepare("SELECT id FROM schema_migrations").all() as Array<{ id: string }>;
    const appliedSet = new Set(applied.map((row) => row.id));

    const insertMigration = db.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)");

    for (const migration of migrations) {
        if (appliedSet.has(migration.id)) {
            continue;
        }

        const apply = db.transaction(() => {
            for (const statement of migration.statements) {
                db.exec(statement);
            }
            insertMigration.run(migration.id, new Date().toISOString());
        });

        apply();
    }
}
