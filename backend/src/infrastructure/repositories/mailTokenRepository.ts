import type Database from "better-sqlite3";
import type { Credentials } from "google-auth-library";
import { decryptOAuthTokens, encryptOAuthTokens } from "../oauthTokenCrypto";

type TokenRow = {
    account_email: string;
    encrypted_token_json: string;
    updated_at: string;
};

export type StoredMailAccount = {
    accountEmail: string;
    tokens: Credentials;
    updatedAt: string;
};

/** Tokens for the single mailbox this deployment reads and replies from. */
export class MailTokenRepository {
    private readonly upsertStmt;
    private readonly findStmt;
    private readonly deleteStmt;

    constructor(
        db: Database.Database,
        private readonly encryptionKey: string
    ) {
        this.upsertStmt = db.prepare(`
            INSERT INTO mail_tokens (id, account_email, encrypted_token_json, updated_at)
            VALUES (1, ?, ?, ?)
            ON CONFLICT(id) DO UPDATE SET
                account_email = excluded.account_email,
                encrypted_token_json = excluded.encrypted_token_json,
                updated_at = excluded.updated_at
        `);
        this.findStmt = db.prepare(
            "SELECT account_email, encrypted_token_json, updated_at FROM mail_tokens WHERE id = 1"
        );
        this.deleteStmt = db.prepare("DELETE FROM mail_tokens");
    }

    save(accountEmail: string, tokens: Credentials): void {
        this.upsertStmt.run(accountEmail, encryptOAuthTokens(tokens, this.encryptionKey), new Date().toISOString());
    }

    find(): StoredMailAccount | null {
        const row = this.findStmt.get() as TokenRow | undefined;
        if (!row) {
            return null;
        }
        return {
            accountEmail: row.account_email,
            tokens: decryptOAuthTokens(row.encrypted_token_json, this.encryptionKey),
            updatedAt: row.updated_at,
        };
    }

    clear(): void {
        this.deleteStmt.run();
    }
}
