import type Database from "better-sqlite3";
import { PersistenceFailure, errorMessage } from "../../domain/errors";
import type {
    Clock,
    RecordStatus,
    RecordStore,
    StoredRecordRow,
    StoredTriageRecord,
    TriageResult,
} from "../../domain/triage/types";

const DAY_MS = 24 * 60 * 60 * 1000;

type TriageRecordRow = {
    id: number;
    sender: string;
    subject: string;
    body: string;
    sent_date: string;
    sentiment: TriageResult["sentiment"];
    priority: TriageResult["priority"];
    extracted_info_json: string;
    ai_response: string;
    status: RecordStatus;
    created_at: string;
};

type DistributionRow = {
    sentiment: string;
    priority: string;
    status: string;
    created_at: string;
};

function safeParseStringArray(value: string): string[] {
    try {
        const parsed: unknown = JSON.parse(value);
        if (!Array.isArray(parsed)) return [];
        return parsed.filter((item): item is string => typeof item === "string");
    } catch {
        return [];
    }
}

function fromRow(row: TriageRecordRow): StoredTriageRecord {
    return {
        id: row.id,
        sender: row.sender,
        subject: row.subject,
        body: row.body,
        sentDate: row.sent_date,
        sentiment: row.sentiment,
        priority: row.priority,
        extractedInfo: safeParseStringArray(row.extracted_info_json),
        aiResponse: row.ai_response,
        status: row.status,
        createdAt: row.created_at,
    };
}

export class TriageRecordRepository implements RecordStore {
    private readonly insertStmt;
    private readonly markSentStmt;
    private readonly querySinceStmt;
    private readonly listSinceStmt;

    constructor(
        db: Database.Database,
        private readonly now: Clock = () => new Date()
    ) {
        this.insertStmt = db.prepare(`
            INSERT INTO triage_records (
                sender, subject, body, sent_date, sentiment, priority,
                extracted_info_json, ai_response, status, created_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `);
        this.markSentStmt = db.prepare(
            "UPDATE triage_records SET status = 'sent' WHERE sender = ? AND subject = ?"
        );
        this.querySinceStmt = db.prepare(
            "SELECT sentiment, priority, status, created_at FROM triage_records WHERE created_at >= ?"
        );
        this.listSinceStmt = db.prepare(
            "SELECT * FROM triage_records WHERE created_at >= ? ORDER BY created_at DESC, id DESC"
        );
    }

    insert(result: TriageResult): void {
        try {
            this.insertStmt.run(
                result.sender,
                result.subject,
                result.body,
                result.sentDate,
                result.sentiment,
                result.priority,
                JSON.stringify(result.extractedInfo),
                result.aiResponse,
                result.status,
                this.now().toISOString()
            );
        } catch (err) {
            throw new PersistenceFailure(`Failed to store triage record: ${errorMessage(err)}`, { cause: err });
        }
    }

    markSent(sender: string, subject: string): number {
        try {
            return this.markSentStmt.run(sender, subject).changes;
        } catch (err) {
            throw new PersistenceFailure(`Failed to mark records as sent: ${errorMessage(err)}`, { cause: err });
        }
    }

    querySince(days: number): StoredRecordRow[] {
        const rows = this.querySinceStmt.all(this.cutoff(days)) as DistributionRow[];
        return rows.map((row) => ({
            sentiment: row.sentiment,
            priority: row.priority,
            status: row.status,
            createdAt: row.created_at,
        }));
    }

    listSince(days: number): StoredTriageRecord[] {
        const rows = this.listSinceStmt.all(this.cutoff(days)) as TriageRecordRow[];
        return rows.map(fromRow);
    }

    private cutoff(days: number): string {
        return new Date(this.now().getTime() - days * DAY_MS).toISOString();
    }
}
