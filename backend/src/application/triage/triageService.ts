import { errorMessage } from "../../domain/errors";
import { ANALYTICS_WINDOW_DAYS, buildAnalyticsSnapshot, summarizeBatch } from "../../domain/triage/analytics";
import type { TriagePipeline } from "../../domain/triage/triagePipeline";
import type {
    AnalyticsSnapshot,
    AuditLogger,
    BatchSummary,
    Clock,
    MailGateway,
    RecordStore,
    StoredTriageRecord,
    TriageResult,
} from "../../domain/triage/types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type FetchAndProcessResult = {
    items: TriageResult[];
    stats: BatchSummary;
};

export type SendResponseInput = {
    recipient: string;
    subject: string;
    response: string;
};

export class TriageService {
    constructor(
        private readonly deps: {
            gateway: MailGateway;
            pipeline: TriagePipeline;
            store: RecordStore;
            log: AuditLogger;
            now?: Clock;
        }
    ) {}

    async fetchAndProcess(daysBack: number): Promise<FetchAndProcessResult> {
        const now = this.deps.now?.() ?? new Date();
        const since = new Date(now.getTime() - daysBack * DAY_MS);
        const messages = await this.deps.gateway.fetchSince(since);
        const batch = await this.deps.pipeline.run(messages);

        return {
            items: batch.map((item) => item.result),
            stats: summarizeBatch(batch),
        };
    }

    /**
     * Sends the reply and, only when the send is confirmed, flips matching
     * records to `sent`. A store failure after a successful send is logged;
     * the mail has gone out so the caller still sees success.
     */
    async sendResponse(input: SendResponseInput): Promise<boolean> {
        const success = await this.deps.gateway.send(input.recipient, input.subject, input.response);
        if (!success) {
            return false;
        }

        try {
            const updated = this.deps.store.markSent(input.recipient, input.subject);
            this.deps.log("response_sent", { recipient: input.recipient, updatedRecords: updated });
        } catch (err) {
            this.deps.log("response_mark_sent_failed", {
                recipient: input.recipient,
                reason: errorMessage(err),
            });
        }
        return true;
    }

    listRecords(days: number): StoredTriageRecord[] {
        return this.deps.store.listSince(days);
    }

    analytics(): AnalyticsSnapshot {
        return buildAnalyticsSnapshot(this.deps.store.querySince(ANALYTICS_WINDOW_DAYS));
    }
}
