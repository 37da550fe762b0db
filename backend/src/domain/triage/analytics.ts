import type { AnalyticsSnapshot, BatchSummary, StoredRecordRow, TriageBatchItem } from "./types";

export const ANALYTICS_WINDOW_DAYS = 7;

export function summarizeBatch(items: readonly TriageBatchItem[]): BatchSummary {
    const results = items.map((item) => item.result);
    return {
        total: results.length,
        urgent: results.filter((r) => r.priority === "urgent").length,
        normal: results.filter((r) => r.priority === "normal").length,
        positive: results.filter((r) => r.sentiment === "positive").length,
        negative: results.filter((r) => r.sentiment === "negative").length,
        neutral: results.filter((r) => r.sentiment === "neutral").length,
        persistFailures: items.filter((item) => !item.persisted).length,
    };
}

export function buildAnalyticsSnapshot(rows: readonly StoredRecordRow[]): AnalyticsSnapshot {
    const count = (predicate: (row: StoredRecordRow) => boolean) => rows.filter(predicate).length;
    return {
        sentimentDistribution: {
            positive: count((row) => row.sentiment === "positive"),
            negative: count((row) => row.sentiment === "negative"),
            neutral: count((row) => row.sentiment === "neutral"),
        },
        priorityDistribution: {
            urgent: count((row) => row.priority === "urgent"),
            normal: count((row) => row.priority === "normal"),
        },
        statusDistribution: {
            pending: count((row) => row.status === "pending"),
            sent: count((row) => row.status === "sent"),
        },
    };
}
