import { describe, it, expect } from "vitest";
import { buildAnalyticsSnapshot, summarizeBatch } from "../../../src/domain/triage/analytics";
import type { TriageBatchItem, TriageResult } from "../../../src/domain/triage/types";

function result(overrides: Partial<TriageResult>): TriageResult {
    return {
        sender: "a@example.com",
        subject: "help",
        body: "",
        sentDate: "2024-01-01",
        sentiment: "neutral",
        priority: "normal",
        extractedInfo: ["Request Type: General Support"],
        aiResponse: "ok",
        status: "pending",
        ...overrides,
    };
}

describe("summarizeBatch", () => {
    it("counts priorities, sentiments and failed writes", () => {
        const items: TriageBatchItem[] = [
            { result: result({ priority: "urgent", sentiment: "negative" }), persisted: true },
            { result: result({ priority: "urgent", sentiment: "positive" }), persisted: false },
            { result: result({}), persisted: true },
        ];

        expect(summarizeBatch(items)).toEqual({
            total: 3,
            urgent: 2,
            normal: 1,
            positive: 1,
            negative: 1,
            neutral: 1,
            persistFailures: 1,
        });
    });

    it("reports zeros for an empty batch", () => {
        expect(summarizeBatch([])).toEqual({
            total: 0,
            urgent: 0,
            normal: 0,
            positive: 0,
            negative: 0,
            neutral: 0,
            persistFailures: 0,
        });
    });
});

describe("buildAnalyticsSnapshot", () => {
    it("builds distributions from stored rows", () => {
        const createdAt = "2024-01-01T00:00:00.000Z";
        const snapshot = buildAnalyticsSnapshot([
            { sentiment: "negative", priority: "urgent", status: "sent", createdAt },
            { sentiment: "negative", priority: "normal", status: "pending", createdAt },
            { sentiment: "positive", priority: "normal", status: "pending", createdAt },
        ]);

        expect(snapshot).toEqual({
            sentimentDistribution: { positive: 1, negative: 2, neutral: 0 },
            priorityDistribution: { urgent: 1, normal: 2 },
            statusDistribution: { pending: 2, sent: 1 },
        });
    });
});
