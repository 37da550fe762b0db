import { describe, it, expect } from "vitest";
import { SENTIMENT_INSTRUCTION, TextSignalClassifier } from "../../../src/domain/triage/signalClassifier";
import { createTriageConfig, type TriageConfig } from "../../../src/domain/triage/triageConfig";
import { SENTIMENTS } from "../../../src/domain/triage/types";
import { FakeTextService, recordingLogger } from "../../helpers/fakes";

function classifierWith(service: FakeTextService, overrides: Partial<TriageConfig> = {}) {
    const { log, entries } = recordingLogger();
    const classifier = new TextSignalClassifier(service, createTriageConfig({ aiTimeoutMs: 50, ...overrides }), log);
    return { classifier, entries };
}

describe("TextSignalClassifier.classifySentiment", () => {
    it("accepts a normalized label from the text service", async () => {
        const service = new FakeTextService({ classify: async () => "  Positive\n" });
        const { classifier } = classifierWith(service);

        await expect(classifier.classifySentiment("anything")).resolves.toBe("positive");
        expect(service.classifyCalls).toEqual([
            { text: "anything", labels: SENTIMENTS, instruction: SENTIMENT_INSTRUCTION },
        ]);
    });

    it("falls back to keywords when the label is unrecognized", async () => {
        const service = new FakeTextService({ classify: async () => "mixed feelings" });
        const { classifier, entries } = classifierWith(service);

        const sentiment = await classifier.classifySentiment(
            "This is terrible and I am frustrated, but the docs are good"
        );

        expect(sentiment).toBe("negative");
        expect(entries).toEqual([
            { event: "sentiment_fallback", fields: { reason: "unrecognized_label", label: "mixed feelings" } },
        ]);
    });

    it("falls back to keywords when the service fails", async () => {
        const { classifier, entries } = classifierWith(new FakeTextService());

        await expect(classifier.classifySentiment("Great product but bad docs")).resolves.toBe("neutral");
        expect(entries[0]).toEqual({ event: "sentiment_fallback", fields: { reason: "classifier unreachable" } });
    });

    it("treats a call that outlives the timeout as a failure", async () => {
        const service = new FakeTextService({ classify: () => new Promise<string>(() => undefined) });
        const { classifier, entries } = classifierWith(service, { aiTimeoutMs: 10 });

        await expect(classifier.classifySentiment("I love it, amazing")).resolves.toBe("positive");
        expect(entries[0]?.fields.reason).toBe("Sentiment classification timed out after 10ms");
    });
});

describe("TextSignalClassifier.fallbackSentiment", () => {
    const { classifier } = classifierWith(new FakeTextService());

    it("returns negative for two negative words against one positive", () => {
        expect(classifier.fallbackSentiment("I am ANGRY and disappointed, though the app was good")).toBe("negative");
    });

    it("returns positive when positive words outnumber negative ones", () => {
        expect(classifier.fallbackSentiment("Excellent support, very happy")).toBe("positive");
    });

    it("returns neutral on a tie", () => {
        expect(classifier.fallbackSentiment("great but bad")).toBe("neutral");
    });

    it("returns neutral when nothing matches", () => {
        expect(classifier.fallbackSentiment("Please send the invoice copy")).toBe("neutral");
    });

    it("counts each list word once however often it repeats", () => {
        expect(classifier.fallbackSentiment("bad bad bad, but good and great")).toBe("positive");
    });
});

describe("TextSignalClassifier.classifyPriority", () => {
    const { classifier } = classifierWith(new FakeTextService());

    it("is urgent when only the subject carries a keyword", () => {
        expect(classifier.classifyPriority("Please reply ASAP", "hello")).toBe("urgent");
    });

    it("matches multi-word keywords in the body", () => {
        expect(classifier.classifyPriority("Dashboard", "I cannot access my dashboard")).toBe("urgent");
    });

    it("is normal without any urgent keyword", () => {
        expect(classifier.classifyPriority("Question", "How do I export my data?")).toBe("normal");
    });

    it("uses the configured keyword set", () => {
        const { classifier: custom } = classifierWith(new FakeTextService(), { urgentKeywords: ["sev1"] });

        expect(custom.classifyPriority("SEV1 incident", "")).toBe("urgent");
        expect(custom.classifyPriority("urgent", "")).toBe("normal");
    });
});
