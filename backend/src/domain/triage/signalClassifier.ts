import { errorMessage } from "../errors";
import { withTimeout } from "../../utils/async";
import { combinedText, containsAnyKeyword, type TriageConfig } from "./triageConfig";
import {
    SENTIMENTS,
    type AuditLogger,
    type GenerativeTextService,
    type Priority,
    type Sentiment,
} from "./types";

export const SENTIMENT_INSTRUCTION =
    "Analyze the sentiment of the following text. Respond with only: positive, negative, or neutral";

function isSentiment(value: string): value is Sentiment {
    return SENTIMENTS.some((sentiment) => sentiment === value);
}

function countPresentWords(text: string, words: readonly string[]): number {
    return words.filter((word) => text.includes(word.toLowerCase())).length;
}

export class TextSignalClassifier {
    constructor(
        private readonly textService: GenerativeTextService,
        private readonly config: TriageConfig,
        private readonly log: AuditLogger
    ) {}

    async classifySentiment(text: string): Promise<Sentiment> {
        try {
            const reply = await withTimeout(
                this.textService.classify(text, SENTIMENTS, SENTIMENT_INSTRUCTION),
                this.config.aiTimeoutMs,
                "Sentiment classification"
            );
            const label = reply.trim().toLowerCase();
            if (isSentiment(label)) {
                return label;
            }
            this.log("sentiment_fallback", { reason: "unrecognized_label", label: label.slice(0, 40) });
        } catch (err) {
            this.log("sentiment_fallback", { reason: errorMessage(err) });
        }
        return this.fallbackSentiment(text);
    }

    /** Keyword vote; each list word counts once however often it appears. */
    fallbackSentiment(text: string): Sentiment {
        const lower = text.toLowerCase();
        const positiveCount = countPresentWords(lower, this.config.positiveWords);
        const negativeCount = countPresentWords(lower, this.config.negativeWords);

        if (negativeCount > positiveCount) {
            return "negative";
        }
        if (positiveCount > negativeCount) {
            return "positive";
        }
        return "neutral";
    }

    classifyPriority(subject: string, body: string): Priority {
        return containsAnyKeyword(combinedText(subject, body), this.config.urgentKeywords) ? "urgent" : "normal";
    }
}
