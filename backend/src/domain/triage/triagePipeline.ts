import { errorMessage } from "../errors";
import { runBatch } from "../../utils/async";
import { InformationExtractor } from "./informationExtractor";
import { ResponseDrafter } from "./responseDrafter";
import { TextSignalClassifier } from "./signalClassifier";
import { filterSupportMessages } from "./supportFilter";
import { combinedText, type TriageConfig } from "./triageConfig";
import type {
    AuditLogger,
    Clock,
    GenerativeTextService,
    InboundMessage,
    RecordStore,
    TriageBatchItem,
    TriageResult,
} from "./types";

export type TriagePipelineDeps = {
    textService: GenerativeTextService;
    store: RecordStore;
    config: TriageConfig;
    log: AuditLogger;
    now?: Clock;
};

function compareSentDate(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

type OrderKeys = Pick<TriageResult, "priority" | "sentDate">;

/**
 * Urgent first, then ascending raw `sentDate` strings. Array#sort is stable,
 * so equal keys keep fetch order.
 */
export function orderByPriority<T>(items: readonly T[], keysOf: (item: T) => OrderKeys): T[] {
    return [...items].sort((left, right) => {
        const a = keysOf(left);
        const b = keysOf(right);
        const tierA = a.priority !== "urgent" ? 1 : 0;
        const tierB = b.priority !== "urgent" ? 1 : 0;
        if (tierA !== tierB) {
            return tierA - tierB;
        }
        return compareSentDate(a.sentDate, b.sentDate);
    });
}

export class TriagePipeline {
    private readonly classifier: TextSignalClassifier;
    private readonly extractor: InformationExtractor;
    private readonly drafter: ResponseDrafter;
    private readonly store: RecordStore;
    private readonly config: TriageConfig;
    private readonly log: AuditLogger;

    constructor(deps: TriagePipelineDeps) {
        this.store = deps.store;
        this.config = deps.config;
        this.log = deps.log;
        this.classifier = new TextSignalClassifier(deps.textService, deps.config, deps.log);
        this.extractor = new InformationExtractor();
        this.drafter = new ResponseDrafter(deps.textService, deps.config, deps.log, deps.now);
    }

    async process(messages: readonly InboundMessage[]): Promise<TriageResult[]> {
        const items = await this.run(messages);
        return items.map((item) => item.result);
    }

    async run(messages: readonly InboundMessage[]): Promise<TriageBatchItem[]> {
        const relevant = filterSupportMessages(messages, this.config.supportKeywords);
        const items = await runBatch(relevant, (message) => this.triageOne(message), this.config.aiConcurrency);
        const ordered = orderByPriority(items, (item) => item.result);

        this.log("triage_batch_processed", {
            received: messages.length,
            relevant: relevant.length,
            persistFailures: items.filter((item) => !item.persisted).length,
        });

        return ordered;
    }

    async triage(message: InboundMessage): Promise<TriageResult> {
        const priority = this.classifier.classifyPriority(message.subject, message.body);
        const sentiment = await this.classifier.classifySentiment(combinedText(message.subject, message.body));
        const extractedInfo = this.extractor.extract(message);
        const aiResponse = await this.drafter.draft(message, sentiment, priority);

        return {
            sender: message.sender,
            subject: message.subject,
            body: message.body,
            sentDate: message.sentDate,
            sentiment,
            priority,
            extractedInfo,
            aiResponse,
            status: "pending",
        };
    }

    private async triageOne(message: InboundMessage): Promise<TriageBatchItem> {
        const result = await this.triage(message);
        return { result, persisted: this.persist(result) };
    }

    private persist(result: TriageResult): boolean {
        try {
            this.store.insert(result);
            return true;
        } catch (err) {
            this.log("triage_persist_failed", {
                sender: result.sender,
                subject: result.subject,
                reason: errorMessage(err),
            });
            return false;
        }
    }
}

