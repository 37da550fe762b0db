export const SENTIMENTS = ["positive", "negative", "neutral"] as const;
export const PRIORITIES = ["urgent", "normal"] as const;
export const RECORD_STATUSES = ["pending", "sent"] as const;

export type Sentiment = (typeof SENTIMENTS)[number];
export type Priority = (typeof PRIORITIES)[number];
export type RecordStatus = (typeof RECORD_STATUSES)[number];

export type InboundMessage = {
    readonly sender: string;
    readonly subject: string;
    readonly body: string;
    readonly sentDate: string;
};

export type TriageResult = InboundMessage & {
    sentiment: Sentiment;
    priority: Priority;
    extractedInfo: string[];
    aiResponse: string;
    status: RecordStatus;
};

export type StoredTriageRecord = TriageResult & {
    id: number;
    createdAt: string;
};

export type TriageBatchItem = {
    result: TriageResult;
    persisted: boolean;
};

export type StoredRecordRow = {
    sentiment: string;
    priority: string;
    status: string;
    createdAt: string;
};

export type BatchSummary = {
    total: number;
    urgent: number;
    normal: number;
    positive: number;
    negative: number;
    neutral: number;
    persistFailures: number;
};

export type AnalyticsSnapshot = {
    sentimentDistribution: Record<Sentiment, number>;
    priorityDistribution: Record<Priority, number>;
    statusDistribution: Record<RecordStatus, number>;
};

export interface MailGateway {
    /** Never throws: transport failures yield an empty list. */
    fetchSince(since: Date): Promise<InboundMessage[]>;
    /** Never throws: transport failures yield `false`. */
    send(to: string, subject: string, body: string): Promise<boolean>;
}

export interface GenerativeTextService {
    classify(text: string, labels: readonly string[], instruction: string): Promise<string>;
    complete(instruction: string): Promise<string>;
}

export interface RecordStore {
    insert(result: TriageResult): void;
    markSent(sender: string, subject: string): number;
    querySince(days: number): StoredRecordRow[];
    listSince(days: number): StoredTriageRecord[];
}

export type AuditLogger = (event: string, fields?: Record<string, unknown>) => void;

export type Clock = () => Date;
