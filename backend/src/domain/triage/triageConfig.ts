export type TriageConfig = {
    supportKeywords: readonly string[];
    urgentKeywords: readonly string[];
    positiveWords: readonly string[];
    negativeWords: readonly string[];
    aiTimeoutMs: number;
    aiConcurrency: number;
};

export const DEFAULT_SUPPORT_KEYWORDS = ["support", "query", "request", "help", "issue", "problem"] as const;

export const DEFAULT_URGENT_KEYWORDS = [
    "urgent",
    "critical",
    "immediate",
    "emergency",
    "asap",
    "cannot access",
    "down",
    "blocked",
    "failed",
    "error",
] as const;

export const POSITIVE_WORDS = ["good", "great", "excellent", "happy", "satisfied", "love", "amazing"] as const;

export const NEGATIVE_WORDS = [
    "bad",
    "terrible",
    "frustrated",
    "angry",
    "disappointed",
    "problem",
    "issue",
    "cannot",
    "unable",
] as const;

export const DEFAULT_TRIAGE_CONFIG: TriageConfig = {
    supportKeywords: DEFAULT_SUPPORT_KEYWORDS,
    urgentKeywords: DEFAULT_URGENT_KEYWORDS,
    positiveWords: POSITIVE_WORDS,
    negativeWords: NEGATIVE_WORDS,
    aiTimeoutMs: 15_000,
    aiConcurrency: 4,
};

export function createTriageConfig(overrides: Partial<TriageConfig> = {}): TriageConfig {
    return {
        ...DEFAULT_TRIAGE_CONFIG,
        ...overrides,
    };
}

export function containsAnyKeyword(text: string, keywords: readonly string[]): boolean {
    const haystack = text.toLowerCase();
    return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

export function combinedText(subject: string, body: string): string {
    return `${subject} ${body}`;
}
