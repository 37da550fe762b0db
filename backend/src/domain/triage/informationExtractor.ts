import { combinedText } from "./triageConfig";
import type { InboundMessage } from "./types";

export type RequestCategory =
    | "Billing Issue"
    | "Account Access"
    | "Technical Integration"
    | "Refund Request"
    | "Pricing Inquiry"
    | "General Support";

type CategoryRule = {
    matches: (lowerText: string) => boolean;
    category: RequestCategory;
};

function anyOf(...keywords: string[]): (lowerText: string) => boolean {
    return (lowerText) => keywords.some((keyword) => lowerText.includes(keyword));
}

/** Evaluated top to bottom; the first match wins. */
export const REQUEST_TYPE_RULES: readonly CategoryRule[] = [
    { matches: anyOf("billing", "payment"), category: "Billing Issue" },
    { matches: anyOf("login", "account"), category: "Account Access" },
    { matches: anyOf("integration", "api"), category: "Technical Integration" },
    { matches: anyOf("refund"), category: "Refund Request" },
    { matches: anyOf("pricing"), category: "Pricing Inquiry" },
];

export const DEFAULT_REQUEST_CATEGORY: RequestCategory = "General Support";

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const PHONE_PATTERN = /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g;

export function categorizeRequest(text: string): RequestCategory {
    const lower = text.toLowerCase();
    return REQUEST_TYPE_RULES.find((rule) => rule.matches(lower))?.category ?? DEFAULT_REQUEST_CATEGORY;
}

export class InformationExtractor {
    extract(message: InboundMessage): string[] {
        const text = combinedText(message.subject, message.body);
        const info: string[] = [];

        const contacts = text.match(EMAIL_PATTERN) ?? [];
        if (contacts.length > 0) {
            info.push(`Contact: ${contacts.join(", ")}`);
        }

        const phones = text.match(PHONE_PATTERN) ?? [];
        if (phones.length > 0) {
            info.push(`Phone: ${phones.join(", ")}`);
        }

        info.push(`Request Type: ${categorizeRequest(text)}`);
        return info;
    }
}
