import { combinedText, containsAnyKeyword } from "./triageConfig";
import type { InboundMessage } from "./types";

export function isSupportRelevant(message: InboundMessage, supportKeywords: readonly string[]): boolean {
    return containsAnyKeyword(combinedText(message.subject, message.body), supportKeywords);
}

export function filterSupportMessages(
    messages: readonly InboundMessage[],
    supportKeywords: readonly string[]
): InboundMessage[] {
    return messages.filter((message) => isSupportRelevant(message, supportKeywords));
}
