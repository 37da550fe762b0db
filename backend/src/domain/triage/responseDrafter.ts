import { ExternalServiceFailure, errorMessage } from "../errors";
import { withTimeout } from "../../utils/async";
import type { TriageConfig } from "./triageConfig";
import type { AuditLogger, Clock, GenerativeTextService, InboundMessage, Priority, Sentiment } from "./types";

export const CASE_NUMBER_PREFIX = "CS";

const SIGNATURE = "Best regards,\nAI Support Assistant";

function pad(value: number): string {
    return String(value).padStart(2, "0");
}

/** `CS` + local wall-clock time as YYYYMMDDHHMMSS. */
export function formatCaseNumber(at: Date): string {
    return [
        CASE_NUMBER_PREFIX,
        at.getFullYear(),
        pad(at.getMonth() + 1),
        pad(at.getDate()),
        pad(at.getHours()),
        pad(at.getMinutes()),
        pad(at.getSeconds()),
    ].join("");
}

export function senderDisplayName(sender: string): string {
    return (sender.split("@")[0] ?? "").replace(/[<>]/g, "");
}

export function buildDraftInstruction(message: InboundMessage, sentiment: Sentiment, priority: Priority): string {
    return `Generate a professional customer support email response for the following:

Customer Email:
From: ${message.sender}
Subject: ${message.subject}
Content: ${message.body}

Context:
- Sentiment: ${sentiment}
- Priority: ${priority}

Guidelines:
- Be professional and empathetic
- Address the customer's concern directly
- If sentiment is negative, acknowledge frustration
- If priority is urgent, emphasize immediate action
- Include next steps and timeline
- Add a case number

Generate only the email response:`;
}

export class ResponseDrafter {
    constructor(
        private readonly textService: GenerativeTextService,
        private readonly config: TriageConfig,
        private readonly log: AuditLogger,
        private readonly now: Clock = () => new Date()
    ) {}

    async draft(message: InboundMessage, sentiment: Sentiment, priority: Priority): Promise<string> {
        try {
            const completion = await withTimeout(
                this.textService.complete(buildDraftInstruction(message, sentiment, priority)),
                this.config.aiTimeoutMs,
                "Response drafting"
            );
            const text = completion.trim();
            if (!text) {
                throw new ExternalServiceFailure("Drafting service returned an empty response");
            }
            return text;
        } catch (err) {
            this.log("draft_fallback", { reason: errorMessage(err), priority, sentiment });
            return this.fallbackDraft(message, sentiment, priority);
        }
    }

    fallbackDraft(message: InboundMessage, sentiment: Sentiment, priority: Priority): string {
        const name = senderDisplayName(message.sender);
        const caseNumber = formatCaseNumber(this.now());

        if (priority === "urgent" && sentiment === "negative") {
            return `Dear ${name},

Thank you for reaching out, and I sincerely apologize for the inconvenience you're experiencing. I understand how critical this situation is for you.

I've escalated your case as urgent and our priority support team is now handling your request. We're treating this as a high-priority issue and will work to resolve it as quickly as possible.

You can expect an update within the next 2 hours with a resolution or detailed action plan.

Case Number: ${caseNumber}

${SIGNATURE}`;
        }

        const timeline = priority === "urgent" ? "2 hours" : "24 hours";
        const commitment =
            priority === "urgent"
                ? `Given the urgent nature of your request, we'll provide you with a comprehensive response within ${timeline}.`
                : `We'll provide you with a comprehensive response within ${timeline}.`;

        return `Dear ${name},

Thank you for contacting our support team. I've received your inquiry and our team is reviewing your request.

${commitment}

Case Number: ${caseNumber}

${SIGNATURE}`;
    }
}
