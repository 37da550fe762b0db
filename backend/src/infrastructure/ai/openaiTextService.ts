import OpenAI from "openai";
import { ExternalServiceFailure, errorMessage } from "../../domain/errors";
import type { GenerativeTextService } from "../../domain/triage/types";

export type OpenAITextServiceOptions = {
    apiKey?: string;
    model: string;
    timeoutMs: number;
    classifyMaxTokens?: number;
    completeMaxTokens?: number;
};

type ChatMessage = {
    role: "system" | "user";
    content: string;
};

/**
 * Chat-completions backed text service. Without an API key every call fails
 * with `ExternalServiceFailure`, which callers treat as a cue to fall back.
 */
export class OpenAITextService implements GenerativeTextService {
    private client: OpenAI | null = null;

    constructor(private readonly options: OpenAITextServiceOptions) {}

    async classify(text: string, labels: readonly string[], instruction: string): Promise<string> {
        const reply = await this.chat(
            [
                { role: "system", content: instruction },
                { role: "user", content: text },
            ],
            this.options.classifyMaxTokens ?? 10
        );
        const label = reply.trim().toLowerCase();
        if (!labels.includes(label)) {
            throw new ExternalServiceFailure(`Classifier answered with an unknown label: ${label.slice(0, 40)}`);
        }
        return label;
    }

    async complete(instruction: string): Promise<string> {
        return this.chat([{ role: "user", content: instruction }], this.options.completeMaxTokens ?? 300);
    }

    private getClient(): OpenAI {
        const apiKey = this.options.apiKey?.trim();
        if (!apiKey) {
            throw new ExternalServiceFailure("OPENAI_API_KEY missing. Add OPENAI_API_KEY to .env.");
        }

        if (!this.client) {
            this.client = new OpenAI({ apiKey, maxRetries: 0, timeout: this.options.timeoutMs });
        }

        return this.client;
    }

    private async chat(messages: ChatMessage[], maxTokens: number): Promise<string> {
        const client = this.getClient();
        let content: string | null | undefined;
        try {
            const response = await client.chat.completions.create(
                {
                    model: this.options.model,
                    messages,
                    max_tokens: maxTokens,
                },
                { timeout: this.options.timeoutMs }
            );
            content = response.choices[0]?.message?.content;
        } catch (err) {
            throw new ExternalServiceFailure(`OpenAI request failed: ${errorMessage(err)}`, { cause: err });
        }

        if (!content) {
            throw new ExternalServiceFailure("OpenAI returned an empty completion");
        }
        return content.trim();
    }
}
