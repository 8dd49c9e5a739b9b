import { type ModelError, errorMessage, modelError } from '@code-inquiry/shared';
import { ResultAsync } from 'neverthrow';
import { z } from 'zod';
import type { ChatModel, ChatRequest } from './chat-model.js';

export interface OpenAiCompatibleConfig {
    baseUrl: string;
    apiKey?: string;
    model: string;
    timeoutMs: number;
}

const completionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable().optional(),
                }),
            }),
        )
        .min(1),
});

class ModelRequestError extends Error {
    constructor(
        message: string,
        readonly timedOut = false,
    ) {
        super(message);
    }
}

function normalizeBaseUrl(baseUrl: string): string {
    return baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
}

/** `POST {baseUrl}/chat/completions` against any OpenAI-compatible endpoint. */
export class OpenAiCompatibleModel implements ChatModel {
    readonly name: string;

    constructor(private config: OpenAiCompatibleConfig) {
        this.name = config.model;
    }

    complete(request: ChatRequest): ResultAsync<string, ModelError> {
        return ResultAsync.fromPromise(this.send(request), (e) =>
            modelError(
                e instanceof ModelRequestError && e.timedOut
                    ? `Model ${this.config.model} timed out after ${this.config.timeoutMs}ms`
                    : `Model ${this.config.model} request failed: ${errorMessage(e)}`,
                e,
            ),
        );
    }

    private async send(request: ChatRequest): Promise<string> {
        const url = new URL('chat/completions', normalizeBaseUrl(this.config.baseUrl)).toString();
        const headers: Record<string, string> = { 'content-type': 'application/json' };
        if (this.config.apiKey) {
            headers['authorization'] = `Bearer ${this.config.apiKey}`;
        }

        const body = {
            model: this.config.model,
            messages: request.messages,
            temperature: request.temperature,
            response_format: request.json ? { type: 'json_object' } : undefined,
        };

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
        try {
            const response = await fetch(url, {
                method: 'POST',
                headers,
                body: JSON.stringify(body),
                signal: controller.signal,
            });
            if (!response.ok) {
                throw new ModelRequestError(`HTTP ${response.status}: ${await response.text()}`);
            }

            const parsed = completionSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw new ModelRequestError('Malformed completion response');
            }
            return parsed.data.choices[0].message.content ?? '';
        } catch (e) {
            if (controller.signal.aborted) {
                throw new ModelRequestError('aborted', true);
            }
            throw e;
        } finally {
            clearTimeout(timeout);
        }
    }
}
