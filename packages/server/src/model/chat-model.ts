import type { ModelError } from '@code-inquiry/shared';
import type { ResultAsync } from 'neverthrow';

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface ChatRequest {
    messages: ChatMessage[];
    /** Ask the endpoint for a JSON object reply. */
    json?: boolean;
    temperature?: number;
}

/** Text-generation collaborator. Every call is bounded by a timeout; a timeout is a ModelError. */
export interface ChatModel {
    readonly name: string;
    complete(request: ChatRequest): ResultAsync<string, ModelError>;
}
