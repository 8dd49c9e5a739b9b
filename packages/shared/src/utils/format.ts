import type { ConversationMessage } from '../types/answer.js';
import type { HistoryTurn } from '../types/codebase.js';
import type { DiffSelection } from '../types/diff.js';
import type { ReviewInfo } from '../types/review.js';

export function formatConversation(messages: ConversationMessage[]): string {
    if (messages.length === 0) {
        return 'No previous conversation.';
    }
    return messages.map((m) => `${m.role.toUpperCase()}: ${m.content}`).join('\n');
}

export function formatHistory(turns: HistoryTurn[]): string {
    if (turns.length === 0) {
        return 'No previous conversation.';
    }

    const lines: string[] = ['Previous conversation:'];
    turns.forEach((turn, i) => {
        lines.push('', `Q${i + 1}: ${turn.question}`, `A${i + 1}: ${turn.answer}`);
    });
    return lines.join('\n');
}

export function formatSelection(selection?: DiffSelection): string {
    if (!selection) {
        return 'No specific selection (reviewing entire changeset).';
    }
    return (
        `Selected: ${selection.path} (${selection.side}) ` +
        `lines ${selection.start_line}-${selection.end_line} (${selection.mode})`
    );
}

export function formatReviewHeader(info: Pick<ReviewInfo, 'number' | 'title' | 'body'>): string {
    return `PR #${info.number}: ${info.title}\n${info.body || 'No description'}`;
}
