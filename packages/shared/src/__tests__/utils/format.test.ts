import { formatConversation, formatHistory, formatReviewHeader, formatSelection } from '../../utils/format.js';

describe('formatConversation', () => {
    it('returns a placeholder for an empty conversation', () => {
        expect(formatConversation([])).toBe('No previous conversation.');
    });

    it('prefixes each message with its upper-cased role', () => {
        const text = formatConversation([
            { role: 'user', content: 'What changed?' },
            { role: 'assistant', content: 'The parser.' },
        ]);
        expect(text).toBe('USER: What changed?\nASSISTANT: The parser.');
    });
});

describe('formatHistory', () => {
    it('returns a placeholder when there is no history', () => {
        expect(formatHistory([])).toBe('No previous conversation.');
    });

    it('numbers question/answer pairs', () => {
        const text = formatHistory([
            { question: 'Where is main?', answer: 'src/index.ts' },
            { question: 'Any tests?', answer: 'Yes' },
        ]);
        expect(text).toBe(
            'Previous conversation:\n\nQ1: Where is main?\nA1: src/index.ts\n\nQ2: Any tests?\nA2: Yes',
        );
    });
});

describe('formatSelection', () => {
    it('describes the whole changeset when nothing is selected', () => {
        expect(formatSelection()).toBe('No specific selection (reviewing entire changeset).');
    });

    it('describes a selected range', () => {
        const text = formatSelection({
            path: 'src/app.ts',
            side: 'additions',
            start_line: 4,
            end_line: 9,
            mode: 'range',
        });
        expect(text).toBe('Selected: src/app.ts (additions) lines 4-9 (range)');
    });
});

describe('formatReviewHeader', () => {
    it('falls back when the body is empty', () => {
        expect(formatReviewHeader({ number: 7, title: 'Fix parser', body: '' })).toBe(
            'PR #7: Fix parser\nNo description',
        );
    });
});
