import { canCallModel, canExtract, canStartRound, transition } from '../state-machine.js';

const budget = { maxIterations: 3, maxLlmCalls: 5 };

describe('budget checks', () => {
    it('holds one call back for extraction', () => {
        expect(canCallModel({ iterations: 0, llmCalls: 3 }, budget)).toBe(true);
        expect(canCallModel({ iterations: 0, llmCalls: 4 }, budget)).toBe(false);
        expect(canExtract({ iterations: 0, llmCalls: 4 }, budget)).toBe(true);
        expect(canExtract({ iterations: 0, llmCalls: 5 }, budget)).toBe(false);
    });

    it('stops rounds at the iteration cap', () => {
        expect(canStartRound({ iterations: 2, llmCalls: 2 }, budget)).toBe(true);
        expect(canStartRound({ iterations: 3, llmCalls: 3 }, budget)).toBe(false);
    });
});

describe('transition', () => {
    const fresh = { iterations: 0, llmCalls: 0 };

    it('starts iterating when a round fits', () => {
        expect(transition('INIT', 'start', fresh, budget)).toBe('ITERATING');
    });

    it('goes straight to EXHAUSTED when no round fits', () => {
        expect(transition('INIT', 'start', fresh, { maxIterations: 0, maxLlmCalls: 5 })).toBe('EXHAUSTED');
        expect(transition('INIT', 'start', fresh, { maxIterations: 3, maxLlmCalls: 1 })).toBe('EXHAUSTED');
    });

    it('continues or exhausts after a round', () => {
        expect(transition('ITERATING', 'continue', { iterations: 1, llmCalls: 1 }, budget)).toBe('ITERATING');
        expect(transition('ITERATING', 'continue', { iterations: 3, llmCalls: 3 }, budget)).toBe('EXHAUSTED');
    });

    it('moves to DONE on submit and TERMINATED on finish', () => {
        expect(transition('ITERATING', 'submitted', fresh, budget)).toBe('DONE');
        expect(transition('DONE', 'finish', fresh, budget)).toBe('TERMINATED');
        expect(transition('EXHAUSTED', 'finish', fresh, budget)).toBe('TERMINATED');
    });

    it('terminates on cancel or fail from any live state', () => {
        expect(transition('INIT', 'cancel', fresh, budget)).toBe('TERMINATED');
        expect(transition('ITERATING', 'fail', fresh, budget)).toBe('TERMINATED');
        expect(transition('EXHAUSTED', 'cancel', fresh, budget)).toBe('TERMINATED');
    });

    it('rejects invalid transitions', () => {
        expect(() => transition('INIT', 'finish', fresh, budget)).toThrow('Invalid loop transition: INIT on finish');
        expect(() => transition('TERMINATED', 'cancel', fresh, budget)).toThrow(
            'Invalid loop transition: TERMINATED on cancel',
        );
    });
});
