export type LoopState = 'INIT' | 'ITERATING' | 'DONE' | 'EXHAUSTED' | 'TERMINATED';

export type LoopSignal = 'start' | 'continue' | 'submitted' | 'finish' | 'cancel' | 'fail';

export interface LoopBudget {
    maxIterations: number;
    maxLlmCalls: number;
}

export interface LoopUsage {
    iterations: number;
    llmCalls: number;
}

/** One model call is always held back for fallback extraction. */
export function canCallModel(usage: LoopUsage, budget: LoopBudget): boolean {
    return usage.llmCalls + 1 < budget.maxLlmCalls;
}

export function canStartRound(usage: LoopUsage, budget: LoopBudget): boolean {
    return usage.iterations < budget.maxIterations && canCallModel(usage, budget);
}

export function canExtract(usage: LoopUsage, budget: LoopBudget): boolean {
    return usage.llmCalls < budget.maxLlmCalls;
}

/**
 * INIT → ITERATING → {DONE | EXHAUSTED} → TERMINATED.
 * `cancel` and `fail` end the run from any live state. Anything else is a programming error.
 */
export function transition(state: LoopState, signal: LoopSignal, usage: LoopUsage, budget: LoopBudget): LoopState {
    if (state !== 'TERMINATED' && (signal === 'cancel' || signal === 'fail')) {
        return 'TERMINATED';
    }

    switch (state) {
        case 'INIT':
            if (signal === 'start') return canStartRound(usage, budget) ? 'ITERATING' : 'EXHAUSTED';
            break;
        case 'ITERATING':
            if (signal === 'submitted') return 'DONE';
            if (signal === 'continue') return canStartRound(usage, budget) ? 'ITERATING' : 'EXHAUSTED';
            break;
        case 'DONE':
        case 'EXHAUSTED':
            if (signal === 'finish') return 'TERMINATED';
            break;
        case 'TERMINATED':
            break;
    }
    throw new Error(`Invalid loop transition: ${state} on ${signal}`);
}
