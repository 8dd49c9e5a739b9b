import { type IterationRecord, type ModelError, modelError } from '@code-inquiry/shared';
import { err, ok, type Result } from 'neverthrow';
import type { ChatModel } from '../model/chat-model.js';
import type { Sandbox, SandboxFactory, SandboxTools } from '../sandbox/sandbox.interface.js';
import { parseAction, parseFinalFields } from './action-parser.js';
import { buildFallbackMessages, buildRoundMessages, type LoopTask } from './prompts.js';
import {
    canCallModel,
    canExtract,
    type LoopBudget,
    type LoopState,
    type LoopUsage,
    transition,
} from './state-machine.js';

export interface LoopOptions extends LoopBudget {
    maxOutputChars: number;
}

export interface LoopDependencies {
    model: ChatModel;
    /** Serves `llm_query` from inside the sandbox. */
    subModel: ChatModel;
    createSandbox: SandboxFactory;
}

export type LoopEvent =
    | { type: 'iteration'; record: IterationRecord }
    | { type: 'final'; fields: Record<string, unknown>; via: 'submit' | 'fallback'; usage: LoopUsage }
    | { type: 'cancelled'; usage: LoopUsage }
    | { type: 'error'; error: ModelError; usage: LoopUsage };

interface RoundOutcome {
    record: IterationRecord;
    submitted: Record<string, unknown> | null;
}

function appendLine(output: string, line: string): string {
    return output ? `${output}\n${line}` : line;
}

/**
 * Drives generate → execute rounds until the code calls SUBMIT or a budget runs out, then
 * falls back to a single extraction call. Rounds are strictly sequential. Sandbox exceptions
 * become `[Error]` observations; model failures end the run with an `error` event.
 */
export class ReasoningLoop {
    constructor(
        private deps: LoopDependencies,
        private options: LoopOptions,
    ) {}

    async *run(task: LoopTask, signal?: AbortSignal): AsyncGenerator<LoopEvent> {
        const usage: LoopUsage = { iterations: 0, llmCalls: 0 };
        const history: IterationRecord[] = [];
        const sandbox = this.deps.createSandbox();
        let submitted: Record<string, unknown> = {};
        let state: LoopState = 'INIT';

        try {
            while (state !== 'TERMINATED') {
                if (signal?.aborted && state !== 'DONE') {
                    state = transition(state, 'cancel', usage, this.options);
                    yield { type: 'cancelled', usage: { ...usage } };
                    break;
                }

                switch (state) {
                    case 'INIT':
                        state = transition(state, 'start', usage, this.options);
                        break;

                    case 'ITERATING': {
                        const round = await this.runRound(task, history, usage, sandbox);
                        if (round.isErr()) {
                            state = transition(state, 'fail', usage, this.options);
                            yield { type: 'error', error: round.error, usage: { ...usage } };
                            break;
                        }
                        history.push(round.value.record);
                        yield { type: 'iteration', record: round.value.record };

                        if (round.value.submitted) {
                            submitted = round.value.submitted;
                            state = transition(state, 'submitted', usage, this.options);
                        } else {
                            state = transition(state, 'continue', usage, this.options);
                        }
                        break;
                    }

                    case 'DONE':
                        state = transition(state, 'finish', usage, this.options);
                        yield { type: 'final', fields: submitted, via: 'submit', usage: { ...usage } };
                        break;

                    case 'EXHAUSTED': {
                        const extracted = await this.extract(task, history, usage);
                        if (extracted.isErr()) {
                            state = transition(state, 'fail', usage, this.options);
                            yield { type: 'error', error: extracted.error, usage: { ...usage } };
                            break;
                        }
                        state = transition(state, 'finish', usage, this.options);
                        yield { type: 'final', fields: extracted.value, via: 'fallback', usage: { ...usage } };
                        break;
                    }
                }
            }
        } finally {
            sandbox.dispose();
        }
    }

    private async runRound(
        task: LoopTask,
        history: IterationRecord[],
        usage: LoopUsage,
        sandbox: Sandbox,
    ): Promise<Result<RoundOutcome, ModelError>> {
        const index = usage.iterations + 1;
        usage.iterations++;
        usage.llmCalls++;

        const reply = await this.deps.model.complete({
            messages: buildRoundMessages(task, history, index, this.options.maxIterations),
            json: true,
        });
        if (reply.isErr()) return err(reply.error);

        const action = parseAction(reply.value);
        const failure: { error?: ModelError } = {};
        let subQueries = 0;
        const tools: SandboxTools = {
            llm_query: async (prompt) => {
                if (!canCallModel(usage, this.options)) {
                    throw new Error('LLM call budget exhausted');
                }
                usage.llmCalls++;
                subQueries++;
                const answer = await this.deps.subModel.complete({ messages: [{ role: 'user', content: prompt }] });
                if (answer.isErr()) {
                    failure.error = answer.error;
                    throw new Error(answer.error.message);
                }
                return answer.value;
            },
        };

        let output = '';
        let submitted: Record<string, unknown> | null = null;
        if (!action.code) {
            output = '[Error] The reply contained no code to run';
        } else {
            const execution = await sandbox.execute(action.code, { ...task.inputs, ...task.data }, tools);
            if (execution.isErr()) {
                output = `[Error] ${execution.error.message}`;
            } else {
                output = execution.value.output;
                if (execution.value.error) {
                    output = appendLine(output, `[Error] ${execution.value.error}`);
                } else {
                    submitted = execution.value.submitted;
                }
            }
        }

        if (failure.error) return err(failure.error);

        if (submitted) {
            const fields = submitted;
            const missing = task.outputFields.map((field) => field.name).filter((name) => !(name in fields));
            if (missing.length > 0) {
                output = appendLine(output, `[Error] SUBMIT is missing output fields: ${missing.join(', ')}`);
                submitted = null;
            }
        }

        const record: IterationRecord = {
            index,
            max_iterations: this.options.maxIterations,
            reasoning: action.reasoning,
            code: action.code,
            output: output.slice(0, this.options.maxOutputChars),
            artifacts: submitted ? { sub_queries: subQueries, submitted } : { sub_queries: subQueries },
        };
        return ok({ record, submitted });
    }

    private async extract(
        task: LoopTask,
        history: IterationRecord[],
        usage: LoopUsage,
    ): Promise<Result<Record<string, unknown>, ModelError>> {
        if (!canExtract(usage, this.options)) {
            return err(modelError('No model calls left for fallback extraction'));
        }
        usage.llmCalls++;

        const reply = await this.deps.model.complete({ messages: buildFallbackMessages(task, history), json: true });
        return reply.map((text) =>
            parseFinalFields(
                text,
                task.outputFields.map((field) => field.name),
            ),
        );
    }
}
