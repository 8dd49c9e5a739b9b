import { type SandboxError, sandboxError } from '@code-inquiry/shared';
import { errAsync, ResultAsync } from 'neverthrow';
import { inspect } from 'node:util';
import { type Context, createContext, Script } from 'node:vm';
import type { ExecutionResult, Sandbox, SandboxTools } from './sandbox.interface.js';

type Callback = (value: string) => void;

/** Host state of one `execute` call. Nothing reaches a closed execution. */
interface Execution {
    lines: string[];
    submitted: Record<string, unknown> | null;
    closed: boolean;
    deadline: number;
    variables: string;
    tools: SandboxTools;
    finish(error: string | null): void;
}

/**
 * Runs once per context. Tools are defined in the context realm and close over the host bridge,
 * which only ever exchanges primitives with them. Injected variables arrive as JSON.
 */
const BOOTSTRAP = new Script(
    `(() => {
    'use strict';
    const host = globalThis.__host;
    delete globalThis.__host;
    const { parse, stringify } = JSON;
    const describe = (error) => {
        try {
            return String(error);
        } catch {
            return 'Error: unprintable exception';
        }
    };
    const print = (...values) => {
        host.print(values.map((value) => (typeof value === 'string' ? value : host.format(value))).join(' '));
    };
    const tools = {
        print,
        console: Object.freeze({ log: print, info: print, warn: print, error: print }),
        SUBMIT: (fields) => {
            if (typeof fields !== 'object' || fields === null || Array.isArray(fields)) {
                throw new TypeError('SUBMIT expects an object of output fields');
            }
            const failure = host.submit(stringify(fields));
            if (failure !== null) throw new TypeError(failure);
        },
        llm_query: (prompt) =>
            new Promise((resolve, reject) => {
                host.llm(String(prompt), resolve, (message) => reject(new Error(message)));
            }),
        __start: (body) => {
            const variables = parse(host.variables());
            for (const name of Object.keys(variables)) globalThis[name] = variables[name];
            body().then(
                () => host.done(null),
                (error) => host.done(describe(error)),
            );
        },
    };
    for (const name of Object.keys(tools)) {
        Object.defineProperty(globalThis, name, { value: tools[name], writable: false, configurable: false });
    }
    globalThis.memory = {};
})();`,
    { filename: 'sandbox-bootstrap.js' },
);

/** Re-enters the context so microtasks queued by the host run under the timeout. */
const DRAIN = new Script('undefined', { filename: 'sandbox-drain.js' });

function formatValue(value: unknown): string {
    try {
        return inspect(value, { depth: 4, breakLength: 120, customInspect: false });
    } catch {
        return '[unprintable]';
    }
}

function isCallback(value: unknown): value is Callback {
    return typeof value === 'function';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JavaScript sandbox on `node:vm`. Each sandbox owns one context with no `require`, `process`
 * or module access; code and string evaluation are disabled inside it, and its microtasks run
 * under the execution timeout. Code runs as the body of an async function so it can
 * `await llm_query(...)`. State meant to outlive one step goes on `memory` or `globalThis`.
 */
export class VmSandbox implements Sandbox {
    private context: Context | null;
    private current: Execution | null = null;

    constructor(private timeoutMs: number) {
        const context = createContext(
            {},
            { codeGeneration: { strings: false, wasm: false }, microtaskMode: 'afterEvaluate' },
        );
        context.__host = {
            format: formatValue,
            print: (line: unknown) => this.print(line),
            submit: (json: unknown) => this.submit(json),
            variables: () => this.current?.variables ?? '{}',
            llm: (prompt: unknown, resolve: unknown, reject: unknown) => this.query(prompt, resolve, reject),
            done: (error: unknown) => this.current?.finish(typeof error === 'string' ? error : null),
        };
        BOOTSTRAP.runInContext(context);
        this.context = context;
    }

    execute(
        code: string,
        variables: Record<string, unknown>,
        tools: SandboxTools,
    ): ResultAsync<ExecutionResult, SandboxError> {
        const context = this.context;
        if (!context) {
            return errAsync(sandboxError('Sandbox has been disposed'));
        }
        return ResultAsync.fromPromise(this.run(context, code, variables, tools), (e) =>
            sandboxError(`Sandbox failure: ${String(e)}`, e),
        );
    }

    dispose(): void {
        this.current?.finish('Sandbox has been disposed');
        this.context = null;
    }

    private run(
        context: Context,
        code: string,
        variables: Record<string, unknown>,
        tools: SandboxTools,
    ): Promise<ExecutionResult> {
        return new Promise((resolve) => {
            const execution: Execution = {
                lines: [],
                submitted: null,
                closed: false,
                deadline: Date.now() + this.timeoutMs,
                variables: JSON.stringify(variables),
                tools,
                finish: (error) => {
                    if (execution.closed) return;
                    execution.closed = true;
                    clearTimeout(timer);
                    if (this.current === execution) this.current = null;
                    resolve({ output: execution.lines.join('\n'), submitted: execution.submitted, error });
                },
            };
            const timer = setTimeout(
                () => execution.finish(`Error: Execution timed out after ${this.timeoutMs}ms`),
                this.timeoutMs,
            );

            this.current = execution;
            try {
                const script = new Script(`__start(async () => {\n${code}\n});`, { filename: 'step.js' });
                script.runInContext(context, { timeout: this.timeoutMs });
            } catch (e) {
                execution.finish(String(e));
            }
        });
    }

    private print(line: unknown): void {
        const execution = this.current;
        if (execution && !execution.closed && typeof line === 'string') {
            execution.lines.push(line);
        }
    }

    private submit(json: unknown): string | null {
        const execution = this.current;
        if (!execution || execution.closed) return 'Execution has already finished';
        if (typeof json !== 'string') return 'SUBMIT fields must be JSON-serialisable';
        try {
            const fields: unknown = JSON.parse(json);
            if (!isRecord(fields)) return 'SUBMIT expects an object of output fields';
            execution.submitted = fields;
            return null;
        } catch {
            return 'SUBMIT fields must be JSON-serialisable';
        }
    }

    private query(prompt: unknown, resolve: unknown, reject: unknown): void {
        const execution = this.current;
        if (!execution || execution.closed) return;
        if (typeof prompt !== 'string' || !isCallback(resolve) || !isCallback(reject)) return;
        this.answer(execution, prompt, resolve, reject).catch(() =>
            execution.finish('Error: llm_query result could not be delivered'),
        );
    }

    /** Settles an `llm_query` promise in the context, unless its execution has closed meanwhile. */
    private async answer(execution: Execution, prompt: string, resolve: Callback, reject: Callback): Promise<void> {
        let settle: () => void;
        try {
            const text = await execution.tools.llm_query(prompt);
            settle = () => resolve(text);
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            settle = () => reject(message);
        }

        const context = this.context;
        if (execution.closed || !context) return;
        settle();
        try {
            DRAIN.runInContext(context, { timeout: Math.max(1, execution.deadline - Date.now()) });
        } catch {
            execution.finish(`Error: Execution timed out after ${this.timeoutMs}ms`);
        }
    }
}
