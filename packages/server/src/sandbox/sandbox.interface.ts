import type { SandboxError } from '@code-inquiry/shared';
import type { ResultAsync } from 'neverthrow';

/** Host functions the executed code may call. */
export interface SandboxTools {
    llm_query(prompt: string): Promise<string>;
}

export interface ExecutionResult {
    /** Everything passed to `print` / `console.log`, one call per line. */
    output: string;
    /** Fields passed to `SUBMIT`, or null when the code did not finish. */
    submitted: Record<string, unknown> | null;
    /** Message of an exception thrown by the code, or null. */
    error: string | null;
}

/**
 * One execution environment per run. Globals set by one `execute` call stay visible to the next.
 * Exceptions raised by the code are reported in `ExecutionResult.error`; the Err channel is kept
 * for failures of the environment itself.
 */
export interface Sandbox {
    execute(
        code: string,
        variables: Record<string, unknown>,
        tools: SandboxTools,
    ): ResultAsync<ExecutionResult, SandboxError>;
    dispose(): void;
}

export type SandboxFactory = () => Sandbox;
