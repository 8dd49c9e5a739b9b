import type { OutputField } from '../loop/prompts.js';

export const DIFF_CITATION_RULES = [
    'Citations are bounded by the diff:',
    '- cite only line numbers that are visible in the context you were given;',
    "- a cited line must appear there with its own '+', '-' or ' ' marker inside a hunk that is shown;",
    '- never cite collapsed or skipped ranges, and never guess original file positions.',
    'If a problem lies in code that is not visible, explain it in text and leave its citations empty.',
    'A citation outside the visible lines is a failure.',
].join('\n');

export const DIFF_QA_INSTRUCTIONS = [
    'Answer a question about a code change.',
    '`diff_context` lists every changed file and shows their old and new text; `file_data` maps each',
    'path to `{ old, new, status }` with the full text, including files whose content is not shown.',
    '`pr_info` describes the change, `selection` the lines the user selected, `conversation` earlier turns.',
    '',
    DIFF_CITATION_RULES,
].join('\n');

export const DIFF_QA_OUTPUTS: OutputField[] = [
    { name: 'answer', description: 'markdown answer; code goes in fenced blocks' },
    {
        name: 'citations',
        description: 'list of "path:start-end" strings or { path, side, startLine, endLine, reason } records',
    },
];

export const CODEBASE_QA_INSTRUCTIONS = [
    'Answer a question about a repository.',
    '`codebase` maps each included file path to its full text; `codebase_overview` lists the files,',
    'their languages and their symbols. `conversation_history` holds earlier questions and answers.',
    'Read the files you need with code instead of guessing.',
].join('\n');

export const CODEBASE_QA_OUTPUTS: OutputField[] = [
    { name: 'answer', description: 'markdown answer; code goes in fenced blocks' },
    { name: 'sources', description: 'list of "path" or "path:start-end" strings the answer relies on' },
];

export const REVIEW_INSTRUCTIONS = [
    'Analyze the diffs and the change description below and identify distinct issues:',
    'potential bugs (high-confidence logic or security errors), investigation items (possible issues',
    'that need confirmation) and informational notes (style or best practice).',
    '',
    'Reply with one JSON object: { "summary": string, "issues": Issue[] }. Each issue has:',
    '- title: string',
    "- severity: 'low' | 'medium' | 'high' | 'critical'",
    "- category: 'bug' | 'investigation' | 'informational'",
    '- explanation: markdown string of at least two or three sentences saying why it matters',
    "- citations: list of 'path:start_line-end_line' strings",
    '- fixSuggestions: optional list of strings',
    '- testsToAdd: optional list of strings',
    '',
    DIFF_CITATION_RULES,
].join('\n');

export const SUGGESTION_INSTRUCTIONS = [
    'Suggest 4 to 5 short follow-up questions or actions for the user, at most five words each.',
    'Reply with one JSON object: { "suggestions": string[] }.',
].join('\n');
