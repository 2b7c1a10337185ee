/**
 * Agent seam — the one place that touches the Claude Agent SDK.
 */

import { query } from "@anthropic-ai/claude-agent-sdk";

export interface AgentQueryOptions {
    maxTurns: number;
    allowedTools: string[];
    permissionMode: "acceptEdits";
    outputFormat: { type: "json_schema"; schema: Record<string, unknown> };
    /** Aborting it stops the agent run. */
    abortController?: AbortController;
}

/** Runs one agent conversation and yields its raw messages. */
export type AgentQuery = (params: { prompt: string; options: AgentQueryOptions }) => AsyncIterable<unknown>;

export const claudeAgentQuery: AgentQuery = ({ prompt, options }) => query({ prompt, options });
