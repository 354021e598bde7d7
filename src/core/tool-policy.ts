/**
 * Tool Policy - access control and error envelope for tool calls
 *
 * Features:
 * - Allow/deny lists with `*` glob patterns
 * - Sliding one-minute rate limit across all tools
 * - Uniform `{ success: false, error: { code, message } }` results
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { isFlowError } from '../flow/index.js';
import type { PolicyConfig } from '../config/index.js';

export type PolicyDecision =
    | { allowed: true }
    | { allowed: false; code: 'TOOL_FORBIDDEN' | 'RATE_LIMITED'; message: string };

const WINDOW_MS = 60_000;

export function matchPattern(name: string, pattern: string): boolean {
    if (pattern === '*') return true;
    const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
    return new RegExp(`^${escaped}$`).test(name);
}

export function jsonResult(payload: Record<string, unknown>): CallToolResult {
    return {
        content: [{ type: 'text' as const, text: JSON.stringify({ success: true, ...payload }, null, 2) }],
    };
}

export function errorResult(code: string, message: string): CallToolResult {
    return {
        content: [{ type: 'text' as const, text: JSON.stringify({ success: false, error: { code, message } }, null, 2) }],
        isError: true,
    };
}

export class ToolPolicy {
    private calls: number[] = [];

    constructor(
        private config: PolicyConfig,
        private now: () => number = Date.now
    ) {}

    update(config: PolicyConfig): void {
        this.config = config;
    }

    check(name: string): PolicyDecision {
        const { allowlist, denylist, rateLimitPerMinute } = this.config;

        if (allowlist.length > 0 && !allowlist.some(p => matchPattern(name, p))) {
            return { allowed: false, code: 'TOOL_FORBIDDEN', message: `Tool ${name} not allowed` };
        }
        if (denylist.some(p => matchPattern(name, p))) {
            return { allowed: false, code: 'TOOL_FORBIDDEN', message: `Tool ${name} not allowed` };
        }

        if (rateLimitPerMinute > 0) {
            const now = this.now();
            while (this.calls.length > 0 && (this.calls[0] ?? now) <= now - WINDOW_MS) {
                this.calls.shift();
            }
            if (this.calls.length >= rateLimitPerMinute) {
                return { allowed: false, code: 'RATE_LIMITED', message: 'Tool rate limit exceeded' };
            }
            this.calls.push(now);
        }

        return { allowed: true };
    }

    /**
     * Run a tool body under the policy, turning thrown errors into error results
     */
    async run(name: string, body: () => CallToolResult | Promise<CallToolResult>): Promise<CallToolResult> {
        const decision = this.check(name);
        if (!decision.allowed) {
            return errorResult(decision.code, decision.message);
        }
        try {
            return await body();
        } catch (error) {
            if (isFlowError(error)) {
                return errorResult(error.code, error.message);
            }
            if (error instanceof ZodError) {
                return errorResult('INVALID_INPUT', error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; '));
            }
            const message = error instanceof Error ? error.message : String(error);
            return errorResult('TOOL_ERROR', message);
        }
    }
}
