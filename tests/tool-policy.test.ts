import { describe, it, expect } from 'vitest';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ToolPolicy, matchPattern } from '../src/core/tool-policy.js';
import { InvalidEndpointsError } from '../src/flow/index.js';

function payload(result: CallToolResult): unknown {
    const first = result.content[0];
    return first?.type === 'text' ? JSON.parse(first.text) : undefined;
}

const open = { allowlist: [], denylist: [], rateLimitPerMinute: 0 };

describe('matchPattern', () => {
    it('should match globs', () => {
        expect(matchPattern('flow_max_flow', '*')).toBe(true);
        expect(matchPattern('flow_max_flow', 'flow_*')).toBe(true);
        expect(matchPattern('flow_max_flow', 'flow_network_*')).toBe(false);
        expect(matchPattern('flow.max', 'flow_max')).toBe(false);
    });
});

describe('ToolPolicy', () => {
    it('should enforce allow and deny lists', () => {
        const policy = new ToolPolicy({ ...open, allowlist: ['flow_*'], denylist: ['flow_network_delete'] });

        expect(policy.check('flow_max_flow')).toEqual({ allowed: true });
        expect(policy.check('admin_reset')).toMatchObject({ allowed: false, code: 'TOOL_FORBIDDEN' });
        expect(policy.check('flow_network_delete')).toMatchObject({ allowed: false, code: 'TOOL_FORBIDDEN' });
    });

    it('should rate limit within a one minute window', () => {
        let now = 1_000_000;
        const policy = new ToolPolicy({ ...open, rateLimitPerMinute: 2 }, () => now);

        expect(policy.check('a').allowed).toBe(true);
        expect(policy.check('b').allowed).toBe(true);
        expect(policy.check('c')).toMatchObject({ allowed: false, code: 'RATE_LIMITED' });

        now += 60_000;
        expect(policy.check('d').allowed).toBe(true);
    });

    it('should apply updated config', () => {
        const policy = new ToolPolicy(open);
        policy.update({ ...open, denylist: ['*'] });
        expect(policy.check('flow_max_flow').allowed).toBe(false);
    });

    it('should convert engine errors into error results', async () => {
        const policy = new ToolPolicy(open);
        const result = await policy.run('flow_max_flow', () => {
            throw new InvalidEndpointsError('Source and sink must differ, both are a', 'a', 'a');
        });

        expect(result.isError).toBe(true);
        expect(payload(result)).toEqual({
            success: false,
            error: { code: 'INVALID_ENDPOINTS', message: 'Source and sink must differ, both are a' },
        });
    });

    it('should report unknown failures as TOOL_ERROR', async () => {
        const policy = new ToolPolicy(open);
        const result = await policy.run('x', async () => {
            throw new Error('boom');
        });
        expect(payload(result)).toEqual({ success: false, error: { code: 'TOOL_ERROR', message: 'boom' } });
    });

    it('should not run the body when forbidden', async () => {
        const policy = new ToolPolicy({ ...open, denylist: ['x'] });
        let ran = false;
        const result = await policy.run('x', () => {
            ran = true;
            return { content: [] };
        });

        expect(ran).toBe(false);
        expect(payload(result)).toEqual({ success: false, error: { code: 'TOOL_FORBIDDEN', message: 'Tool x not allowed' } });
    });
});
