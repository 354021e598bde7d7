/**
 * Project Configuration System
 *
 * Features:
 * - .supply-flow.json per-project config
 * - Schema validation with defaults
 * - Environment overrides for the tool policy
 * - Hot reload support
 */

import { z } from 'zod';
import { existsSync, readFileSync, writeFileSync, watchFile, unwatchFile } from 'fs';
import { join } from 'path';

export const CONFIG_FILE_NAME = '.supply-flow.json';

/**
 * Tool configuration schema
 */
export const ToolConfigSchema = z.object({
    enabled: z.boolean().default(true),
});

/**
 * Input size limits applied to tool arguments
 */
export const LimitsConfigSchema = z.object({
    maxNodes: z.number().int().positive().default(2000),
    maxEdges: z.number().int().positive().default(20000),
});

/**
 * Network registry config
 */
export const RegistryConfigSchema = z.object({
    maxNetworks: z.number().int().positive().default(64),
    ttlMs: z.number().int().positive().default(30 * 60 * 1000), // 30 minutes
});

/**
 * Report rendering config
 */
export const ReportConfigSchema = z.object({
    precision: z.number().int().min(0).max(6).default(0),
    csvHeader: z.array(z.string()).length(3).default(['Source', 'Consumer', 'Flow']),
    // Tools may only write reports under this directory, relative to the project root
    outputRoot: z.string().min(1).default('.'),
});

/**
 * Tool allow/deny lists (glob patterns) and rate limiting
 */
export const PolicyConfigSchema = z.object({
    allowlist: z.array(z.string()).default([]),
    denylist: z.array(z.string()).default([]),
    rateLimitPerMinute: z.number().int().min(0).default(0), // 0 = unlimited
});

/**
 * Full project config schema
 */
export const ProjectConfigSchema = z.object({
    version: z.string().default('1.0'),

    // Tool toggles
    tools: z.record(ToolConfigSchema).default({}),

    limits: LimitsConfigSchema.default({}),
    registry: RegistryConfigSchema.default({}),
    report: ReportConfigSchema.default({}),
    policy: PolicyConfigSchema.default({}),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;

export type ConfigValidation =
    | { valid: true; config: ProjectConfig }
    | { valid: false; errors: string[] };

/**
 * Config change callback
 */
export type ConfigChangeCallback = (config: ProjectConfig, oldConfig: ProjectConfig) => void;

function parseList(value: string | undefined): string[] | undefined {
    const items = value
        ?.split(',')
        .map(v => v.trim())
        .filter(v => v.length > 0);
    return items && items.length > 0 ? items : undefined;
}

/**
 * Apply SUPPLY_FLOW_TOOL_* environment overrides on top of a loaded config
 */
export function applyEnvOverrides(config: ProjectConfig, env: NodeJS.ProcessEnv = process.env): ProjectConfig {
    const rawRate = env['SUPPLY_FLOW_TOOL_RATE_LIMIT_PER_MIN'];
    const rate = rawRate ? Number(rawRate) : NaN;
    return {
        ...config,
        policy: {
            allowlist: parseList(env['SUPPLY_FLOW_TOOL_ALLOWLIST']) ?? config.policy.allowlist,
            denylist: parseList(env['SUPPLY_FLOW_TOOL_DENYLIST']) ?? config.policy.denylist,
            rateLimitPerMinute: Number.isInteger(rate) && rate >= 0 ? rate : config.policy.rateLimitPerMinute,
        },
    };
}

/**
 * Configuration Manager
 */
export class ConfigManager {
    private configPath: string;
    private config: ProjectConfig;
    private changeCallbacks: ConfigChangeCallback[] = [];
    private watching: boolean = false;

    constructor(public readonly projectRoot: string, private env: NodeJS.ProcessEnv = process.env) {
        this.configPath = join(projectRoot, CONFIG_FILE_NAME);
        this.config = this.loadConfig();
    }

    /**
     * Get current config
     */
    getConfig(): ProjectConfig {
        return this.config;
    }

    /**
     * Check if a tool is enabled
     */
    isToolEnabled(toolName: string): boolean {
        return this.config.tools[toolName]?.enabled ?? true;
    }

    /**
     * Reload config from disk
     */
    reload(): void {
        const oldConfig = this.config;
        this.config = this.loadConfig();

        if (JSON.stringify(oldConfig) !== JSON.stringify(this.config)) {
            for (const callback of this.changeCallbacks) {
                try {
                    callback(this.config, oldConfig);
                } catch (error) {
                    console.error('Config change callback error:', error);
                }
            }
        }
    }

    /**
     * Watch for config changes
     */
    watch(): void {
        if (this.watching) return;

        if (existsSync(this.configPath)) {
            watchFile(this.configPath, { interval: 1000 }, () => {
                this.reload();
            });
            this.watching = true;
        }
    }

    /**
     * Stop watching
     */
    unwatch(): void {
        if (this.watching) {
            unwatchFile(this.configPath);
            this.watching = false;
        }
    }

    /**
     * Register change callback
     */
    onChange(callback: ConfigChangeCallback): void {
        this.changeCallbacks.push(callback);
    }

    /**
     * Default config file content, every section filled in
     */
    static generateDefault(): string {
        return JSON.stringify(ProjectConfigSchema.parse({}), null, 2) + '\n';
    }

    /**
     * Write the default config into `projectRoot` unless one is already there.
     */
    static init(projectRoot: string): { path: string; created: boolean } {
        const path = join(projectRoot, CONFIG_FILE_NAME);
        if (existsSync(path)) {
            return { path, created: false };
        }
        writeFileSync(path, ConfigManager.generateDefault(), 'utf-8');
        return { path, created: true };
    }

    static validate(obj: unknown): ConfigValidation {
        const result = ProjectConfigSchema.safeParse(obj);
        if (result.success) {
            return { valid: true, config: result.data };
        }
        return {
            valid: false,
            errors: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
        };
    }

    private loadConfig(): ProjectConfig {
        let config = ProjectConfigSchema.parse({});
        try {
            if (existsSync(this.configPath)) {
                const checked = ConfigManager.validate(JSON.parse(readFileSync(this.configPath, 'utf-8')));
                if (checked.valid) {
                    config = checked.config;
                } else {
                    console.error(`Invalid config in ${this.configPath}: ${checked.errors.join('; ')}`);
                }
            }
        } catch (error) {
            console.error(`Failed to load config from ${this.configPath}:`, error);
        }
        return applyEnvOverrides(config, this.env);
    }
}
