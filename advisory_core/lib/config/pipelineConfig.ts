import fs from 'node:fs';
import { z } from 'zod';

import { DEFAULT_RULES, DEFAULT_TEMPLATES, RuleConfigurationError, RuleTableSchema, validateRuleSet } from '../decisioning';
import type { ExplanationTemplates, RuleDefinition } from '../decisioning';
import { AUTHORITY_ROLES, AuthorityConfigurationError, DEFAULT_AUTHORITY_TABLE, validateAuthorityTable } from '../resolution';
import type { AuthorityTable } from '../resolution';
import { PipelineConfigError } from './errors';

export const DEFAULT_INDEX_NAMES = {
    history: 'advisory_state_history',
    runs: 'advisory_runs',
    tasklogs: 'advisory_tasklogs',
} as const;

const positiveInt = z.number().int().positive();

export const PipelineConfigSchema = z.object({
    authority: z.array(z.object({
        sourceId: z.string().trim().min(1),
        rank: z.number().int().min(0),
        role: z.enum(AUTHORITY_ROLES),
    })).min(1).default(() => DEFAULT_AUTHORITY_TABLE.map((entry) => ({ ...entry }))),
    rules: RuleTableSchema.optional(),
    templates: z.record(z.string(), z.string()).default({}),
    concurrency: z.object({
        decisions: positiveInt.default(8),
        writes: positiveInt.default(4),
    }).default({}),
    history: z.object({
        maxWriteAttempts: positiveInt.default(3),
    }).default({}),
    quality: z.object({
        stalledAfterDays: positiveInt.default(90),
        stalledWarningThreshold: positiveInt.default(10),
    }).default({}),
    indices: z.object({
        history: z.string().trim().min(1).default(DEFAULT_INDEX_NAMES.history),
        runs: z.string().trim().min(1).default(DEFAULT_INDEX_NAMES.runs),
        tasklogs: z.string().trim().min(1).default(DEFAULT_INDEX_NAMES.tasklogs),
    }).default({}),
});

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

type ParsedConfig = z.infer<typeof PipelineConfigSchema>;

export interface PipelineConfig {
    authority: AuthorityTable;
    rules: readonly RuleDefinition[];
    templates: ExplanationTemplates;
    concurrency: ParsedConfig['concurrency'];
    history: ParsedConfig['history'];
    quality: ParsedConfig['quality'];
    indices: ParsedConfig['indices'];
}

export interface RuntimeEnvironment {
    esUrl: string | null;
    apiKey: string | null;
    username: string | null;
    password: string | null;
    historyIndex: string | null;
    configPath: string | null;
}

export function parsePipelineConfig(input: unknown): PipelineConfig {
    const parsed = PipelineConfigSchema.safeParse(input);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        const detail = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'invalid configuration';
        throw new PipelineConfigError('INVALID_CONFIG', `Pipeline configuration is invalid. ${detail}`);
    }

    const config = parsed.data;

    try {
        validateAuthorityTable(config.authority);
    } catch (error) {
        if (error instanceof AuthorityConfigurationError) {
            throw new PipelineConfigError('INVALID_AUTHORITY', error.message, { cause: error });
        }

        throw error;
    }

    let rules: RuleDefinition[];
    try {
        rules = validateRuleSet(config.rules ?? DEFAULT_RULES);
    } catch (error) {
        if (error instanceof RuleConfigurationError) {
            throw new PipelineConfigError('INVALID_RULES', error.message, { cause: error });
        }

        throw error;
    }

    return {
        authority: config.authority,
        rules,
        templates: { ...DEFAULT_TEMPLATES, ...config.templates },
        concurrency: config.concurrency,
        history: config.history,
        quality: config.quality,
        indices: config.indices,
    };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = parsePipelineConfig({});

/**
 * Reads the JSON configuration at `filePath` (or `ADVISORY_PIPELINE_CONFIG`). Without a file the
 * defaults apply; a file that exists but does not validate is fatal.
 */
export function loadPipelineConfig(filePath?: string, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const resolvedPath = filePath ?? normalizeEnv(env.ADVISORY_PIPELINE_CONFIG);
    if (!resolvedPath) {
        return DEFAULT_PIPELINE_CONFIG;
    }

    if (!fs.existsSync(resolvedPath)) {
        console.warn(`[PipelineConfig] ${resolvedPath} not found; using defaults.`);
        return DEFAULT_PIPELINE_CONFIG;
    }

    let raw: string;
    try {
        raw = fs.readFileSync(resolvedPath, 'utf8');
    } catch (error) {
        throw new PipelineConfigError('UNREADABLE_FILE', `Could not read ${resolvedPath}.`, { cause: error });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new PipelineConfigError('INVALID_JSON', `${resolvedPath} is not valid JSON.`, { cause: error });
    }

    return parsePipelineConfig(json);
}

export function resolveRuntimeEnvironment(env: NodeJS.ProcessEnv = process.env): RuntimeEnvironment {
    return {
        esUrl: normalizeEnv(env.ES_URL),
        apiKey: normalizeEnv(env.ES_API_KEY),
        username: normalizeEnv(env.ES_USERNAME),
        password: normalizeEnv(env.ES_PASSWORD),
        historyIndex: normalizeEnv(env.ADVISORY_HISTORY_INDEX),
        configPath: normalizeEnv(env.ADVISORY_PIPELINE_CONFIG),
    };
}

function normalizeEnv(value: string | undefined): string | null {
    if (typeof value !== 'string') {
        return null;
    }

    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}
