import { addMinutes, format, isValid, parseISO } from 'date-fns';

import type { ExplanationTemplates } from './types';

export type TemplateValue = string | number | boolean | null | undefined | readonly string[];

export type TemplateValues = Record<string, TemplateValue>;

export const DEFAULT_TEMPLATE_KEY = 'DEFAULT';

export const UNKNOWN_PLACEHOLDER_VALUE = 'unknown';

export const DEFAULT_TEMPLATES: ExplanationTemplates = {
    CSV_OVERRIDE: 'Marked as not applicable by internal security review. Reason: {override_reason}. Updated: {override_updated_at}.',
    REGISTRY_REJECTED: 'This vulnerability has been rejected by the authoritative registry.',
    UPSTREAM_FIX: 'Fixed in version {fixed_version}. Fix available from upstream.',
    NEW_ITEM: 'Recently published vulnerability under analysis. Awaiting upstream signals.',
    AWAITING_FIX: 'No fix currently available upstream. Sources consulted: {sources_list}.',
    [DEFAULT_TEMPLATE_KEY]: 'Advisory classified as {state} ({reason_code}).',
};

const PLACEHOLDER_PATTERN = /\{([A-Za-z0-9_]+)\}/g;

export function templateFor(templates: ExplanationTemplates, reasonCode: string): string {
    return templates[reasonCode] ?? templates[DEFAULT_TEMPLATE_KEY] ?? DEFAULT_TEMPLATES[DEFAULT_TEMPLATE_KEY];
}

/** Replaces `{name}` placeholders. Missing or null values render as "unknown"; never throws. */
export function renderExplanation(template: string, values: TemplateValues): string {
    return template
        .replace(PLACEHOLDER_PATTERN, (_match, name: string) => formatTemplateValue(values[name]))
        .trim();
}

export function findMissingPlaceholders(template: string, values: TemplateValues): string[] {
    const missing: string[] = [];

    for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
        const name = match[1];
        const value = values[name];
        if ((value === null || value === undefined) && !missing.includes(name)) {
            missing.push(name);
        }
    }

    return missing;
}

/** Calendar day (UTC) of an ISO timestamp; unparseable input passes through unchanged. */
export function formatDay(value: string | null): string | null {
    if (value === null) {
        return null;
    }

    const parsed = parseISO(value);
    if (!isValid(parsed)) {
        return value;
    }

    return format(addMinutes(parsed, parsed.getTimezoneOffset()), 'yyyy-MM-dd');
}

function formatTemplateValue(value: TemplateValue): string {
    if (value === null || value === undefined) {
        return UNKNOWN_PLACEHOLDER_VALUE;
    }

    if (typeof value === 'string') {
        return value;
    }

    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }

    return value.length > 0 ? value.join(', ') : 'none';
}
