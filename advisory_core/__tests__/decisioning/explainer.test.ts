import { findMissingPlaceholders, formatDay, renderExplanation, templateFor } from '../../lib/decisioning';

describe('explanation templates', () => {
    it('substitutes values and joins lists', () => {
        expect(renderExplanation('{a} / {b} / {c} / {d}', { a: 'x', b: 3, c: true, d: ['nvd', 'osv'] })).toBe('x / 3 / true / nvd, osv');
    });

    it('renders missing values as unknown and empty lists as none', () => {
        expect(renderExplanation('Reason: {reason}. Sources: {sources}.', { sources: [] })).toBe('Reason: unknown. Sources: none.');
        expect(renderExplanation('Version {v}', { v: null })).toBe('Version unknown');
    });

    it('lists each missing placeholder once', () => {
        expect(findMissingPlaceholders('{a} {b} {a} {c}', { b: 'set', c: undefined })).toEqual(['a', 'c']);
    });

    it('trims the rendered text', () => {
        expect(renderExplanation('  {a}  ', { a: 'value' })).toBe('value');
    });

    it('picks the reason template, then the configured default, then the built-in default', () => {
        expect(templateFor({ X: 'x template', DEFAULT: 'configured default' }, 'X')).toBe('x template');
        expect(templateFor({ DEFAULT: 'configured default' }, 'Y')).toBe('configured default');
        expect(templateFor({}, 'Y')).toBe('Advisory classified as {state} ({reason_code}).');
    });

    it('formats timestamps as calendar days', () => {
        expect(formatDay('2024-02-01T10:00:00Z')).toBe('2024-02-01');
        expect(formatDay('not-a-date')).toBe('not-a-date');
        expect(formatDay(null)).toBeNull();
    });
});
