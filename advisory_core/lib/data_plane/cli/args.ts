export type CliFlags = Map<string, string | boolean>;

export function parseFlags(argv: readonly string[], booleanFlags: readonly string[]): CliFlags {
    const flags: CliFlags = new Map();

    for (let i = 0; i < argv.length; i += 1) {
        const token = argv[i];
        if (!token.startsWith('--')) {
            continue;
        }

        const name = token.slice(2);
        if (booleanFlags.includes(name)) {
            flags.set(name, true);
            continue;
        }

        const value = argv[i + 1];
        if (!value || value.startsWith('--')) {
            throw new Error(`Missing value for --${name}`);
        }

        flags.set(name, value);
        i += 1;
    }

    return flags;
}

export function requiredFlag(flags: CliFlags, name: string): string {
    const value = optionalFlag(flags, name);
    if (value === null) {
        throw new Error(`Missing required flag --${name}`);
    }

    return value;
}

export function optionalFlag(flags: CliFlags, name: string): string | null {
    const value = flags.get(name);
    if (typeof value !== 'string' || value.trim().length === 0) {
        return null;
    }

    return value.trim();
}
