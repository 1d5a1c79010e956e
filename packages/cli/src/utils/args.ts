/**
 * Minimal argv parsing: positionals plus --flag and --key value options.
 */

export interface ParsedArgs {
    positionals: string[];
    flags: Set<string>;
    values: Map<string, string>;
}

/**
 * Split argv into positionals, boolean flags and valued options.
 *
 * @param argv - Arguments after the command name
 * @param valued - Option names that take a value (without the leading --)
 * @throws Error for an unknown option or a valued option without a value
 */
export function parseArgs(
    argv: readonly string[],
    valued: readonly string[],
    booleans: readonly string[] = []
): ParsedArgs {
    const positionals: string[] = [];
    const flags = new Set<string>();
    const values = new Map<string, string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--') || arg === '--') {
            positionals.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

        if (valued.includes(name)) {
            const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
            if (value === undefined || value === '') {
                throw new Error(`Option --${name} requires a value.`);
            }
            values.set(name, value);
        } else if (booleans.includes(name) && eq === -1) {
            flags.add(name);
        } else {
            throw new Error(`Unknown option: ${arg}`);
        }
    }

    return { positionals, flags, values };
}
