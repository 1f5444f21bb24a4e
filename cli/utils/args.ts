/**
 * headsync CLI - Argument Parsing
 *
 * `--key value` and `--key=value` become options, everything else is
 * positional. A flag takes the next argument as its value unless that
 * argument starts with `--`; a flag with nothing after it becomes "true".
 * Values that start with `--` need the `--key=value` form.
 */

export interface ParsedArgs {
    command: string | undefined
    positionals: string[]
    options: Record<string, string>
}

export function parseArgs(argv: string[]): ParsedArgs {
    const positionals: string[] = []
    const options: Record<string, string> = {}

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i]
        if (arg === undefined) continue

        if (arg.startsWith('--')) {
            const separator = arg.indexOf('=')
            if (separator > 2) {
                options[arg.slice(2, separator)] = arg.slice(separator + 1)
                continue
            }

            const key = arg.slice(2)
            const value = argv[i + 1]
            if (value !== undefined && !value.startsWith('--')) {
                options[key] = value
                i++
            } else {
                options[key] = 'true'
            }
        } else {
            positionals.push(arg)
        }
    }

    return {
        command: positionals[0],
        positionals: positionals.slice(1),
        options
    }
}
