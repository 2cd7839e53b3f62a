/**
 * Configuration
 *
 * Defaults, overridden by TRACE2LEAN_* environment variables, overridden
 * by command line flags. The CLI loads a .env file before calling
 * loadConfig.
 */
import { z } from 'zod';
import { DEFAULTS } from './types/options.js';
import { createConfigError } from './types/errors.js';

export const ConfigSchema = z.object({
    outputDir: z.string().min(1).default(DEFAULTS.outputDir),
    maxLineLength: z.coerce.number().int().positive().default(DEFAULTS.maxLineLength),
    tactic: z.string().regex(/^[A-Za-z_][\w.]*$/, 'must be a tactic name').default(DEFAULTS.tactic),
    hypothesisName: z.string().regex(/^[A-Za-z_]\w*$/, 'must be a Lean identifier').default(DEFAULTS.hypothesisName),
    verbosity: z.enum(['minimal', 'standard', 'detailed']).default(DEFAULTS.verbosity),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigOverrides = Partial<Record<keyof Config, string | number | undefined>>;

const ENV_KEYS: Record<keyof Config, string> = {
    outputDir: 'TRACE2LEAN_OUTPUT_DIR',
    maxLineLength: 'TRACE2LEAN_MAX_LINE_LENGTH',
    tactic: 'TRACE2LEAN_TACTIC',
    hypothesisName: 'TRACE2LEAN_HYPOTHESIS',
    verbosity: 'TRACE2LEAN_VERBOSITY',
};

const CONFIG_KEYS = ['outputDir', 'maxLineLength', 'tactic', 'hypothesisName', 'verbosity'] as const satisfies readonly (keyof Config)[];

function defined(values: ConfigOverrides): Record<string, unknown> {
    return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined && v !== ''));
}

export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigOverrides = {}
): Config {
    const fromEnv: ConfigOverrides = {};
    for (const key of CONFIG_KEYS) {
        fromEnv[key] = env[ENV_KEYS[key]];
    }

    const result = ConfigSchema.safeParse({ ...defined(fromEnv), ...defined(overrides) });
    if (!result.success) {
        const issue = result.error.issues[0];
        throw createConfigError(`${issue.path.join('.')}: ${issue.message}`, {
            issues: result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
        });
    }
    return result.data;
}
