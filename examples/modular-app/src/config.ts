/**
 * Configuration — read once from the environment, validated with zod.
 *
 * | Variable            | Default | Meaning                          |
 * |---------------------|---------|----------------------------------|
 * | `APP_VERSION`       | `0.1.0` | answered by the `version` method |
 * | `CLOCK_INTERVAL_MS` | `1000`  | milliseconds between ticks       |
 * | `DEMO_TICKS`        | `3`     | ticks the demo prints            |
 * | `RPC_DEBUG`         | `false` | print debug observer events      |
 */
import { z } from 'zod';

export const EnvSchema = z.object({
    APP_VERSION: z.string().min(1).default('0.1.0'),
    CLOCK_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
    DEMO_TICKS: z.coerce.number().int().nonnegative().default(3),
    RPC_DEBUG: z.enum(['true', 'false', '1', '0']).default('false'),
});

export interface AppConfig {
    readonly version: string;
    readonly clockIntervalMs: number;
    readonly demoTicks: number;
    readonly debug: boolean;
}

/**
 * Load the configuration.
 *
 * @throws {Error} A variable is set but invalid; the message names it
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${issues.join('; ')}`);
    }
    const { APP_VERSION, CLOCK_INTERVAL_MS, DEMO_TICKS, RPC_DEBUG } = parsed.data;
    return {
        version: APP_VERSION,
        clockIntervalMs: CLOCK_INTERVAL_MS,
        demoTicks: DEMO_TICKS,
        debug: RPC_DEBUG === 'true' || RPC_DEBUG === '1',
    };
}
