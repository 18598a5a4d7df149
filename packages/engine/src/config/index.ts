import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const envSchema = z.object({
    CAVERN_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    CAVERN_LOG_FILE: z.string().min(1).default('logs/cavern.log'),
    CAVERN_RNG_SEED: z.coerce.number().int().optional(),
    CAVERN_LOAD_MAX: z.coerce.number().int().nonnegative().default(100)
});

export interface EngineConfig {
    /**
     * Minimum level written by the logger. `silent` turns logging off.
     */
    logLevel: LogLevel;
    /**
     * Log file path, resolved against the working directory.
     */
    logFile: string;
    /**
     * Seed for the game's random generator. Unset means non-deterministic.
     */
    rngSeed?: number;
    /**
     * Initial value of the LOAD-MAX and LOAD-ALLOWED globals.
     */
    loadMax: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
    const parsed = envSchema.parse({
        CAVERN_LOG_LEVEL: env.CAVERN_LOG_LEVEL || undefined,
        CAVERN_LOG_FILE: env.CAVERN_LOG_FILE || undefined,
        CAVERN_RNG_SEED: env.CAVERN_RNG_SEED || undefined,
        CAVERN_LOAD_MAX: env.CAVERN_LOAD_MAX || undefined
    });

    return {
        logLevel: parsed.CAVERN_LOG_LEVEL,
        logFile: parsed.CAVERN_LOG_FILE,
        rngSeed: parsed.CAVERN_RNG_SEED,
        loadMax: parsed.CAVERN_LOAD_MAX
    };
}
