import { z } from 'zod';

const BooleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(v => v === 'true' || v === '1');

export const ConfigSchema = z.object({
    DB_DATABASE: z.string().min(1).default('database.db'),
    HOST: z.string().min(1).default('localhost'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    LEVEL_KEY: z.enum(['groups', 'pair']).default('groups'),
    LOG_REQUESTS: BooleanFlag.default('true'),
});

export interface LabelConfig {
    database: string;
    host: string;
    port: number;
    levelKey: 'groups' | 'pair';
    logRequests: boolean;
}

/**
 * Reads service settings from the environment. Callers that want a `.env`
 * file honoured load it with dotenv first.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LabelConfig {
    const result = ConfigSchema.safeParse(env);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${details}`);
    }
    const cfg = result.data;
    return {
        database: cfg.DB_DATABASE,
        host: cfg.HOST,
        port: cfg.PORT,
        levelKey: cfg.LEVEL_KEY,
        logRequests: cfg.LOG_REQUESTS,
    };
}
