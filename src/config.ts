import 'dotenv/config';
import { z } from 'zod';
import { publicKeyFromPrivate } from './crypto';
import { LogLevel } from './logger';
import { DEFAULT_REACTION_WINDOW_MS } from './session/machine';
import { MAX_TIMER_DELAY_MS } from './session/timeout';

// Loads and validates environment variables. Invalid configuration throws at startup.

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    EVALUATOR_PRIVATE_KEY: z
        .string({ required_error: 'EVALUATOR_PRIVATE_KEY environment variable is not set. Please create a .env file.' })
        .min(1)
        .transform(pem => pem.replace(/\\n/g, '\n')),
    EVALUATOR_TOKEN: z
        .string({ required_error: 'EVALUATOR_TOKEN environment variable is not set. Please create a .env file.' })
        .min(8),
    REACTION_WINDOW_MS: z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(DEFAULT_REACTION_WINDOW_MS),
    LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
});

export type Config = {
    port: number;
    evaluatorPrivateKey: string;
    evaluatorPublicKey: string;
    evaluatorToken: string;
    reactionWindowMs: number;
    logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid configuration: ${problems}`);
    }
    const e = parsed.data;
    return {
        port: e.PORT,
        evaluatorPrivateKey: e.EVALUATOR_PRIVATE_KEY,
        evaluatorPublicKey: publicKeyFromPrivate(e.EVALUATOR_PRIVATE_KEY),
        evaluatorToken: e.EVALUATOR_TOKEN,
        reactionWindowMs: e.REACTION_WINDOW_MS,
        logLevel: e.LOG_LEVEL,
    };
}
