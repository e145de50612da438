import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const ServerEnvSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export function getConfig(env: NodeJS.ProcessEnv = process.env) {
    const parsed = ServerEnvSchema.parse({
        PORT: env.PORT || undefined,
        NODE_ENV: env.NODE_ENV || undefined,
    });
    return { port: parsed.PORT, nodeEnv: parsed.NODE_ENV };
}
