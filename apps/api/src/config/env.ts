import { z } from 'zod';
import * as dotenv from 'dotenv';


// Load .env from root or current directory
import path from 'path';
dotenv.config({ path: path.resolve(__dirname, '../../../../.env') });
dotenv.config();

const optionalNumber = (schema: z.ZodNumber) =>
    z.preprocess((val) => (val === undefined || val === '' ? undefined : Number(val)), schema.optional());

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.preprocess((val) => Number(val), z.number()).default(5000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('debug'),
    CORS_ORIGIN: z.string().default('*'),
    RATE_LIMIT_MAX: z.preprocess((val) => Number(val), z.number().int().min(1)).default(100),
    MAX_UPLOAD_BYTES: z.preprocess((val) => Number(val), z.number()).default(10485760), // 10MB
    // Vision model
    GEMINI_API_KEY: z.string().default(''),
    GEMINI_MODEL_VISION: z.string().default('gemini-2.5-flash'),
    CLASSIFY_MAX_TOKENS: z.preprocess((val) => Number(val), z.number().int().min(1)).default(50),
    ANALYSIS_MAX_TOKENS: z.preprocess((val) => Number(val), z.number().int().min(1)).default(1500),
    ANALYSIS_TEMPERATURE: optionalNumber(z.number().min(0).max(2)),
    // Storage
    TEMP_DIR: z.string().default('temp'),
    REPORTS_DIR: z.string().default('reports'),
});

export type Env = z.infer<typeof envSchema>;

const _env = envSchema.safeParse(process.env);

if (!_env.success) {
    console.error('❌ Invalid environment variables:', _env.error.format());
    process.exit(1);
}

export const env: Env = _env.data;
