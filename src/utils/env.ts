import { z } from 'zod';

const optionalString = z.string().trim().optional().default('');

export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(8787),
    FRONTEND_ORIGIN: z.string().default('*'),

    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(3306),
    DB_USERNAME: z.string().default('root'),
    DB_PASSWORD: z.string().default(''),
    DB_DATABASE: z.string().default('lexfin_assistant'),
    DB_SYNCHRONIZE: z
        .enum(['true', 'false'])
        .default('true')
        .transform(v => v === 'true'),

    GEMINI_API_KEY: optionalString,
    GEMINI_CHAT_MODEL: z.string().default('gemini-2.5-flash-lite'),
    GEMINI_EMBED_MODEL: z.string().default('text-embedding-004'),
    GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(1),

    ELASTIC_URL: optionalString,
    ELASTIC_API_KEY: optionalString,
    ELASTIC_INDEX_LEGAL: optionalString,
    ELASTIC_INDEX_FINANCIAL: optionalString,
    ELASTIC_TEXT_FIELDS: z.string().default('title^2,content'),
    ELASTIC_VECTOR_FIELD: z.string().default('content_vector'),
    ELASTIC_RERANK_INFERENCE_ID: z.string().default('.rerank-v1-elasticsearch'),
    ELASTIC_RERANK_FIELD: z.string().default('content'),
    RAG_MIN_SCORE: z.coerce.number().default(0.2),

    GOOGLE_VISION_KEY_PATH: optionalString,
    UPLOADS_DIR: z.string().default('uploads'),
    ASSISTANT_LANGUAGE: z.string().default('español (castellano)'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): Env {
    const parsed = envSchema.safeParse(config);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid environment: ${issues}`);
    }
    return parsed.data;
}
