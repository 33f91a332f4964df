import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(value => value === 'true' || value === '1' || value === 'yes');

const environmentSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    LLM_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
    LLM_API_KEY: z.string().trim().optional(),
    LLM_PRIMARY_MODEL: z.string().min(1).default('llama-3.3-70b-versatile'),
    LLM_SECONDARY_MODEL: z.string().min(1).default('llama-3.1-8b-instant'),
    LLM_VERIFY_MODEL: z.string().min(1).default('llama-3.1-8b-instant'),
    LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    ALLOW_LOCAL_MODELS: booleanFlag.default('false'),
    LOCAL_MODEL_URL: z.string().url().default('http://localhost:11434/v1'),
    LOCAL_MODEL_ID: z.string().min(1).default('qwen2.5:1.5b-instruct'),

    MAX_QUESTIONS: z.coerce.number().int().min(1).max(15).default(15),
    SKIP_THRESHOLD: z.coerce.number().int().min(1).default(3),
    STRONG_THRESHOLD: z.coerce.number().min(0).max(1).default(0.75),
    NO_HIRE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.4),
    MIN_QUESTIONS: z.coerce.number().int().min(1).default(5)
});

export type Environment = z.infer<typeof environmentSchema>;

export interface LlmSettings {
    baseUrl: string;
    defaultApiKey?: string;
    primaryModel: string;
    secondaryModel: string;
    verifyModel: string;
    maxAttempts: number;
    timeoutMs: number;
    allowLocalModels: boolean;
    localModelUrl: string;
    localModelId: string;
}

export interface AppConfig {
    port: number;
    nodeEnv: string;
    logLevel: Environment['LOG_LEVEL'];
    llm: LlmSettings;
    policy: {
        maxQuestions: number;
        skipThreshold: number;
        strongThreshold: number;
        noHireThreshold: number;
        minQuestionsBeforeDecision: number;
    };
}

/**
 * Reads and validates configuration from the process environment.
 * Blank values are treated as unset so defaults apply.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(source)) {
        if (typeof value === 'string' && value.trim().length > 0) {
            cleaned[key] = value.trim();
        }
    }

    const env = environmentSchema.parse(cleaned);
    if (env.NO_HIRE_THRESHOLD > env.STRONG_THRESHOLD) {
        throw new Error('NO_HIRE_THRESHOLD must not exceed STRONG_THRESHOLD');
    }

    return {
        port: env.PORT,
        nodeEnv: env.NODE_ENV,
        logLevel: env.LOG_LEVEL,
        llm: {
            baseUrl: env.LLM_BASE_URL,
            defaultApiKey: env.LLM_API_KEY,
            primaryModel: env.LLM_PRIMARY_MODEL,
            secondaryModel: env.LLM_SECONDARY_MODEL,
            verifyModel: env.LLM_VERIFY_MODEL,
            maxAttempts: env.LLM_MAX_ATTEMPTS,
            timeoutMs: env.LLM_TIMEOUT_MS,
            allowLocalModels: env.ALLOW_LOCAL_MODELS,
            localModelUrl: env.LOCAL_MODEL_URL,
            localModelId: env.LOCAL_MODEL_ID
        },
        policy: {
            maxQuestions: env.MAX_QUESTIONS,
            skipThreshold: env.SKIP_THRESHOLD,
            strongThreshold: env.STRONG_THRESHOLD,
            noHireThreshold: env.NO_HIRE_THRESHOLD,
            minQuestionsBeforeDecision: env.MIN_QUESTIONS
        }
    };
}
