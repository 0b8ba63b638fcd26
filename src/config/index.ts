/**
 * Environment configuration.
 *
 * `loadConfig` validates the process environment once at startup and hands
 * out a typed, immutable object. Every invalid key is reported in one error.
 */

import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform(value => value === 'true' || value === '1');

const optionalString = z
    .string()
    .optional()
    .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z
    .object({
        NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
        PORT: z.coerce.number().int().positive().default(3001),

        DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
        DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(10),
        REDIS_URL: optionalString,

        JWT_SECRET: optionalString,
        FRONTEND_URL: optionalString,

        UPTRENDS_API_URL: z.string().url().default('https://api.uptrends.com/v4'),
        UPTRENDS_USERNAME: optionalString,
        UPTRENDS_API_KEY: optionalString,

        SITE24X7_API_URL: z.string().url().default('https://www.site24x7.com/api'),
        SITE24X7_ACCOUNTS_URL: z.string().url().default('https://accounts.zoho.com'),
        SITE24X7_CLIENT_ID: optionalString,
        SITE24X7_CLIENT_SECRET: optionalString,
        SITE24X7_REFRESH_TOKEN: optionalString,

        TELEGRAM_BOT_TOKEN: optionalString,
        TELEGRAM_API_URL: z.string().url().default('https://api.telegram.org'),

        RESEND_API_KEY: optionalString,
        EMAIL_FROM: z.string().min(1).default('Domain Monitor <alerts@example.com>'),

        RECONCILE_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
        MONITOR_CREATE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
        MONITOR_QUEUE_CONCURRENCY: z.coerce.number().int().positive().default(2),
        NOTIFY_ON_STATUS: booleanFlag,
        DEFAULT_DOMAIN_LIMIT: z.coerce.number().int().positive().default(100),
    })
    .superRefine((env, ctx) => {
        if (env.NODE_ENV === 'production' && !env.JWT_SECRET) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['JWT_SECRET'],
                message: 'JWT_SECRET is required in production',
            });
        }
    });

type Env = z.infer<typeof envSchema>;

export interface UptrendsSettings {
    baseUrl: string;
    username: string;
    apiKey: string;
}

export interface Site24x7Settings {
    baseUrl: string;
    accountsUrl: string;
    clientId: string;
    clientSecret: string;
    refreshToken: string;
}

export interface AppConfig {
    env: Env['NODE_ENV'];
    port: number;
    databaseUrl: string;
    databasePoolSize: number;
    redisUrl?: string;
    jwtSecret?: string;
    frontendUrl?: string;
    uptrends: UptrendsSettings | null;
    site24x7: Site24x7Settings | null;
    telegram: { botToken: string; apiUrl: string } | null;
    email: { apiKey: string; from: string } | null;
    reconcileIntervalMs: number;
    monitorCreateDelayMs: number;
    monitorQueueConcurrency: number;
    notifyOnStatus: boolean;
    defaultDomainLimit: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`FATAL: Invalid environment configuration. ${problems.join('; ')}`);
    }

    const env = parsed.data;

    return Object.freeze({
        env: env.NODE_ENV,
        port: env.PORT,
        databaseUrl: env.DATABASE_URL,
        databasePoolSize: env.DATABASE_POOL_SIZE,
        redisUrl: env.REDIS_URL,
        jwtSecret: env.JWT_SECRET,
        frontendUrl: env.FRONTEND_URL,
        uptrends: env.UPTRENDS_USERNAME && env.UPTRENDS_API_KEY
            ? { baseUrl: env.UPTRENDS_API_URL, username: env.UPTRENDS_USERNAME, apiKey: env.UPTRENDS_API_KEY }
            : null,
        site24x7: env.SITE24X7_CLIENT_ID && env.SITE24X7_CLIENT_SECRET && env.SITE24X7_REFRESH_TOKEN
            ? {
                baseUrl: env.SITE24X7_API_URL,
                accountsUrl: env.SITE24X7_ACCOUNTS_URL,
                clientId: env.SITE24X7_CLIENT_ID,
                clientSecret: env.SITE24X7_CLIENT_SECRET,
                refreshToken: env.SITE24X7_REFRESH_TOKEN,
            }
            : null,
        telegram: env.TELEGRAM_BOT_TOKEN
            ? { botToken: env.TELEGRAM_BOT_TOKEN, apiUrl: env.TELEGRAM_API_URL }
            : null,
        email: env.RESEND_API_KEY
            ? { apiKey: env.RESEND_API_KEY, from: env.EMAIL_FROM }
            : null,
        reconcileIntervalMs: env.RECONCILE_INTERVAL_MS,
        monitorCreateDelayMs: env.MONITOR_CREATE_DELAY_MS,
        monitorQueueConcurrency: env.MONITOR_QUEUE_CONCURRENCY,
        notifyOnStatus: env.NOTIFY_ON_STATUS,
        defaultDomainLimit: env.DEFAULT_DOMAIN_LIMIT,
    });
}
