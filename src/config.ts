import dotenv from 'dotenv';

if (process.env.NODE_ENV !== 'production') {
    dotenv.config();
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Config {
    port: number;
    nodeEnv: string;
    logLevel: LogLevel;

    database: {
        path: string;
    };

    paths: {
        logs: string;
        salonConfig: string;
        faqFile: string;
    };

    admin: {
        apiKey: string;
    };

    openai: {
        apiKey?: string;
        embeddingModel: string;
        embeddingDimensions?: number;
    };

    knowledge: {
        collection: string;
        similarityThreshold: number;
        topK: number;
        refreshIntervalMs: number;
    };

    notifications: {
        supervisorWebhookUrl?: string;
        aiCallbackUrl?: string;
        timeoutMs: number;
        maxAttempts: number;
        backoffMs: number;
        pollIntervalMs: number;
    };

    twilio: {
        accountSid?: string;
        authToken?: string;
        phoneNumber?: string;
        supervisorPhone?: string;
    };

    redis: {
        url?: string;
        idempotencyTtlSeconds: number;
    };

    features: {
        smsNotifications: boolean;
    };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function getEnvVar(key: string, defaultValue?: string): string {
    const value = process.env[key] || defaultValue;
    if (!value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
}

function getOptional(key: string): string | undefined {
    const value = process.env[key];
    return value && value.trim() ? value.trim() : undefined;
}

function getNumber(key: string, defaultValue: number): number {
    const raw = getOptional(key);
    if (raw === undefined) return defaultValue;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
    }
    return parsed;
}

function parseLogLevel(raw: string): LogLevel {
    const level = LOG_LEVELS.find(l => l === raw.toLowerCase());
    if (!level) {
        throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
    }
    return level;
}

const embeddingDimensions = getOptional('EMBEDDING_DIMENSIONS');

export const config: Readonly<Config> = Object.freeze({
    port: getNumber('PORT', 3000),
    nodeEnv: getEnvVar('NODE_ENV', 'development'),
    logLevel: parseLogLevel(getEnvVar('LOG_LEVEL', 'info')),

    database: {
        path: getEnvVar('DB_PATH', './receptionist.db'),
    },

    paths: {
        logs: getEnvVar('LOGS_PATH', './logs'),
        salonConfig: getEnvVar('SALON_CONFIG_PATH', './config/salon.json'),
        faqFile: getEnvVar('FAQ_FILE_PATH', './config/faq.json'),
    },

    admin: {
        apiKey: getEnvVar('ADMIN_API_KEY'),
    },

    openai: {
        apiKey: getOptional('OPENAI_API_KEY'),
        embeddingModel: getEnvVar('EMBEDDING_MODEL', 'text-embedding-3-small'),
        embeddingDimensions: embeddingDimensions ? getNumber('EMBEDDING_DIMENSIONS', 0) : undefined,
    },

    knowledge: {
        collection: getEnvVar('KNOWLEDGE_COLLECTION', 'knowledge_base'),
        similarityThreshold: getNumber('KNOWLEDGE_SIMILARITY_THRESHOLD', 0.8),
        topK: getNumber('KNOWLEDGE_TOP_K', 3),
        refreshIntervalMs: getNumber('FAQ_REFRESH_INTERVAL_MS', 30 * 60 * 1000),
    },

    notifications: {
        supervisorWebhookUrl: getOptional('SUPERVISOR_WEBHOOK_URL'),
        aiCallbackUrl: getOptional('AI_CALLBACK_URL'),
        timeoutMs: getNumber('NOTIFY_TIMEOUT_MS', 10000),
        maxAttempts: getNumber('NOTIFY_MAX_ATTEMPTS', 3),
        backoffMs: getNumber('NOTIFY_BACKOFF_MS', 5000),
        pollIntervalMs: getNumber('NOTIFY_POLL_INTERVAL_MS', 5000),
    },

    twilio: {
        accountSid: getOptional('TWILIO_ACCOUNT_SID'),
        authToken: getOptional('TWILIO_AUTH_TOKEN'),
        phoneNumber: getOptional('TWILIO_PHONE_NUMBER'),
        supervisorPhone: getOptional('SUPERVISOR_PHONE'),
    },

    redis: {
        url: getOptional('REDIS_URL'),
        idempotencyTtlSeconds: getNumber('IDEMPOTENCY_TTL_SECONDS', 24 * 60 * 60),
    },

    features: {
        smsNotifications: getEnvVar('FEATURE_SMS_NOTIFICATIONS', 'false') === 'true',
    },
});

/**
 * Collects every configuration problem at once instead of failing on the first.
 * Returns the list so the caller decides whether to exit.
 */
export function validateEnvironment(cfg: Readonly<Config> = config): string[] {
    const errors: string[] = [];

    if (cfg.nodeEnv === 'production' && !cfg.openai.apiKey) {
        errors.push('OPENAI_API_KEY (required for embeddings in production)');
    }

    if (cfg.features.smsNotifications) {
        if (!cfg.twilio.accountSid) errors.push('TWILIO_ACCOUNT_SID (required when SMS notifications are enabled)');
        if (!cfg.twilio.authToken) errors.push('TWILIO_AUTH_TOKEN (required when SMS notifications are enabled)');
        if (!cfg.twilio.phoneNumber) errors.push('TWILIO_PHONE_NUMBER (required when SMS notifications are enabled)');
        if (!cfg.twilio.supervisorPhone) errors.push('SUPERVISOR_PHONE (required when SMS notifications are enabled)');
    }

    if (cfg.knowledge.similarityThreshold < 0 || cfg.knowledge.similarityThreshold > 1) {
        errors.push('KNOWLEDGE_SIMILARITY_THRESHOLD must be between 0 and 1');
    }

    if (cfg.notifications.maxAttempts < 1) {
        errors.push('NOTIFY_MAX_ATTEMPTS must be at least 1');
    }

    return errors;
}
