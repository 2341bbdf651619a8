import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

interface Config {
    nodeEnv: string;
    port: number;
    trustProxy: boolean;
    database: {
        host: string;
        port: number;
        name: string;
        user: string;
        password: string;
        ssl: boolean;
        poolMax: number;
    };
    jwt: {
        secret: string;
    };
    admin: {
        username: string;
        password: string;
        passwordHash?: string;
        sessionTtlSeconds: number;
    };
    geolocation: {
        apiUrl: string;
        apiToken?: string;
        timeoutMs: number;
    };
}

export const config: Config = {
    nodeEnv: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '3000', 10),
    trustProxy: process.env.TRUST_PROXY === 'true',
    database: {
        host: process.env.DB_HOST || 'localhost',
        port: parseInt(process.env.DB_PORT || '5432', 10),
        name: process.env.DB_NAME || 'geo_attendance',
        user: process.env.DB_USER || 'postgres',
        password: process.env.DB_PASSWORD || 'password',
        ssl: process.env.DB_SSL === 'true',
        poolMax: parseInt(process.env.DB_POOL_MAX || '10', 10),
    },
    jwt: {
        secret: process.env.JWT_SECRET || 'dev-only-jwt-secret-change-in-production',
    },
    admin: {
        username: process.env.ADMIN_USERNAME || 'admin',
        password: process.env.ADMIN_PASSWORD || '12345',
        passwordHash: process.env.ADMIN_PASSWORD_HASH || undefined,
        sessionTtlSeconds: parseInt(process.env.ADMIN_SESSION_TTL_SECONDS || '28800', 10),
    },
    geolocation: {
        apiUrl: (process.env.GEO_API_URL || 'https://ipinfo.io').replace(/\/+$/, ''),
        apiToken: process.env.GEO_API_TOKEN || undefined,
        timeoutMs: parseInt(process.env.GEO_TIMEOUT_MS || '5000', 10),
    },
};

// Validate required environment variables in production
if (config.nodeEnv === 'production') {
    const requiredEnvVars = [
        'JWT_SECRET',
        'ADMIN_USERNAME',
        'DB_HOST',
        'DB_NAME',
        'DB_USER',
        'DB_PASSWORD'
    ];

    const missingEnvVars = requiredEnvVars.filter(envVar => !process.env[envVar]);

    if (!process.env.ADMIN_PASSWORD && !process.env.ADMIN_PASSWORD_HASH) {
        missingEnvVars.push('ADMIN_PASSWORD or ADMIN_PASSWORD_HASH');
    }

    if (missingEnvVars.length > 0) {
        console.error('Missing required environment variables:', missingEnvVars);
        process.exit(1);
    }
}
