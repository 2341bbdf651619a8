import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config/environment';
import { errorHandler } from './middleware/errorHandler';
import { sanitizeInput } from './middleware/validation';
import { createGeneralRateLimit } from './middleware/rateLimiting';
import { createApiRouter, ApiServices } from './routes';
import { AttendanceService } from './services/attendanceService';
import { AuthService } from './services/authService';

/**
 * Build the Express app. Services can be swapped out, which is how the
 * route tests run without a database or the geolocation API.
 */
export function createApp(services: Partial<ApiServices> = {}): Express {
    const app = express();

    app.set('trust proxy', config.trustProxy);

    app.use(helmet());
    app.use(cors({
        origin: true,
        credentials: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'Origin', 'X-Requested-With'],
        exposedHeaders: ['Content-Disposition']
    }));

    app.use('/api/', createGeneralRateLimit());

    app.use(express.json({ limit: '100kb' }));
    app.use(express.urlencoded({ extended: true }));

    app.use(sanitizeInput);

    // Health check endpoint
    app.get('/health', (req, res) => {
        res.json({
            status: 'OK',
            timestamp: new Date().toISOString()
        });
    });

    app.use('/api', createApiRouter({
        attendanceService: services.attendanceService ?? new AttendanceService(),
        authService: services.authService ?? new AuthService()
    }));

    // 404 for unknown routes
    app.use((req, res) => {
        res.status(404).json({
            success: false,
            error: `Route ${req.method} ${req.path} not found`,
            code: 'NOT_FOUND'
        });
    });

    // Error handling middleware
    app.use(errorHandler);

    return app;
}
