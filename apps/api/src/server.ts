import Fastify from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import { env } from './config/env';
import { buildPipelineConfig } from './config/pipeline-config';
import { errorHandler } from './interfaces/http/error-handler';
import { analyzeRoutes } from './interfaces/http/routes/analyze.routes';
import { reportRoutes } from './interfaces/http/routes/report.routes';

const server = Fastify({
    logger: env.NODE_ENV === 'production' ? {
        level: env.LOG_LEVEL,
        redact: ['req.headers.authorization', 'req.headers["x-goog-api-key"]']
    } : {
        level: env.LOG_LEVEL,
        transport: {
            target: 'pino-pretty',
            options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
            },
        },
        redact: ['req.headers.authorization', 'req.headers["x-goog-api-key"]']
    },
});

async function bootstrap() {
    try {
        const config = buildPipelineConfig(env);

        // Middleware
        await server.register(cors, {
            origin: env.CORS_ORIGIN,
        });

        await server.register(multipart, {
            limits: {
                fileSize: env.MAX_UPLOAD_BYTES,
            },
        });

        await server.register(rateLimit, {
            max: env.RATE_LIMIT_MAX,
            timeWindow: '1 minute',
            // Thrown into errorHandler, which reads statusCode and message
            errorResponseBuilder: (request, context) => Object.assign(
                new Error(`Too many requests. Please try again in ${context.after}.`),
                { statusCode: 429 }
            ),
        });

        server.setErrorHandler(errorHandler);

        // Routes
        server.get('/health', async () => ({ status: 'OK', timestamp: new Date().toISOString() }));

        await server.register(analyzeRoutes, {
            prefix: '/analyze',
            config,
            model: { apiKey: env.GEMINI_API_KEY, modelName: env.GEMINI_MODEL_VISION },
        });
        await server.register(reportRoutes, { prefix: '/reports', reportsDir: config.storage.reportsDir });

        await server.listen({ port: env.PORT, host: env.HOST });

        // Graceful Shutdown
        const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
        signals.forEach((signal) => {
            process.once(signal, () => {
                server.log.info(`Received ${signal}, closing server...`);
                server.close()
                    .then(() => process.exit(0))
                    .catch((err: unknown) => {
                        server.log.error(err);
                        process.exit(1);
                    });
            });
        });
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
}

void bootstrap();
