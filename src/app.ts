import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { createRecipesRouter } from './controllers/recipes.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware, notFoundMiddleware } from './middleware/error.middleware.js';
import type { Recommender } from './services/recipes/recommender.service.js';

export interface AppDeps {
    recommender: Recommender;
}

export function createApp({ recommender }: AppDeps) {
    const app = express();
    app.use(helmet());
    app.use(compression());
    app.use(cors());

    // Request context & logging (BEFORE body parsing, so parse errors carry a traceId)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);

    app.use(express.json({ limit: '16kb' }));

    app.use('/api', createRecipesRouter(recommender));

    app.get('/healthz', (_req, res) => res.status(200).send('ok'));

    app.use(notFoundMiddleware);
    app.use(errorMiddleware);

    return app;
}
