import { Router, Request, Response } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';

export interface DatabaseHealth {
    healthy: boolean;
    latency?: number;
    error?: string;
}

export type HealthCheck = () => Promise<DatabaseHealth>;

const MESSAGE = 'Notes API with TypeScript and MongoDB';

/**
 * GET /api/healthchecker
 * Reports service liveness together with database reachability
 */
export function createHealthRouter(checkDatabase: HealthCheck): Router {
    const router = Router();

    router.get('/healthchecker', asyncHandler(async (_req: Request, res: Response) => {
        const database = await checkDatabase();

        if (!database.healthy) {
            res.status(503).json({
                status: 'fail',
                message: 'Database unavailable',
                database: 'error',
            });
            return;
        }

        res.json({
            status: 'success',
            message: MESSAGE,
            database: 'ok',
            latency: database.latency,
        });
    }));

    return router;
}
