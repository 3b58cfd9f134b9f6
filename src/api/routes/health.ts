import { NextFunction, Request, Response, Router } from 'express';
import { HealthCheckService } from '../../services/healthCheck';

export function createHealthRoutes(healthCheckService: HealthCheckService): Router {
    const router = Router();

    /**
     * Basic health check endpoint
     * GET /health
     */
    router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const health = await healthCheckService.getSystemHealth();
            const statusCode = health.status === 'healthy' ? 200 : 503;
            res.status(statusCode).json(health);
        } catch (error) {
            next(error);
        }
    });

    /**
     * Liveness probe endpoint
     * GET /health/live
     */
    router.get('/live', (_req: Request, res: Response) => {
        res.status(200).json({
            status: 'alive',
            timestamp: new Date(),
            uptime: process.uptime()
        });
    });

    return router;
}
