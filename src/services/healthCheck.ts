import { HealthResponse, ServiceHealth } from '../models/response';
import { ErrorHandler, TimeoutError } from '../utils/errors';
import { logger } from '../utils/logger';
import { CompletionGateway } from './completion';
import { SearchGateway } from './search';

export interface HealthCheckConfig {
    timeoutMs: number;
}

export const DEFAULT_HEALTH_CHECK_CONFIG: HealthCheckConfig = {
    timeoutMs: 10000
};

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(
            () => reject(new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, operation, timeoutMs)),
            timeoutMs
        );
    });

    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Probes the search index and the completion provider. Each probe is timed
 * and never throws; failures are reported as unhealthy components.
 */
export class HealthCheckService {
    private searchGateway: SearchGateway;
    private completionGateway: CompletionGateway;
    private config: HealthCheckConfig;
    private startTime: Date = new Date();

    constructor(searchGateway: SearchGateway, completionGateway: CompletionGateway, config: Partial<HealthCheckConfig> = {}) {
        this.searchGateway = searchGateway;
        this.completionGateway = completionGateway;
        this.config = { ...DEFAULT_HEALTH_CHECK_CONFIG, ...config };
    }

    public async getSystemHealth(): Promise<HealthResponse> {
        const services = await Promise.all([
            this.checkSearch(),
            this.checkCompletion()
        ]);

        const unhealthy = services.filter(service => service.status === 'unhealthy').length;
        const status: HealthResponse['status'] = unhealthy === 0
            ? 'healthy'
            : unhealthy === services.length ? 'unhealthy' : 'degraded';

        return {
            status,
            timestamp: new Date(),
            services,
            uptime: (Date.now() - this.startTime.getTime()) / 1000
        };
    }

    public checkSearch(): Promise<ServiceHealth> {
        return this.probe('search', async () => {
            const results = await this.searchGateway.hybridSearch('*', null, 1);
            return { sampleCount: results.length };
        });
    }

    public checkCompletion(): Promise<ServiceHealth> {
        return this.probe('completion', async () => {
            const { tokensUsed } = await this.completionGateway.chatCompletion({ query: 'ping', history: [] });
            return { tokensUsed };
        });
    }

    private async probe(name: string, check: () => Promise<object>): Promise<ServiceHealth> {
        const startTime = Date.now();

        try {
            const details = await withTimeout(check(), this.config.timeoutMs, `${name} health check`);
            return {
                name,
                status: 'healthy',
                responseTime: Date.now() - startTime,
                lastCheck: new Date(),
                details
            };
        } catch (error) {
            const message = ErrorHandler.toError(error).message;
            logger.warn(`Health check failed for ${name}`, { component: name, error: message });
            return {
                name,
                status: 'unhealthy',
                responseTime: Date.now() - startTime,
                lastCheck: new Date(),
                details: { error: message }
            };
        }
    }
}
