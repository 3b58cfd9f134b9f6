export interface HealthResponse {
    status: 'healthy' | 'degraded' | 'unhealthy';
    timestamp: Date;
    services: ServiceHealth[];
    uptime: number;
}

export interface ServiceHealth {
    name: string;
    status: 'healthy' | 'unhealthy';
    responseTime?: number;
    lastCheck: Date;
    details?: object;
}
