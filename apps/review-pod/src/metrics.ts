import { Counter, Gauge, Histogram, register } from 'prom-client';
import promBundle from 'express-prom-bundle';

export type HubName = 'notifications' | 'comments';

// Initialize Prometheus metrics
const metrics = {
    // Connection metrics
    activeConnections: new Gauge({
        name: 'blogflow_active_connections',
        help: 'Number of live push and comment connections',
        labelNames: ['hub', 'room_id'] as const,
    }),

    evictions: new Counter({
        name: 'connections_evicted_total',
        help: 'Connections closed by the server, by reason',
        labelNames: ['hub', 'reason'] as const,
    }),

    // Workflow metrics
    transitions: new Counter({
        name: 'workflow_transitions_total',
        help: 'Workflow transition attempts by outcome',
        labelNames: ['action', 'outcome'] as const,
    }),

    transitionLatency: new Histogram({
        name: 'workflow_transition_ms',
        help: 'Time to validate, commit and publish a transition in milliseconds',
        labelNames: ['action'] as const,
        buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
    }),

    // Delivery metrics
    deliveryDegraded: new Counter({
        name: 'delivery_degraded_total',
        help: 'Committed changes that could not reach every subscriber',
        labelNames: ['hub', 'reason'] as const,
    }),

    commentsPosted: new Counter({
        name: 'comments_posted_total',
        help: 'Comments accepted into rooms',
    }),
};

register.setDefaultLabels({
    app: 'review-pod',
});

// HTTP metrics; /metrics itself is served by the app
const httpMetricsMiddleware = promBundle({
    autoregister: false,
    includeMethod: true,
    includePath: true,
    includeStatusCode: true,
    includeUp: true,
    customLabels: { app: 'review-pod' },
    promClient: { collectDefaultMetrics: {} },
});

// Helper functions to track metrics
const trackConnection = (hub: HubName, roomId = 'none', increment = true) => {
    const method = increment ? 'inc' : 'dec';
    metrics.activeConnections[method]({ hub, room_id: roomId });
};

const trackEviction = (hub: HubName, reason: string) => {
    metrics.evictions.inc({ hub, reason });
};

const trackTransition = (action: string, outcome: string, durationMs?: number) => {
    metrics.transitions.inc({ action, outcome });
    if (durationMs !== undefined) {
        metrics.transitionLatency.observe({ action }, durationMs);
    }
};

const trackDegraded = (hub: HubName | 'workflow', reason: string) => {
    metrics.deliveryDegraded.inc({ hub, reason });
};

const trackComment = () => {
    metrics.commentsPosted.inc();
};

export {
    metrics,
    register,
    httpMetricsMiddleware,
    trackConnection,
    trackEviction,
    trackTransition,
    trackDegraded,
    trackComment,
};
