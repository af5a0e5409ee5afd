import { loadConfigFromEnvironment } from './config';
import { createReviewPod } from './index';

async function main(): Promise<void> {
    const config = loadConfigFromEnvironment();
    const pod = createReviewPod(config);

    const shutdown = (signal: string) => {
        console.log(`${signal} received, shutting down`);
        pod.stop()
            .then(() => process.exit(0))
            .catch(error => {
                console.error('Shutdown failed:', error);
                process.exit(1);
            });
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));

    await pod.start();
}

main().catch(error => {
    console.error('Review pod failed to start:', error);
    process.exit(1);
});
