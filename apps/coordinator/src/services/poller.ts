import { calculateBackOff } from '../utils/backoff';
import { JobQueue, QueuedJob } from './job-queue';

const TAG = '[poller]';

export interface PollerConfig {
    workerId: string;
    onJobReceived: (job: QueuedJob) => Promise<void>;
    batchSize?: number;
    minIntervalMs?: number;
    maxIntervalMs?: number;
}

/** Drains `jobs:queue`, backing off while it is empty. */
export class Poller {
    private readonly minInterval: number;
    private readonly maxInterval: number;
    private readonly batchSize: number;
    private readonly workerId: string;
    private readonly onJobReceived: (job: QueuedJob) => Promise<void>;
    private idleRounds = 0;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;

    constructor(
        private readonly queue: Pick<JobQueue, 'dequeue'>,
        config: PollerConfig,
    ) {
        this.workerId = config.workerId;
        this.onJobReceived = config.onJobReceived;
        this.batchSize = config.batchSize || 10;
        this.minInterval = config.minIntervalMs ?? 100;
        this.maxInterval = config.maxIntervalMs ?? 500;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (worker: ${this.workerId})`);
        void this.poll();
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        let delay: number;
        try {
            const jobs = await this.queue.dequeue(this.batchSize);

            if (jobs.length > 0) {
                this.idleRounds = 0;
                for (const job of jobs) {
                    this.onJobReceived(job).catch(
                        err => console.error(`${TAG} job ${job.jobId} callback error:`, err),
                    );
                }
                delay = this.minInterval;
            } else {
                // 100 -> 200 -> 400 -> 500ms cap
                this.idleRounds++;
                delay = calculateBackOff(this.idleRounds + 1, this.minInterval, { maxMs: this.maxInterval, jitter: 0 });
            }
        } catch (err) {
            console.error(`${TAG} dequeue error:`, err);
            delay = this.maxInterval;
        }

        if (this.running) {
            this.currentTimeout = setTimeout(() => void this.poll(), delay);
        }
    }
}
