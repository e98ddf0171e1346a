// Veloce Micro-Challenge
// A 30-second "just start" countdown attached to an avoided task

import { MICRO_CHALLENGE_DEFAULTS } from '../constants';
import { logger, systemContext } from '../logger';

export interface MicroChallengeOptions {
    title?: string;
    seconds?: number;
    taskId?: string;
    onCountdownTick?: (secondsLeft: number) => void;
    onComplete?: () => void;
}

export class MicroChallenge {
    readonly title: string;
    readonly seconds: number;
    isActive = false;
    isCompleted = false;
    countdown: number;

    private readonly taskId?: string;
    private readonly onCountdownTick?: (secondsLeft: number) => void;
    private readonly onComplete?: () => void;
    private interval: ReturnType<typeof setInterval> | null = null;

    constructor(options: MicroChallengeOptions = {}) {
        this.title = options.title ?? MICRO_CHALLENGE_DEFAULTS.firstStepTitle;
        this.seconds = options.seconds ?? MICRO_CHALLENGE_DEFAULTS.firstStepSeconds;
        this.countdown = this.seconds;
        this.taskId = options.taskId;
        this.onCountdownTick = options.onCountdownTick;
        this.onComplete = options.onComplete;
    }

    start(): void {
        this.clearTimer();
        this.isActive = true;
        this.isCompleted = false;
        this.countdown = this.seconds;
        this.interval = setInterval(() => this.tick(), 1000);
    }

    private tick(): void {
        if (!this.isActive) return;

        this.countdown -= 1;
        if (this.countdown > 0 && this.countdown <= MICRO_CHALLENGE_DEFAULTS.finalCountdownFrom) {
            this.onCountdownTick?.(this.countdown);
        }
        if (this.countdown <= 0) {
            this.complete();
        }
    }

    private complete(): void {
        this.clearTimer();
        this.countdown = 0;
        this.isActive = false;
        this.isCompleted = true;
        logger.info('LOG.MICRO_CHALLENGE_COMPLETE', { title: this.title, seconds: this.seconds },
            systemContext('focus', { taskId: this.taskId }));
        this.onComplete?.();
    }

    cancel(): void {
        this.clearTimer();
        this.isActive = false;
        this.countdown = this.seconds;
    }

    reset(): void {
        this.cancel();
        this.isCompleted = false;
    }

    dispose(): void {
        this.clearTimer();
    }

    private clearTimer(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
        }
    }
}
