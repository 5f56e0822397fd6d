import { schedule, validate, ScheduledTask } from 'node-cron';
import { RunInProgressError } from '../errors';
import { RunSummary } from '../types';
import { MarketHolidayService } from './holidays';
import { DailyPipeline } from './pipeline';

export interface ScheduleOptions {
    cron: string;
    timezone: string;
    topN: number;
}

/**
 * Body of the scheduled trigger. Skips exchange holidays and leaves an
 * active manual run alone. Resolves to null on any failure, which is logged.
 */
export async function runScheduledJob(
    pipeline: Pick<DailyPipeline, 'run'>,
    options: Pick<ScheduleOptions, 'timezone' | 'topN'>,
    now: Date = new Date()
): Promise<RunSummary | null> {
    try {
        const today = MarketHolidayService.localDate(options.timezone, now);
        if (!MarketHolidayService.isTradingDay(today)) {
            console.log(`[Scheduler] ${today} is not a US trading day. Skipping.`);
            return null;
        }

        console.log(`[Scheduler] Daily run triggered for ${today}`);
        return await pipeline.run({ topN: options.topN, trigger: 'schedule' });
    } catch (error) {
        if (error instanceof RunInProgressError) {
            console.warn(`[Scheduler] ${error.message}. Skipping.`);
        } else {
            console.error('[Scheduler] Daily run failed:', error);
        }
        return null;
    }
}

export function startScheduler(pipeline: DailyPipeline, options: ScheduleOptions): ScheduledTask {
    if (!validate(options.cron)) {
        throw new Error(`Invalid cron expression: "${options.cron}"`);
    }

    const task = schedule(options.cron, () => {
        void runScheduledJob(pipeline, options);
    }, { timezone: options.timezone });

    console.log(`[Scheduler] Daily run scheduled at "${options.cron}" (${options.timezone})`);
    return task;
}
