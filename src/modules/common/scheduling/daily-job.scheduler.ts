// src/modules/common/scheduling/daily-job.scheduler.ts
import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { addDays, differenceInMilliseconds, isAfter, set } from 'date-fns';
import { PinoLogger } from 'nestjs-pino';

export const DAILY_JOBS = Symbol('SCHEDULING.DAILY_JOBS');

/**
 * 每日任务定义
 * - name：日志中的任务名
 * - timeConfigKey：执行时刻（HH:mm）的配置键
 */
export interface DailyJob {
  readonly name: string;
  readonly timeConfigKey: string;
  readonly defaultTime: string;
  run(): Promise<unknown>;
}

/**
 * 解析 HH:mm，非法时返回 null
 */
export function parseClock(raw: string): { hours: number; minutes: number } | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(raw.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return { hours, minutes };
}

/**
 * 计算距离下一次 HH:mm（本地时间）的毫秒数
 */
export function msUntilNext(clock: { hours: number; minutes: number }, now: Date): number {
  let next = set(now, { hours: clock.hours, minutes: clock.minutes, seconds: 0, milliseconds: 0 });
  if (!isAfter(next, now)) next = addDays(next, 1);
  return differenceInMilliseconds(next, now);
}

/**
 * 每日任务调度器：为每个任务维护一个自调度的 setTimeout
 */
@Injectable()
export class DailyJobScheduler implements OnModuleInit, OnModuleDestroy {
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private running = false;

  constructor(
    private readonly config: ConfigService,
    @Inject(DAILY_JOBS) private readonly jobs: ReadonlyArray<DailyJob>,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(DailyJobScheduler.name);
  }

  async onModuleInit(): Promise<void> {
    const enabled = this.config.get<boolean>('scheduler.enabled', true);
    if (!enabled) {
      this.logger.info('每日任务调度已关闭');
      return;
    }
    this.running = true;
    for (const job of this.jobs) this.scheduleNext(job);
    await Promise.resolve();
  }

  async onModuleDestroy(): Promise<void> {
    this.running = false;
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    await Promise.resolve();
  }

  /**
   * 立即执行一次任务（不影响既定调度）
   */
  async runNow(job: DailyJob): Promise<void> {
    const startedAt = Date.now();
    try {
      const result = await job.run();
      this.logger.info({ job: job.name, result, costMs: Date.now() - startedAt }, '每日任务完成');
    } catch (error) {
      this.logger.error(
        { job: job.name, error: error instanceof Error ? error.message : String(error) },
        '每日任务执行失败',
      );
    }
  }

  private scheduleNext(job: DailyJob): void {
    if (!this.running) return;
    const raw = this.config.get<string>(job.timeConfigKey, job.defaultTime);
    const clock = parseClock(raw) ?? parseClock(job.defaultTime);
    if (!clock) {
      this.logger.warn({ job: job.name, raw }, '执行时刻配置非法，任务未调度');
      return;
    }
    const delay = msUntilNext(clock, new Date());
    this.logger.debug({ job: job.name, delayMs: delay }, '已安排下一次执行');
    const timer = setTimeout(() => {
      void this.runNow(job).finally(() => this.scheduleNext(job));
    }, delay);
    this.timers.set(job.name, timer);
  }
}
