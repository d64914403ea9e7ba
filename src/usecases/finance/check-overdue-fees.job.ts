// src/usecases/finance/check-overdue-fees.job.ts
import { buildEnvelope } from '@core/common/integration-events/events.types';
import type { IOutboxWriterPort } from '@core/common/integration-events/outbox.port';
import { overdueReminderMessage } from '@core/finance/finance.policy';
import { OUTBOX_WRITER } from '@modules/common/integration-events/events.tokens';
import type { DailyJob } from '@modules/common/scheduling/daily-job.scheduler';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { OverdueReminderRule } from './overdue-reminder.rule';

/**
 * 每日欠费检查：遍历全部报名，对欠费学员生成提醒并排队发送邮件
 */
@Injectable()
export class CheckOverdueFeesJob implements DailyJob {
  readonly name = 'check-overdue-fees';
  readonly timeConfigKey = 'scheduler.overdueFeesAt';
  readonly defaultTime = '09:00';

  constructor(
    private readonly enrollmentService: EnrollmentService,
    private readonly overdueRule: OverdueReminderRule,
    @Inject(OUTBOX_WRITER)
    private readonly outboxWriter: IOutboxWriterPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CheckOverdueFeesJob.name);
  }

  async run(now: Date = new Date()): Promise<{ detail: string }> {
    const enrollments = await this.enrollmentService.findAllWithRelations();
    let count = 0;

    // 顺序执行：同一学员报了同课程多个班级时，后一次能看到前一次刚建的提醒
    for (const enrollment of enrollments) {
      const course = enrollment.batch?.course;
      if (!course) continue;
      const reminder = await this.overdueRule.apply({
        studentId: enrollment.studentId,
        course,
        batchId: enrollment.batchId,
        message: (due) => overdueReminderMessage(course.title, due),
        now,
      });
      if (!reminder) continue;

      await this.outboxWriter.enqueue({
        envelope: buildEnvelope({
          type: 'FeeReminderCreated',
          aggregateType: 'Reminder',
          aggregateId: reminder.id,
          payload: { reminderId: reminder.id },
        }),
      });
      count += 1;
    }

    this.logger.info({ enrollments: enrollments.length, created: count }, '欠费检查完成');
    return { detail: `${count} overdue reminders queued.` };
  }
}
