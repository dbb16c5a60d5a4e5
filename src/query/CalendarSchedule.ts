/**
 * 폴링 쿼리 스케줄
 *
 * 정수는 주기(초), CalendarSchedule은 cron 형식의 달력 스케줄이며,
 * 둘을 섞은 목록도 하나의 스케줄로 쓸 수 있습니다.
 */

import { z } from 'zod';
import { PolledQueryError } from '../errors/TriggerwareErrors.js';

const TIMEZONE_PATTERN = /^[A-Za-z]+(?:_[A-Za-z]+)*(?:\/[A-Za-z]+(?:_[A-Za-z]+)*)*$/;

/** 달력 필드 값: '*' 또는 "1,5,10-12" 형식 */
function calendarField(unit: string, min: number, max: number) {
  return z.string().superRefine((value, ctx) => {
    if (value === '*') return;

    for (const part of value.split(/[,-]/)) {
      if (!/^\d+$/.test(part)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `잘못된 ${unit} 값: ${part}` });
        return;
      }
      const parsed = Number(part);
      if (parsed < min || parsed > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${unit} 값이 범위(${min}-${max})를 벗어났습니다: ${part}`,
        });
        return;
      }
    }
  });
}

const CalendarScheduleSchema = z.object({
  days: calendarField('day', 1, 31),
  hours: calendarField('hour', 0, 23),
  minutes: calendarField('minute', 0, 59),
  months: calendarField('month', 1, 12),
  weekdays: calendarField('weekday', 0, 6),
  timezone: z.string().regex(TIMEZONE_PATTERN, '잘못된 시간대 형식입니다'),
});

/** 달력 스케줄 필드 */
export type CalendarScheduleFields = z.infer<typeof CalendarScheduleSchema>;

/**
 * cron과 비슷한 달력 스케줄.
 * 지정하지 않은 필드는 '*', 시간대는 UTC입니다.
 */
export class CalendarSchedule implements CalendarScheduleFields {
  days: string;
  hours: string;
  minutes: string;
  months: string;
  weekdays: string;
  timezone: string;

  constructor(fields: Partial<CalendarScheduleFields> = {}) {
    this.days = fields.days ?? '*';
    this.hours = fields.hours ?? '*';
    this.minutes = fields.minutes ?? '*';
    this.months = fields.months ?? '*';
    this.weekdays = fields.weekdays ?? '*';
    this.timezone = fields.timezone ?? 'UTC';
  }

  /**
   * 각 필드의 형식과 범위를 검사합니다.
   *
   * @throws PolledQueryError 잘못된 필드가 있는 경우 (첫 번째 문제를 보고)
   */
  validate(): void {
    const parsed = CalendarScheduleSchema.safeParse(this.toJSON());
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PolledQueryError(issue?.message ?? '잘못된 달력 스케줄입니다');
    }
  }

  toJSON(): CalendarScheduleFields {
    return {
      days: this.days,
      hours: this.hours,
      minutes: this.minutes,
      months: this.months,
      weekdays: this.weekdays,
      timezone: this.timezone,
    };
  }
}

/** 폴링 스케줄 */
export type PolledQuerySchedule = number | CalendarSchedule | PolledQuerySchedule[];

/** 와이어로 보내는 스케줄 표현 */
export type SerializedSchedule = number | CalendarScheduleFields | SerializedSchedule[];

/**
 * 스케줄을 검증하고 와이어 형식으로 변환합니다.
 *
 * @throws PolledQueryError 잘못된 스케줄
 */
export function serializeSchedule(schedule: PolledQuerySchedule): SerializedSchedule {
  if (Array.isArray(schedule)) {
    return schedule.map(serializeSchedule);
  }
  if (typeof schedule === 'number') {
    if (!Number.isInteger(schedule) || schedule < 0) {
      throw new PolledQueryError(`스케줄 주기는 0 이상의 정수여야 합니다: ${schedule}`);
    }
    return schedule;
  }
  schedule.validate();
  return schedule.toJSON();
}
