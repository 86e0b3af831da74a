import { z } from 'zod';

/**
 * Immutable settings for question set building and sheet generation.
 * Passed explicitly into the services and the publish job; nothing below
 * reads process state.
 */
export interface QuestionSetConfig {
  readonly size: number;
  readonly friendRatio: number;
  readonly openTime1: TimeOfDay;
  readonly openTime2: TimeOfDay;
  readonly candidatePoolSize: number;
}

export interface TimeOfDay {
  readonly hours: number;
  readonly minutes: number;
}

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function parseTimeOfDay(value: string): TimeOfDay {
  const match = value.trim().match(TIME_OF_DAY_PATTERN);
  if (!match) {
    throw new Error(`Invalid time of day "${value}", expected HH:mm`);
  }
  return { hours: parseInt(match[1], 10), minutes: parseInt(match[2], 10) };
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hours).padStart(2, '0')}:${String(time.minutes).padStart(2, '0')}`;
}

export function minutesOfDay(time: TimeOfDay): number {
  return time.hours * 60 + time.minutes;
}

const timeOfDaySchema = z
  .string()
  .regex(TIME_OF_DAY_PATTERN, 'must be HH:mm (24h)')
  .transform(parseTimeOfDay);

export const questionSetConfigSchema = z
  .object({
    QUESTION_SET_SIZE: z.string().regex(/^\d+$/).transform(Number).default('12'),
    QUESTION_SET_FRIEND_RATIO: z
      .string()
      .regex(/^(0(\.\d+)?|1(\.0+)?)$/, 'must be a number between 0 and 1')
      .transform(Number)
      .default('0.6'),
    QUESTION_SET_OPEN_TIME_1: timeOfDaySchema.default('09:00'),
    QUESTION_SET_OPEN_TIME_2: timeOfDaySchema.default('21:00'),
    CANDIDATE_POOL_SIZE: z.string().regex(/^\d+$/).transform(Number).default('8'),
  })
  .refine((data) => data.QUESTION_SET_SIZE > 0, {
    message: 'QUESTION_SET_SIZE must be positive',
    path: ['QUESTION_SET_SIZE'],
  })
  .refine(
    (data) => minutesOfDay(data.QUESTION_SET_OPEN_TIME_1) < minutesOfDay(data.QUESTION_SET_OPEN_TIME_2),
    {
      message: 'QUESTION_SET_OPEN_TIME_1 must be earlier than QUESTION_SET_OPEN_TIME_2',
      path: ['QUESTION_SET_OPEN_TIME_1'],
    }
  );

export function loadQuestionSetConfig(source: Record<string, string | undefined>): QuestionSetConfig {
  const parsed = questionSetConfigSchema.parse(source);
  return Object.freeze({
    size: parsed.QUESTION_SET_SIZE,
    friendRatio: parsed.QUESTION_SET_FRIEND_RATIO,
    openTime1: parsed.QUESTION_SET_OPEN_TIME_1,
    openTime2: parsed.QUESTION_SET_OPEN_TIME_2,
    candidatePoolSize: parsed.CANDIDATE_POOL_SIZE,
  });
}
