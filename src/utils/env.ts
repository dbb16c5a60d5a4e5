/**
 * 환경변수 파싱 유틸리티
 * TRIGGERWARE_* 환경변수를 검증된 설정 값으로 변환합니다.
 */

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** 빈 문자열은 미설정으로 취급 */
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional());
const positiveNumber = z.preprocess(blankAsUndefined, z.coerce.number().positive().optional());

const EnvironmentSchema = z.object({
  TRIGGERWARE_HOST: z.preprocess(blankAsUndefined, z.string().optional()),
  TRIGGERWARE_PORT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(1).max(65535).optional(),
  ),
  TRIGGERWARE_FETCH_SIZE: positiveInt,
  TRIGGERWARE_TIMEOUT: positiveNumber,
  TRIGGERWARE_REQUEST_TIMEOUT: positiveInt,
  TRIGGERWARE_LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS).optional()),
});

/** 환경변수에서 읽은 설정 (미설정 항목은 undefined) */
export interface EnvironmentConfig {
  host?: string;
  port?: number;
  fetchSize?: number;
  /** 서버에 전달하는 타임아웃 (초) */
  timeout?: number;
  /** 클라이언트 측 요청 타임아웃 (ms) */
  requestTimeout?: number;
  logLevel?: (typeof LOG_LEVELS)[number];
}

/**
 * 환경변수를 읽어 설정 값으로 변환합니다.
 *
 * @param env - 환경변수 (기본값: process.env)
 * @returns 파싱된 설정
 * @throws 값의 형식이 잘못된 경우
 */
export function readEnvironment(
  env: Record<string, string | undefined> = process.env,
): EnvironmentConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`잘못된 환경변수 ${issue.path.join('.')}: ${issue.message}`);
  }

  const data = parsed.data;
  return {
    host: data.TRIGGERWARE_HOST,
    port: data.TRIGGERWARE_PORT,
    fetchSize: data.TRIGGERWARE_FETCH_SIZE,
    timeout: data.TRIGGERWARE_TIMEOUT,
    requestTimeout: data.TRIGGERWARE_REQUEST_TIMEOUT,
    logLevel: data.TRIGGERWARE_LOG_LEVEL,
  };
}
