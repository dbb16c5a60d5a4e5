/**
 * pino 로거 생성
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

/** 로거 생성 옵션 */
export interface LoggerOptions {
  /** 로그 레벨 (기본: 'warn') */
  level?: LevelWithSilent;
  /** 로거 이름 */
  name?: string;
}

/**
 * 클라이언트 기본 로거를 생성합니다.
 *
 * @param options - 로거 옵션
 * @returns pino 로거
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'triggerware-client',
    level: options.level ?? 'warn',
  });
}
