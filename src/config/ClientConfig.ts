/**
 * 클라이언트 설정 기본값 및 해석
 * 명시적 옵션 > 환경변수 > 기본값 순서로 적용합니다.
 */

import type { ClientOptions, ResolvedClientConfig } from '../types/config.js';
import { readEnvironment } from '../utils/env.js';
import { createLogger } from '../utils/logger.js';

/** 기본 서버 주소 */
export const DEFAULT_HOST = 'localhost';

/** 기본 서버 포트 */
export const DEFAULT_PORT = 5221;

/** 기본 네임스페이스 */
export const DEFAULT_NAMESPACE = 'AP5';

/** 결과 커서 기본 배치 크기 */
export const DEFAULT_FETCH_SIZE = 100;

/**
 * 옵션과 환경변수로부터 클라이언트 설정을 만듭니다.
 *
 * @param options - 명시적 옵션
 * @param env - 환경변수 (기본값: process.env)
 * @returns 기본값이 적용된 설정
 */
export function resolveClientConfig(
  options: ClientOptions = {},
  env: Record<string, string | undefined> = process.env,
): ResolvedClientConfig {
  const fromEnv = readEnvironment(env);

  return {
    host: options.host ?? fromEnv.host ?? DEFAULT_HOST,
    port: options.port ?? fromEnv.port ?? DEFAULT_PORT,
    fetchSize: options.fetchSize ?? fromEnv.fetchSize ?? DEFAULT_FETCH_SIZE,
    timeout: options.timeout ?? fromEnv.timeout ?? null,
    requestTimeout: options.requestTimeout ?? fromEnv.requestTimeout,
    logger: options.logger ?? createLogger({ level: fromEnv.logLevel }),
  };
}
