/**
 * 클라이언트 설정 타입 정의
 */

import type { Logger } from 'pino';

/** 클라이언트 연결 옵션 */
export interface ClientOptions {
  /** 서버 주소 (기본: TRIGGERWARE_HOST 또는 'localhost') */
  host?: string;
  /** 서버 포트 (기본: TRIGGERWARE_PORT 또는 5221) */
  port?: number;
  /** 결과 커서가 한 번에 가져오는 행 수 */
  fetchSize?: number;
  /** 서버에 전달하는 기본 타임아웃 (초) */
  timeout?: number;
  /** 클라이언트 측 요청 타임아웃 (ms, 미지정 시 무제한) */
  requestTimeout?: number;
  /** 완성되지 않은 메시지의 최대 버퍼 크기 (바이트, 기본: 16MiB) */
  maxFrameSize?: number;
  /** 로거 (미지정 시 pino 기본 로거) */
  logger?: Logger;
}

/** 기본값이 적용된 클라이언트 설정 */
export interface ResolvedClientConfig {
  host: string;
  port: number;
  fetchSize: number;
  timeout: number | null;
  requestTimeout: number | undefined;
  logger: Logger;
}
