/**
 * 도메인 에러
 * 특정 작업에서 발생한 RPC 에러를 작업 맥락과 함께 다시 감쌉니다.
 */

import { InternalError, RpcError, ServerError } from './RpcErrors.js';

/** 모든 도메인 에러의 기반 클래스 */
export class TriggerwareError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TriggerwareError';
  }
}

/** 쿼리 문법/의미 오류 */
export class InvalidQueryError extends TriggerwareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidQueryError';
  }
}

/** 준비된 쿼리의 파라미터 이름/위치/타입 오류 */
export class PreparedQueryError extends TriggerwareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PreparedQueryError';
  }
}

/** 폴링 쿼리 스케줄 또는 제어 파라미터 오류 */
export class PolledQueryError extends TriggerwareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PolledQueryError';
  }
}

/** 구독 상태 전이 오류 */
export class SubscriptionError extends TriggerwareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SubscriptionError';
  }
}

/**
 * 작업 중 발생한 에러를 도메인 에러로 변환해 던집니다.
 *
 * - ServerError(연결 끊김 포함), InternalError: 작업과 무관하므로 그대로 던짐
 * - 그 외 RpcError: factory로 감싸서 던짐 (원본은 cause)
 * - RPC 에러가 아닌 경우: 그대로 던짐
 */
export function rethrowAs(
  error: unknown,
  factory: (message: string, options: { cause: unknown }) => TriggerwareError,
): never {
  if (error instanceof ServerError || error instanceof InternalError) {
    throw error;
  }
  if (error instanceof RpcError) {
    throw factory(error.message, { cause: error });
  }
  throw error;
}
