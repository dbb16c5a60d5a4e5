/**
 * ITriggerwareClient - 클라이언트 공개 인터페이스
 *
 * TriggerwareClient가 외부에 노출하는 API 계약을 정의합니다.
 * 이벤트 맵과 public 메서드 시그니처를 포함합니다.
 */

import type { ConnectionState } from '../types/common.js';
import type {
  PolledQueryListener,
  Query,
  RelDataGroup,
  ResourceRestriction,
  Row,
  SubscriptionListener,
} from '../types/query.js';
import type { PolledQuery, PolledQueryOptions } from '../query/PolledQuery.js';
import type { PreparedQuery } from '../query/PreparedQuery.js';
import type { ResultSet } from '../query/ResultSet.js';
import type { View } from '../query/View.js';
import type { BatchSubscription } from '../subscription/BatchSubscription.js';
import type { Subscription, SubscriptionOptions } from '../subscription/Subscription.js';

// ─── 이벤트 맵 ────────────────────────────────────────────

/** 클라이언트 이벤트 맵 */
export interface TriggerwareClientEvents {
  /** 연결 상태 변경 */
  stateChange: [state: ConnectionState];
  /** 연결 종료 (재연결 없음) */
  close: [reason: Error];
  /** 개별 메시지의 프로토콜 위반 */
  protocolError: [error: Error, raw: string];
  /** 스트림 에러 (리스너가 있을 때만 발생) */
  error: [error: Error];
}

// ─── 공개 API ─────────────────────────────────────────────

export interface ITriggerwareClient {
  /** 배치당 기본 행 수 */
  readonly defaultFetchSize: number;
  /** 기본 서버 시간 제한 (초) */
  readonly defaultTimeout: number | null;
  /** 이 클라이언트에서 받은 서버 핸들 */
  readonly handles: readonly number[];
  /** 연결 상태 */
  readonly connectionState: ConnectionState;

  executeQuery<T = Row>(query: Query, restriction?: ResourceRestriction): Promise<ResultSet<T>>;
  validateQuery(query: Query): Promise<void>;
  createView<T = Row>(query: Query, restriction?: ResourceRestriction): Promise<View<T>>;
  prepareQuery<T = Row>(query: Query, restriction?: ResourceRestriction): Promise<PreparedQuery<T>>;
  createPolledQuery<T = Row>(
    query: Query,
    listener: PolledQueryListener<T>,
    options?: PolledQueryOptions,
  ): Promise<PolledQuery<T>>;
  createSubscription<T = Row>(
    query: Query,
    listener: SubscriptionListener<T>,
    options?: SubscriptionOptions,
  ): Promise<Subscription<T>>;
  createBatchSubscription(): BatchSubscription;
  getRelData(): Promise<RelDataGroup[]>;
  close(): void;
}
