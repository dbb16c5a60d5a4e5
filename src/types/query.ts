/**
 * 쿼리, 결과, 폴링/구독 관련 타입 정의
 */

import type { JsonRpcError } from './common.js';

/** 쿼리 언어 */
export type QueryLanguage = 'fol' | 'sql';

/** 쿼리 설명 (텍스트, 언어, 네임스페이스) */
export interface Query {
  readonly query: string;
  readonly language: QueryLanguage;
  readonly namespace: string;
}

/** 자원 제한 (행 수, 시간) */
export interface ResourceRestriction {
  /** 최대 행 수 */
  rowLimit?: number;
  /** 서버 측 시간 제한 (초) */
  timeout?: number;
}

/** 결과 행 (쿼리 시그니처 순서의 값 튜플) */
export type Row = unknown[];

/** 시그니처 항목 */
export interface SignatureElement {
  attribute: string;
  type: string;
}

/** 결과 배치 */
export interface ResultBatch<T = Row> {
  tuples?: T[];
  exhausted?: boolean;
}

/** execute-query / create-resultset 결과 */
export interface ExecutionResult<T = Row> {
  handle?: number | null;
  signature?: SignatureElement[];
  batch?: ResultBatch<T>;
}

/** 초기 상태 보고 방식 */
export type ReportInitial = 'none' | 'with delta' | 'without delta';

/** 폴링 쿼리 제어 파라미터 */
export interface PolledQueryControlParameters {
  /** 변경이 없는 폴링도 보고 (기본: false) */
  reportUnchanged?: boolean;
  /** 초기 상태 보고 방식 (기본: 'none') */
  reportInitial?: ReportInitial;
  /** 첫 평가를 스케줄까지 지연 (기본: false) */
  delay?: boolean;
}

/**
 * 폴링 쿼리 알림 핸들러.
 * 스케줄 또는 pollNow()에 의해 변경분이 보고될 때 호출됩니다.
 */
export interface PolledQueryListener<T = Row> {
  handleNotification(added: T[], deleted: T[]): void;
  /**
   * 폴링 실패 알림 (타임아웃, 데이터 소스 오류, 이전 폴링과 겹쳐 건너뛴 경우 등).
   * 치명적이지 않으며 이후 폴링은 계속됩니다.
   */
  handleError?(error: JsonRpcError): void;
}

/** 구독 알림 핸들러 (행 하나당 한 번 호출) */
export interface SubscriptionListener<T = Row> {
  handleNotification(row: T): void;
}

/** 관계 메타데이터 항목 */
export interface RelDataElement {
  name: string;
  signatureNames: string[];
  signatureTypes: string[];
  usage: string;
  annotations: unknown;
  description: string;
}

/** 관계 메타데이터 그룹 */
export interface RelDataGroup {
  name: string;
  symbol: string;
  elements: RelDataElement[];
}
