/**
 * AbstractQuery - 서버에 등록되는 쿼리의 공통 기반
 */

import type { TriggerwareClient } from '../client/TriggerwareClient.js';
import type { Query, QueryLanguage, ResourceRestriction } from '../types/query.js';

/** 쿼리 관련 요청에 공통으로 들어가는 파라미터 */
export interface QueryParameters extends Record<string, unknown> {
  query: string;
  language: QueryLanguage;
  namespace: string;
  limit?: number;
  timelimit?: number;
}

/**
 * 파라미터에 자원 제한을 덮어씁니다.
 *
 * @param params - 원본 파라미터 (변경하지 않음)
 * @param restriction - 적용할 제한
 * @returns 새 파라미터 객체
 */
export function applyRestriction<P extends Record<string, unknown>>(
  params: P,
  restriction?: ResourceRestriction,
): P & { limit?: number; timelimit?: number } {
  return {
    ...params,
    ...(restriction?.rowLimit === undefined ? {} : { limit: restriction.rowLimit }),
    ...(restriction?.timeout === undefined ? {} : { timelimit: restriction.timeout }),
  };
}

/**
 * 클라이언트 연결과 쿼리 설명을 함께 갖는 기반 클래스.
 */
export abstract class AbstractQuery implements Query {
  readonly client: TriggerwareClient;
  readonly query: string;
  readonly language: QueryLanguage;
  readonly namespace: string;
  readonly rowLimit?: number;
  readonly timeout?: number;

  protected readonly baseParameters: QueryParameters;

  constructor(client: TriggerwareClient, query: Query, restriction?: ResourceRestriction) {
    this.client = client;
    this.query = query.query;
    this.language = query.language;
    this.namespace = query.namespace;
    this.rowLimit = restriction?.rowLimit;
    this.timeout = restriction?.timeout;

    this.baseParameters = applyRestriction(
      { query: this.query, language: this.language, namespace: this.namespace },
      restriction,
    );
  }
}
