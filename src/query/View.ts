/**
 * View - 재사용 가능한 쿼리
 * 서버에 핸들을 만들지 않으며, 실행할 때마다 새 ResultSet을 얻습니다.
 */

import type { TriggerwareClient } from '../client/TriggerwareClient.js';
import { InvalidQueryError, rethrowAs } from '../errors/TriggerwareErrors.js';
import type { ExecutionResult, Query, ResourceRestriction, Row } from '../types/query.js';
import { AbstractQuery, applyRestriction } from './AbstractQuery.js';
import { ResultSet } from './ResultSet.js';

export class View<T = Row> extends AbstractQuery {
  /**
   * 서버에서 쿼리를 검증한 뒤 View를 만듭니다.
   *
   * @throws InvalidQueryError 쿼리에 오류가 있는 경우
   */
  static async create<T = Row>(
    client: TriggerwareClient,
    query: Query,
    restriction?: ResourceRestriction,
  ): Promise<View<T>> {
    const view = new View<T>(client, query, restriction);
    await client.validateQuery(view);
    return view;
  }

  /**
   * 쿼리를 실행합니다.
   *
   * @param restriction - 이번 실행에만 적용할 제한 (View의 제한을 덮어씀)
   */
  async execute(restriction?: ResourceRestriction): Promise<ResultSet<T>> {
    const params = applyRestriction(this.baseParameters, restriction);
    const result = await this.client.connection
      .call<ExecutionResult<T>>('execute-query', params)
      .catch((err: unknown) => rethrowAs(err, (message, options) => new InvalidQueryError(message, options)));
    return new ResultSet<T>(this.client, result);
  }
}
