/**
 * ResultSet - 서버 측 결과 커서
 *
 * 캐시된 행을 먼저 돌려주고, 캐시가 비면 next-resultset-batch로 다음 배치를 가져옵니다.
 * 앞으로만 읽을 수 있으며 다시 시작할 수 없습니다.
 */

import type { TriggerwareClient } from '../client/TriggerwareClient.js';
import { ServerError } from '../errors/RpcErrors.js';
import type { ExecutionResult, ResultBatch, Row, SignatureElement } from '../types/query.js';

/** ResultSet 생성 옵션 */
export interface ResultSetOptions {
  /** 배치당 행 수 (기본: 클라이언트 fetchSize) */
  rowLimit?: number;
  /** 배치 조회 시 서버 시간 제한 (초, 기본: 클라이언트 timeout) */
  timeout?: number | null;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export class ResultSet<T = Row> implements AsyncIterableIterator<T> {
  readonly client: TriggerwareClient;
  readonly handle: number | null;
  readonly signature: SignatureElement[];
  readonly rowLimit: number;
  readonly timeout: number | null;

  private cache: T[];
  private cacheIndex = 0;
  private serverExhausted: boolean;
  /** 진행 중인 next() 체인. 배치 조회가 겹치지 않도록 직렬화합니다. */
  private queue: Promise<unknown> = Promise.resolve();

  constructor(client: TriggerwareClient, result: ExecutionResult<T>, options: ResultSetOptions = {}) {
    this.client = client;
    this.handle = result.handle ?? null;
    this.signature = result.signature ?? [];
    this.rowLimit = options.rowLimit ?? client.defaultFetchSize;
    this.timeout = options.timeout === undefined ? client.defaultTimeout : options.timeout;
    this.cache = result.batch?.tuples ?? [];
    this.serverExhausted = this.handle === null || result.batch?.exhausted === true;
  }

  /**
   * 서버에 더 가져올 행이 없는지 여부.
   * 캐시에 남은 행은 여전히 읽을 수 있습니다.
   */
  get exhausted(): boolean {
    return this.serverExhausted;
  }

  /** 다음 배치 조회 없이 읽을 수 있는 행 수 */
  get cachedRows(): number {
    return this.cache.length - this.cacheIndex;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  /**
   * 다음 행을 반환합니다.
   * 동시에 호출되어도 순서대로 처리되며 배치 조회는 한 번에 하나만 진행됩니다.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const run = this.queue.then(() => this.advance());
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * 최대 n개의 행을 가져옵니다. 결과가 끝나면 더 적게 반환합니다.
   *
   * @param n - 가져올 최대 행 수
   */
  async pull(n: number): Promise<T[]> {
    const rows: T[] = [];
    while (rows.length < n) {
      const result = await this.next();
      if (result.done) break;
      rows.push(result.value);
    }
    return rows;
  }

  private async advance(): Promise<IteratorResult<T, undefined>> {
    if (this.cacheIndex >= this.cache.length) {
      if (this.serverExhausted) {
        return DONE;
      }

      const batch = await this.fetchBatch();
      this.cache = batch.tuples ?? [];
      this.cacheIndex = 0;
      this.serverExhausted = batch.exhausted === true || this.cache.length === 0;

      if (this.cache.length === 0) {
        return DONE;
      }
    }

    const value = this.cache[this.cacheIndex];
    this.cacheIndex++;
    return { done: false, value };
  }

  private async fetchBatch(): Promise<ResultBatch<T>> {
    const result = await this.client.connection.call<ExecutionResult<T> | null>(
      'next-resultset-batch',
      [this.handle, this.rowLimit, this.timeout],
    );
    if (!result?.batch) {
      throw new ServerError(`next-resultset-batch 응답에 batch가 없습니다 (handle ${this.handle})`);
    }
    return result.batch;
  }
}
