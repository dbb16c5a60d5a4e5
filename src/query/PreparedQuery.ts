/**
 * PreparedQuery - 입력 파라미터가 있는 서버 등록 쿼리
 */

import type { TriggerwareClient } from '../client/TriggerwareClient.js';
import { PreparedQueryError, rethrowAs } from '../errors/TriggerwareErrors.js';
import type {
  ExecutionResult,
  Query,
  ResourceRestriction,
  Row,
  SignatureElement,
} from '../types/query.js';
import { AbstractQuery, applyRestriction } from './AbstractQuery.js';
import { ResultSet } from './ResultSet.js';

/** prepare-query 응답 */
export interface PrepareQueryResult {
  handle: number | null;
  inputSignature: SignatureElement[];
  usesNamedParameters: boolean;
}

/** SQL 입력 타입별 값 검사 */
const TYPE_CHECKS: Record<string, (value: unknown) => boolean> = {
  double: (value) => typeof value === 'number',
  integer: (value) => typeof value === 'number' && Number.isInteger(value),
  number: (value) => typeof value === 'number',
  boolean: (value) => typeof value === 'boolean',
  stringcase: (value) => typeof value === 'string',
  stringnocase: (value) => typeof value === 'string',
  stringagnostic: (value) => typeof value === 'string',
  date: (value) => typeof value === 'string',
  time: (value) => typeof value === 'string',
  timestamp: (value) => typeof value === 'string',
  interval: (value) => typeof value === 'string',
};

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export class PreparedQuery<T = Row> extends AbstractQuery {
  readonly handle: number | null;
  readonly inputSignature: SignatureElement[];
  readonly usesNamedParameters: boolean;

  private readonly inputs: unknown[];

  private constructor(
    client: TriggerwareClient,
    query: Query,
    restriction: ResourceRestriction | undefined,
    registration: PrepareQueryResult,
  ) {
    super(client, query, restriction);
    this.handle = registration.handle ?? null;
    this.inputSignature = registration.inputSignature;
    this.usesNamedParameters = registration.usesNamedParameters;
    this.inputs = new Array<unknown>(registration.inputSignature.length).fill(null);
  }

  /**
   * 서버에 쿼리를 준비시키고 입력 시그니처를 받아옵니다.
   *
   * @throws PreparedQueryError 서버가 쿼리를 거부한 경우
   */
  static async create<T = Row>(
    client: TriggerwareClient,
    query: Query,
    restriction?: ResourceRestriction,
  ): Promise<PreparedQuery<T>> {
    const params = applyRestriction(
      { query: query.query, language: query.language, namespace: query.namespace },
      restriction,
    );
    const registration = await client.connection
      .call<PrepareQueryResult>('prepare-query', params)
      .catch((err: unknown) => rethrowAs(err, (message, options) => new PreparedQueryError(message, options)));

    const prepared = new PreparedQuery<T>(client, query, restriction, registration);
    if (prepared.handle !== null) {
      client.registerHandle(prepared.handle);
    }
    return prepared;
  }

  /** 입력 파라미터 이름 (시그니처 순서) */
  get parameterNames(): string[] {
    return this.inputSignature.map((element) => element.attribute);
  }

  /**
   * 파라미터 값을 설정합니다.
   * SQL 쿼리는 시그니처의 타입과 값의 타입이 맞아야 합니다.
   *
   * @param position - 이름(named 파라미터) 또는 0부터 시작하는 위치
   * @param value - 바인딩할 값
   */
  setParameter(position: string | number, value: unknown): void {
    const index = this.resolveIndex(position);
    const expected = this.inputSignature[index].type;

    if (this.language === 'sql') {
      const check = TYPE_CHECKS[expected];
      if (check && !check(value)) {
        throw new PreparedQueryError(`${expected} 타입이 필요하지만 ${describeValue(value)} 값을 받았습니다`);
      }
    }
    this.inputs[index] = value;
  }

  /**
   * 파라미터 값을 반환합니다. 설정되지 않은 파라미터는 null입니다.
   */
  getParameter(position: string | number): unknown {
    return this.inputs[this.resolveIndex(position)];
  }

  /**
   * 같은 쿼리를 서버에 새로 준비시키고 현재 파라미터 값을 복사합니다.
   */
  async clone(): Promise<PreparedQuery<T>> {
    const copy = await PreparedQuery.create<T>(this.client, this, {
      rowLimit: this.rowLimit,
      timeout: this.timeout,
    });
    this.inputs.forEach((value, index) => {
      copy.inputs[index] = value;
    });
    return copy;
  }

  /**
   * 현재 파라미터 값으로 쿼리를 실행합니다.
   *
   * @param restriction - 이번 실행에 적용할 제한
   */
  async execute(restriction?: ResourceRestriction): Promise<ResultSet<T>> {
    const params = applyRestriction({ handle: this.handle, inputs: [...this.inputs] }, restriction);
    const result = await this.client.connection
      .call<ExecutionResult<T>>('create-resultset', params)
      .catch((err: unknown) => rethrowAs(err, (message, options) => new PreparedQueryError(message, options)));
    return new ResultSet<T>(this.client, result);
  }

  private resolveIndex(position: string | number): number {
    if (typeof position === 'string' && !this.usesNamedParameters) {
      throw new PreparedQueryError('위치 기반 파라미터를 사용하는 쿼리입니다');
    }
    if (typeof position === 'number' && this.usesNamedParameters) {
      throw new PreparedQueryError('이름 기반 파라미터를 사용하는 쿼리입니다');
    }

    const index =
      typeof position === 'string' ? this.parameterNames.indexOf(position) : position;
    if (!Number.isInteger(index) || index < 0 || index >= this.inputSignature.length) {
      throw new PreparedQueryError(`잘못된 파라미터 이름 또는 위치: ${position}`);
    }
    return index;
  }
}
