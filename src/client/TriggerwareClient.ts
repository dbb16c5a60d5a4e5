/**
 * TriggerwareClient - Triggerware 서버 클라이언트
 * 하나의 연결 위에서 쿼리 실행, 폴링 쿼리, 구독을 관리하는 최상위 클래스
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { z } from 'zod';
import { DEFAULT_FETCH_SIZE, resolveClientConfig } from '../config/ClientConfig.js';
import type { BaseConnection } from '../connection/BaseConnection.js';
import { SocketConnection } from '../connection/SocketConnection.js';
import { ServerError } from '../errors/RpcErrors.js';
import { InvalidQueryError, rethrowAs } from '../errors/TriggerwareErrors.js';
import { PolledQuery, type PolledQueryOptions } from '../query/PolledQuery.js';
import { PreparedQuery } from '../query/PreparedQuery.js';
import type { ResultSet } from '../query/ResultSet.js';
import { View } from '../query/View.js';
import { BatchSubscription } from '../subscription/BatchSubscription.js';
import { Subscription, type SubscriptionOptions } from '../subscription/Subscription.js';
import type { ConnectionState } from '../types/common.js';
import type { ClientOptions } from '../types/config.js';
import type {
  PolledQueryListener,
  Query,
  RelDataGroup,
  ResourceRestriction,
  Row,
  SubscriptionListener,
} from '../types/query.js';
import { MethodNameAllocator } from '../utils/naming.js';
import type { ITriggerwareClient } from './ITriggerwareClient.js';

/** 이미 열린 연결로 클라이언트를 만들 때의 옵션 */
export type TriggerwareClientOptions = Pick<ClientOptions, 'fetchSize' | 'timeout' | 'logger'>;

const RelDataElementSchema = z
  .tuple([
    z.string(),
    z.array(z.string()),
    z.array(z.string()),
    z.string().catch(''),
    z.unknown(),
    z.string().catch(''),
  ])
  .rest(z.unknown());

const RelDataGroupSchema = z.tuple([z.string(), z.string()]).rest(RelDataElementSchema);

/**
 * Triggerware 클라이언트.
 * 연결이 끊기면 클라이언트도 더 이상 사용할 수 없습니다 (재연결 없음).
 */
export class TriggerwareClient extends EventEmitter implements ITriggerwareClient {
  readonly connection: BaseConnection;
  readonly logger: Logger;
  readonly defaultFetchSize: number;
  readonly defaultTimeout: number | null;

  private readonly names = new MethodNameAllocator();
  private readonly registeredHandles: number[] = [];

  constructor(connection: BaseConnection, options: TriggerwareClientOptions = {}) {
    super();
    this.connection = connection;
    this.logger = options.logger ?? connection.logger;
    this.defaultFetchSize = options.fetchSize ?? DEFAULT_FETCH_SIZE;
    this.defaultTimeout = options.timeout ?? null;
    this.setupEventForwarding();
  }

  /**
   * TCP로 서버에 연결합니다.
   * 옵션 > 환경변수(TRIGGERWARE_*) > 기본값 순서로 설정을 정합니다.
   *
   * @param options - 연결 옵션
   * @returns 연결된 클라이언트
   */
  static async connect(options: ClientOptions = {}): Promise<TriggerwareClient> {
    const config = resolveClientConfig(options);
    const connection = new SocketConnection({
      host: config.host,
      port: config.port,
      requestTimeout: config.requestTimeout,
      maxFrameSize: options.maxFrameSize,
      logger: config.logger,
    });
    await connection.connect();

    return new TriggerwareClient(connection, {
      fetchSize: config.fetchSize,
      timeout: config.timeout ?? undefined,
      logger: config.logger,
    });
  }

  /** 연결 상태 */
  get connectionState(): ConnectionState {
    return this.connection.connectionState;
  }

  /** 이 클라이언트에서 받은 서버 핸들 */
  get handles(): readonly number[] {
    return this.registeredHandles;
  }

  /**
   * 쿼리를 실행합니다. View를 만들어 한 번 실행한 것과 같지만 사전 검증은 하지 않습니다.
   *
   * @throws InvalidQueryError 서버가 쿼리를 거부한 경우
   */
  executeQuery<T = Row>(query: Query, restriction?: ResourceRestriction): Promise<ResultSet<T>> {
    return new View<T>(this, query, restriction).execute();
  }

  /**
   * 서버에서 쿼리를 검증합니다.
   *
   * @throws InvalidQueryError 쿼리에 오류가 있는 경우
   */
  async validateQuery(query: Query): Promise<void> {
    await this.connection
      .call('validate', [query.query, query.language, query.namespace])
      .catch((err: unknown) => rethrowAs(err, (message, options) => new InvalidQueryError(message, options)));
  }

  /** 검증된 재사용 가능한 View를 만듭니다. */
  createView<T = Row>(query: Query, restriction?: ResourceRestriction): Promise<View<T>> {
    return View.create<T>(this, query, restriction);
  }

  /** 서버에 쿼리를 준비시킵니다. */
  prepareQuery<T = Row>(query: Query, restriction?: ResourceRestriction): Promise<PreparedQuery<T>> {
    return PreparedQuery.create<T>(this, query, restriction);
  }

  /** 폴링 쿼리를 등록합니다. */
  createPolledQuery<T = Row>(
    query: Query,
    listener: PolledQueryListener<T>,
    options?: PolledQueryOptions,
  ): Promise<PolledQuery<T>> {
    return PolledQuery.create<T>(this, query, listener, options);
  }

  /** 구독을 만듭니다 (기본: 즉시 활성화). */
  createSubscription<T = Row>(
    query: Query,
    listener: SubscriptionListener<T>,
    options?: SubscriptionOptions,
  ): Promise<Subscription<T>> {
    return Subscription.create<T>(this, query, listener, options);
  }

  /** 빈 배치 구독을 만듭니다. */
  createBatchSubscription(): BatchSubscription {
    return new BatchSubscription(this);
  }

  /**
   * 서버가 지원하는 관계(커넥터) 목록을 용도별 그룹으로 가져옵니다.
   */
  async getRelData(): Promise<RelDataGroup[]> {
    const raw = await this.connection.call('reldata2017', []);
    if (!Array.isArray(raw)) {
      return [];
    }

    const parsed = z.array(RelDataGroupSchema).safeParse(raw);
    if (!parsed.success) {
      throw new ServerError(`reldata2017 응답 형식이 올바르지 않습니다: ${parsed.error.issues[0]?.message}`);
    }

    return parsed.data.map(([name, symbol, ...elements]) => ({
      name,
      symbol,
      elements: elements.map(([elementName, signatureNames, signatureTypes, usage, annotations, description]) => ({
        name: elementName,
        signatureNames,
        signatureTypes,
        usage,
        annotations,
        description,
      })),
    }));
  }

  /**
   * 서버 → 클라이언트 메서드 이름을 발급합니다 (예: poll0, sub3, batch1).
   * @internal
   */
  allocateMethodName(prefix: string): string {
    return this.names.next(prefix);
  }

  /**
   * 서버 핸들을 기록합니다.
   * @internal
   */
  registerHandle(handle: number): void {
    this.registeredHandles.push(handle);
  }

  /**
   * 연결을 닫습니다. 대기 중인 요청은 모두 실패합니다.
   */
  close(): void {
    this.connection.close();
  }

  /**
   * 연결 이벤트를 클라이언트로 전파합니다.
   */
  private setupEventForwarding(): void {
    this.connection.on('stateChange', (state: ConnectionState) => {
      this.emit('stateChange', state);
    });
    this.connection.on('close', (reason: Error) => {
      this.emit('close', reason);
    });
    this.connection.on('protocolError', (error: Error, raw: string) => {
      this.emit('protocolError', error, raw);
    });
    this.connection.on('error', (err: Error) => {
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      }
    });
  }
}
