/**
 * Subscription - 서버 데이터 변경 구독
 *
 * 상태 전이는 inactive ↔ active, inactive ↔ batched만 허용됩니다.
 * 전이는 서버 호출 전에 반영하고 실패하면 되돌립니다.
 * 서버 응답을 기다리는 전이가 있는 동안 다른 전이는 모두 거부됩니다.
 */

import type { TriggerwareClient } from '../client/TriggerwareClient.js';
import { SubscriptionError, rethrowAs } from '../errors/TriggerwareErrors.js';
import type { JsonRpcParams } from '../types/common.js';
import type { Query, Row, SubscriptionListener } from '../types/query.js';
import { AbstractQuery } from '../query/AbstractQuery.js';
import { BatchSubscription, type BatchMember } from './BatchSubscription.js';

/** 구독 상태 */
export type SubscriptionState = 'inactive' | 'active' | 'batched';

/** Subscription.create 옵션 */
export interface SubscriptionOptions {
  /** 클라이언트로 생성할 때 즉시 활성화할지 여부 (기본: true) */
  active?: boolean;
}

function hasTuple(params: JsonRpcParams | undefined): params is { tuple: unknown } {
  return typeof params === 'object' && params !== null && !Array.isArray(params) && 'tuple' in params;
}

export class Subscription<T = Row> extends AbstractQuery implements BatchMember {
  readonly label: string;

  private readonly listener: SubscriptionListener<T>;
  private currentState: SubscriptionState = 'inactive';
  private currentBatch: BatchSubscription | null = null;
  /** subscribe/unsubscribe 응답을 기다리는 중 */
  private transitioning = false;

  constructor(client: TriggerwareClient, query: Query, listener: SubscriptionListener<T>) {
    super(client, query);
    this.label = client.allocateMethodName('sub');
    this.baseParameters.label = this.label;
    this.listener = listener;
  }

  /**
   * 구독을 만들고, 클라이언트가 주어지면 활성화하거나 배치가 주어지면 배치에 추가합니다.
   */
  static async create<T = Row>(
    clientOrBatch: TriggerwareClient | BatchSubscription,
    query: Query,
    listener: SubscriptionListener<T>,
    options: SubscriptionOptions = {},
  ): Promise<Subscription<T>> {
    if (clientOrBatch instanceof BatchSubscription) {
      const subscription = new Subscription<T>(clientOrBatch.client, query, listener);
      await subscription.addToBatch(clientOrBatch);
      return subscription;
    }

    const subscription = new Subscription<T>(clientOrBatch, query, listener);
    if (options.active ?? true) {
      await subscription.activate();
    }
    return subscription;
  }

  get state(): SubscriptionState {
    return this.currentState;
  }

  get active(): boolean {
    return this.currentState === 'active';
  }

  /** 속한 배치 (없으면 null) */
  get batch(): BatchSubscription | null {
    return this.currentBatch;
  }

  /**
   * 라벨을 메서드 이름으로 등록하고 서버에 구독을 요청합니다.
   */
  async activate(): Promise<void> {
    this.expectState('inactive', '활성화');
    this.transitioning = true;
    this.currentState = 'active';

    const connection = this.client.connection;
    connection.addMethod(this.label, {
      execute: (params) => {
        this.deliver(params);
        return null;
      },
      notify: (params) => {
        this.deliver(params);
      },
    });

    try {
      await this.send('subscribe', this.label, false);
    } catch (err) {
      connection.removeMethod(this.label);
      this.currentState = 'inactive';
      throw err;
    } finally {
      this.transitioning = false;
    }
  }

  /**
   * 서버에 구독 해제를 요청하고 메서드 등록을 제거합니다.
   */
  async deactivate(): Promise<void> {
    this.expectState('active', '비활성화');
    this.transitioning = true;
    this.currentState = 'inactive';

    try {
      await this.send('unsubscribe', this.label, false);
    } catch (err) {
      this.currentState = 'active';
      throw err;
    } finally {
      this.transitioning = false;
    }
    this.client.connection.removeMethod(this.label);
  }

  /**
   * 배치에 가입합니다. 배치의 메서드로 결합(combine) 구독을 요청합니다.
   */
  async addToBatch(batch: BatchSubscription): Promise<void> {
    this.expectState('inactive', '배치에 추가');
    if (batch.client !== this.client) {
      throw new SubscriptionError('구독과 배치가 서로 다른 클라이언트에 속해 있습니다');
    }

    batch.attach(this);
    this.transitioning = true;
    this.currentState = 'batched';
    this.currentBatch = batch;

    try {
      await this.send('subscribe', batch.methodName, true);
    } catch (err) {
      batch.detach(this.label);
      this.currentState = 'inactive';
      this.currentBatch = null;
      throw err;
    } finally {
      this.transitioning = false;
    }
  }

  /**
   * 속한 배치에서 탈퇴합니다.
   */
  async removeFromBatch(): Promise<void> {
    const batch = this.currentBatch;
    if (this.currentState !== 'batched' || !batch) {
      throw new SubscriptionError(`배치에 속하지 않은 구독입니다: ${this.label}`);
    }
    this.expectIdle('배치에서 제거');

    batch.detach(this.label);
    this.transitioning = true;
    this.currentState = 'inactive';
    this.currentBatch = null;

    try {
      await this.send('unsubscribe', batch.methodName, true);
    } catch (err) {
      batch.attach(this);
      this.currentState = 'batched';
      this.currentBatch = batch;
      throw err;
    } finally {
      this.transitioning = false;
    }
  }

  /** @internal 배치 알림의 행을 하나씩 전달합니다. */
  deliverBatch(rows: unknown[]): void {
    for (const row of rows) {
      // 행의 모양은 쿼리 시그니처가 결정하므로 여기서는 검사하지 않음
      this.listener.handleNotification(row as T);
    }
  }

  private deliver(params: JsonRpcParams | undefined): void {
    if (!hasTuple(params)) {
      this.client.logger.warn({ label: this.label, params }, 'tuple이 없는 구독 알림입니다');
      return;
    }
    this.listener.handleNotification(params.tuple as T);
  }

  private async send(
    method: 'subscribe' | 'unsubscribe',
    target: string,
    combine: boolean,
  ): Promise<void> {
    await this.client.connection
      .call(method, { ...this.baseParameters, method: target, combine })
      .catch((err: unknown) => rethrowAs(err, (message, options) => new SubscriptionError(message, options)));
  }

  private expectState(expected: SubscriptionState, action: string): void {
    if (this.currentState === expected) {
      this.expectIdle(action);
      return;
    }

    const reason: Record<SubscriptionState, string> = {
      active: '이미 활성화된 구독',
      inactive: '비활성 상태의 구독',
      batched: '배치에 속한 구독',
    };
    throw new SubscriptionError(`${reason[this.currentState]}은 ${action}할 수 없습니다: ${this.label}`);
  }

  private expectIdle(action: string): void {
    if (this.transitioning) {
      throw new SubscriptionError(`상태 전이가 진행 중인 구독은 ${action}할 수 없습니다: ${this.label}`);
    }
  }
}
