/**
 * BatchSubscription - 하나의 서버 메서드로 묶인 구독 그룹
 *
 * 서버의 한 트랜잭션이 여러 구독에 동시에 해당할 수 있으므로,
 * 배치 알림은 라벨별로 일치한 행 목록을 담아 한 번에 도착합니다.
 */

import { z } from 'zod';
import type { TriggerwareClient } from '../client/TriggerwareClient.js';
import { SubscriptionError } from '../errors/TriggerwareErrors.js';
import type { JsonRpcParams } from '../types/common.js';
import type { Subscription } from './Subscription.js';

/** 배치에 속한 구독이 배치 알림을 받는 창구 */
export interface BatchMember {
  readonly label: string;
  deliverBatch(rows: unknown[]): void;
}

const BatchNotificationSchema = z.object({
  matches: z.array(
    z.object({
      label: z.string(),
      tuples: z.array(z.unknown()).default([]),
    }),
  ),
});

export class BatchSubscription {
  readonly client: TriggerwareClient;
  readonly methodName: string;

  private readonly members = new Map<string, BatchMember>();

  constructor(client: TriggerwareClient) {
    this.client = client;
    this.methodName = client.allocateMethodName('batch');
    client.connection.addMethod(this.methodName, {
      execute: (params) => {
        this.deliver(params);
        return null;
      },
      notify: (params) => {
        this.deliver(params);
      },
    });
  }

  /** 현재 배치에 속한 구독 라벨 */
  get labels(): string[] {
    return [...this.members.keys()];
  }

  /** 배치에 속한 구독 수 */
  get size(): number {
    return this.members.size;
  }

  /** 라벨로 멤버십을 확인합니다. */
  has(label: string): boolean {
    return this.members.has(label);
  }

  /**
   * 구독을 배치에 추가합니다. subscription.addToBatch(this)와 같습니다.
   */
  async addSubscription<T>(subscription: Subscription<T>): Promise<void> {
    await subscription.addToBatch(this);
  }

  /**
   * 구독을 배치에서 제거합니다.
   *
   * @throws SubscriptionError 이 배치에 속하지 않은 구독
   */
  async removeSubscription<T>(subscription: Subscription<T>): Promise<void> {
    if (!this.members.has(subscription.label)) {
      throw new SubscriptionError(`이 배치에 속하지 않은 구독입니다: ${subscription.label}`);
    }
    await subscription.removeFromBatch();
  }

  /** @internal */
  attach(member: BatchMember): void {
    if (this.members.has(member.label)) {
      throw new SubscriptionError(`이미 배치에 속한 구독입니다: ${member.label}`);
    }
    this.members.set(member.label, member);
  }

  /** @internal */
  detach(label: string): void {
    this.members.delete(label);
  }

  private deliver(params: JsonRpcParams | undefined): void {
    const parsed = BatchNotificationSchema.safeParse(params);
    if (!parsed.success) {
      this.client.logger.warn({ method: this.methodName, params }, '알 수 없는 배치 알림 형식입니다');
      return;
    }

    for (const match of parsed.data.matches) {
      const member = this.members.get(match.label);
      if (!member) {
        this.client.logger.debug({ label: match.label }, '배치에 없는 라벨의 알림을 무시합니다');
        continue;
      }
      member.deliverBatch(match.tuples);
    }
  }
}
