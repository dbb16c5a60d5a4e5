/**
 * PolledQuery - 서버가 스케줄에 따라 다시 평가하는 쿼리
 *
 * 서버는 폴링마다 새 결과를 이전 상태와 비교해 변경분(delta)을 알림으로 보냅니다.
 * 이전 폴링이 끝나기 전에 다음 폴링이 시작되면 그 폴링은 건너뛰고 error 알림을 보냅니다.
 */

import { z } from 'zod';
import type { TriggerwareClient } from '../client/TriggerwareClient.js';
import { PolledQueryError, rethrowAs } from '../errors/TriggerwareErrors.js';
import type { JsonRpcError, JsonRpcMessageHandler, JsonRpcParams } from '../types/common.js';
import type {
  PolledQueryControlParameters,
  PolledQueryListener,
  Query,
  ResourceRestriction,
  Row,
  SignatureElement,
} from '../types/query.js';
import { AbstractQuery, type QueryParameters } from './AbstractQuery.js';
import { serializeSchedule, type PolledQuerySchedule, type SerializedSchedule } from './CalendarSchedule.js';

/** PolledQuery 생성 옵션 */
export interface PolledQueryOptions {
  restriction?: ResourceRestriction;
  controls?: PolledQueryControlParameters;
  schedule?: PolledQuerySchedule;
}

/** create-polled-query 요청 파라미터 */
export interface PolledQueryParameters extends QueryParameters {
  method: string;
  schedule?: SerializedSchedule;
  'report-initial'?: string;
  'report-unchanged'?: boolean;
  delay?: boolean;
}

interface CreatePolledQueryResult {
  handle?: number | null;
  signature?: SignatureElement[];
}

const ControlParametersSchema = z
  .object({
    reportUnchanged: z.boolean().optional(),
    reportInitial: z.enum(['none', 'with delta', 'without delta']).optional(),
    delay: z.boolean().optional(),
  })
  .strict();

const PollNotificationSchema = z.object({
  delta: z
    .object({
      added: z.array(z.unknown()).default([]),
      deleted: z.array(z.unknown()).default([]),
    })
    .optional(),
  error: z
    .object({
      code: z.number().int(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

export class PolledQuery<T = Row> extends AbstractQuery {
  readonly methodName: string;
  readonly schedule?: PolledQuerySchedule;
  readonly controls?: PolledQueryControlParameters;

  private readonly listener: PolledQueryListener<T>;
  private readonly parameters: PolledQueryParameters;
  private serverHandle: number | null = null;
  private resultSignature: SignatureElement[] = [];

  private constructor(
    client: TriggerwareClient,
    query: Query,
    listener: PolledQueryListener<T>,
    options: PolledQueryOptions,
  ) {
    super(client, query, options.restriction);
    this.methodName = client.allocateMethodName('poll');
    this.listener = listener;
    this.schedule = options.schedule;
    this.controls = options.controls;

    const parameters: PolledQueryParameters = { ...this.baseParameters, method: this.methodName };
    if (options.schedule !== undefined) {
      parameters.schedule = serializeSchedule(options.schedule);
    }
    if (options.controls) {
      const parsed = ControlParametersSchema.safeParse(options.controls);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new PolledQueryError(
          `잘못된 폴링 제어 파라미터 (${issue?.path.join('.') ?? '?'}): ${issue?.message ?? 'unknown'}`,
        );
      }
      parameters['report-initial'] = parsed.data.reportInitial ?? 'none';
      parameters['report-unchanged'] = parsed.data.reportUnchanged ?? false;
      parameters.delay = parsed.data.delay ?? false;
    }
    this.parameters = parameters;
  }

  /**
   * 서버에 폴링 쿼리를 등록합니다.
   * 초기 보고가 응답 직후에 도착할 수 있으므로 알림 핸들러를 먼저 등록합니다.
   *
   * @throws PolledQueryError 스케줄/제어 파라미터가 잘못되었거나 서버가 거부한 경우
   */
  static async create<T = Row>(
    client: TriggerwareClient,
    query: Query,
    listener: PolledQueryListener<T>,
    options: PolledQueryOptions = {},
  ): Promise<PolledQuery<T>> {
    const polled = new PolledQuery<T>(client, query, listener, options);
    const connection = client.connection;

    connection.addMethod(polled.methodName, polled.createHandler());
    const registration = await connection
      .call<CreatePolledQueryResult | null>('create-polled-query', polled.parameters)
      .catch((err: unknown) => {
        connection.removeMethod(polled.methodName);
        return rethrowAs(err, (message, opts) => new PolledQueryError(message, opts));
      });

    polled.serverHandle = registration?.handle ?? null;
    polled.resultSignature = registration?.signature ?? [];
    if (polled.serverHandle !== null) {
      client.registerHandle(polled.serverHandle);
    }
    return polled;
  }

  /** 서버 핸들 */
  get handle(): number | null {
    return this.serverHandle;
  }

  /** 결과 시그니처 */
  get signature(): SignatureElement[] {
    return this.resultSignature;
  }

  /** create-polled-query로 보낸 파라미터 */
  get registrationParameters(): Readonly<PolledQueryParameters> {
    return this.parameters;
  }

  /**
   * 스케줄과 무관하게 즉시 폴링합니다.
   * 결과는 알림으로 전달됩니다.
   */
  async pollNow(): Promise<void> {
    if (this.serverHandle === null) {
      throw new PolledQueryError('서버 핸들이 없는 폴링 쿼리입니다');
    }
    const params: Record<string, unknown> = { handle: this.serverHandle };
    if (this.timeout !== undefined) {
      params.timelimit = this.timeout;
    }
    await this.client.connection
      .call('poll-now', params)
      .catch((err: unknown) => rethrowAs(err, (message, options) => new PolledQueryError(message, options)));
  }

  private createHandler(): JsonRpcMessageHandler {
    return {
      execute: (params) => {
        this.deliver(params);
        return null;
      },
      notify: (params) => {
        this.deliver(params);
      },
    };
  }

  private deliver(params: JsonRpcParams | undefined): void {
    const parsed = PollNotificationSchema.safeParse(params);
    if (!parsed.success) {
      this.client.logger.warn({ method: this.methodName, params }, '알 수 없는 폴링 알림 형식입니다');
      return;
    }

    const { delta, error } = parsed.data;
    if (error) {
      this.reportError(error);
      return;
    }
    if (delta) {
      // 행의 모양은 쿼리 시그니처가 결정하므로 여기서는 검사하지 않음
      this.listener.handleNotification(delta.added as T[], delta.deleted as T[]);
    }
  }

  private reportError(error: JsonRpcError): void {
    this.client.logger.warn(
      { method: this.methodName, handle: this.serverHandle, error },
      '폴링 실패 알림',
    );
    this.listener.handleError?.(error);
  }
}
