/**
 * BaseConnection - 추상 기반 연결 클래스
 * 하나의 영속 스트림 위에서 양방향 JSON-RPC 2.0 통신을 처리합니다.
 *
 * 수신 루프는 스트림의 'data' 리스너 하나뿐이며, 서버 요청과 알림은
 * 도착 순서대로 이 리스너 안에서 디스패치됩니다. 핸들러가 새 call()을
 * 시작해도 수신 루프는 막히지 않으므로 그 응답은 이후의 'data'에서 라우팅됩니다.
 */

import { EventEmitter } from 'events';
import type { Duplex } from 'stream';
import type { Logger } from 'pino';
import type {
  ConnectionState,
  JsonRpcError,
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcMessageHandler,
  JsonRpcNotification,
  JsonRpcParams,
  JsonRpcRequest,
  JsonRpcResponse,
  PendingRequest,
} from '../types/common.js';
import {
  ConnectionClosedError,
  InvalidRequestError,
  JsonRpcErrorCode,
  MethodNotFoundError,
  RequestTimeoutError,
  RpcError,
  ServerError,
} from '../errors/RpcErrors.js';
import { createLogger } from '../utils/logger.js';
import { FrameParser } from './FrameParser.js';
import { classifyMessage, type JsonRpcEnvelope } from './schema.js';

/** BaseConnection 생성 옵션 */
export interface BaseConnectionOptions {
  /** 클라이언트 측 요청 타임아웃 (ms, 미지정 시 응답 또는 연결 종료까지 대기) */
  requestTimeout?: number;
  /** 완성되지 않은 메시지를 버퍼에 쌓을 수 있는 최대 바이트 수 (기본: 16MiB) */
  maxFrameSize?: number;
  /** 로거 */
  logger?: Logger;
}

/** 수신 버퍼 기본 한도 */
export const DEFAULT_MAX_FRAME_SIZE = 16 * 1024 * 1024;

/** call() 옵션 */
export interface CallOptions {
  /** 이 요청에만 적용할 타임아웃 (ms) */
  timeout?: number;
}

/** 핸들러에서 던진 값을 와이어용 error 객체로 변환 */
function toJsonRpcError(err: unknown): JsonRpcError {
  if (err instanceof RpcError) {
    return err.toJsonRpcError();
  }
  return {
    code: JsonRpcErrorCode.InternalError,
    message: err instanceof Error ? err.message : String(err),
  };
}

/**
 * 추상 기반 연결 클래스.
 * 하위 클래스는 openStream()으로 스트림을 여는 방법만 정의합니다.
 */
export abstract class BaseConnection extends EventEmitter {
  protected stream: Duplex | null = null;
  protected nextId = 0;
  protected pending = new Map<number, PendingRequest>();
  protected methods = new Map<string, JsonRpcMessageHandler>();
  protected state: ConnectionState = 'disconnected';
  protected readonly parser = new FrameParser();

  protected readonly requestTimeout: number | undefined;
  protected readonly maxFrameSize: number;
  /** 전송 계층 로거. 클라이언트도 별도 지정이 없으면 이 로거를 씁니다. */
  readonly logger: Logger;

  private closed = false;

  constructor(options: BaseConnectionOptions = {}) {
    super();
    this.requestTimeout = options.requestTimeout;
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
    this.logger = options.logger ?? createLogger();
  }

  /** 현재 연결 상태 */
  get connectionState(): ConnectionState {
    return this.state;
  }

  /** 연결이 영구적으로 닫혔는지 여부 */
  get isClosed(): boolean {
    return this.closed;
  }

  /** 응답을 기다리는 요청 수 */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * 서버와 통신할 스트림을 엽니다.
   */
  protected abstract openStream(): Promise<Duplex>;

  /**
   * 서버에 연결합니다.
   * 닫힌 연결은 다시 열 수 없습니다.
   */
  async connect(): Promise<void> {
    if (this.closed) {
      throw new ConnectionClosedError('닫힌 연결은 재사용할 수 없습니다');
    }
    if (this.stream) {
      throw new Error('이미 연결되어 있습니다');
    }

    this.setState('connecting');
    let stream: Duplex;
    try {
      stream = await this.openStream();
    } catch (err) {
      this.setState('error');
      throw err;
    }
    this.attachStream(stream);
  }

  /**
   * 스트림에 수신 루프와 종료 처리를 연결합니다.
   */
  protected attachStream(stream: Duplex): void {
    this.stream = stream;

    stream.on('data', (chunk: Buffer | string) => {
      this.receive(chunk);
    });

    stream.on('end', () => {
      this.close(new ConnectionClosedError('서버가 연결을 종료했습니다'));
    });

    stream.on('close', () => {
      this.close(new ConnectionClosedError('연결이 끊어졌습니다'));
    });

    stream.on('error', (err: Error) => {
      this.logger.error({ err }, '스트림 에러');
      this.setState('error');
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      }
      this.close(new ConnectionClosedError(`연결 에러: ${err.message}`));
    });

    this.setState('connected');
  }

  /**
   * JSON-RPC 요청을 보내고 응답을 기다립니다.
   * 응답 도착 순서와 무관하게 각 호출은 자신의 id에 대한 응답으로만 완료됩니다.
   *
   * @param method - RPC 메서드 이름
   * @param params - 이름 기반 또는 위치 기반 파라미터
   * @param options - 호출 옵션
   * @returns 응답 result
   */
  call<T = unknown>(
    method: string,
    params?: JsonRpcParams,
    options?: CallOptions,
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (!this.stream || this.closed) {
        reject(new ConnectionClosedError('연결되어 있지 않습니다'));
        return;
      }

      const id = this.nextId++;
      const timeoutMs = options?.timeout ?? this.requestTimeout;

      const entry: PendingRequest = {
        resolve: resolve as (value: unknown) => void,
        reject,
        method,
      };
      if (timeoutMs !== undefined) {
        entry.timer = setTimeout(() => {
          this.pending.delete(id);
          reject(new RequestTimeoutError(method, timeoutMs));
        }, timeoutMs);
      }
      this.pending.set(id, entry);

      const request: JsonRpcRequest = {
        jsonrpc: '2.0',
        method,
        ...(params === undefined ? {} : { params }),
        id,
      };

      try {
        this.write(request);
      } catch (err) {
        this.pending.delete(id);
        clearTimeout(entry.timer);
        reject(err instanceof Error ? err : new ServerError(String(err)));
      }
    });
  }

  /**
   * JSON-RPC 알림을 보냅니다 (응답을 기다리지 않음).
   *
   * @param method - RPC 메서드 이름
   * @param params - RPC 파라미터
   */
  notify(method: string, params?: JsonRpcParams): void {
    const notification: JsonRpcNotification = {
      jsonrpc: '2.0',
      method,
      ...(params === undefined ? {} : { params }),
    };
    this.write(notification);
  }

  /**
   * 서버 → 클라이언트 요청에 대한 응답을 전송합니다.
   */
  sendResponse(id: JsonRpcId, result: unknown): void {
    const response: JsonRpcResponse = {
      jsonrpc: '2.0',
      id,
      result: result ?? null,
    };
    this.write(response);
  }

  /**
   * JSON-RPC 에러 응답을 전송합니다.
   */
  sendErrorResponse(id: JsonRpcId | null, error: JsonRpcError): void {
    const response: JsonRpcResponse = {
      jsonrpc: '2.0',
      id,
      error,
    };
    this.write(response);
  }

  /**
   * 서버가 호출할 메서드를 등록합니다. 같은 이름이 있으면 교체합니다.
   *
   * @param method - 메서드 이름
   * @param handler - 요청/알림 핸들러
   */
  addMethod(method: string, handler: JsonRpcMessageHandler): void {
    this.methods.set(method, handler);
  }

  /**
   * 등록된 메서드를 제거합니다.
   *
   * @returns 제거되었으면 true
   */
  removeMethod(method: string): boolean {
    return this.methods.delete(method);
  }

  /** 메서드 등록 여부 */
  hasMethod(method: string): boolean {
    return this.methods.has(method);
  }

  /**
   * 연결을 영구적으로 닫습니다.
   * 대기 중인 모든 요청은 ConnectionClosedError로 실패하며, 재연결하지 않습니다.
   *
   * @param reason - 종료 사유
   */
  close(reason: Error = new ConnectionClosedError()): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const stream = this.stream;
    this.stream = null;
    stream?.destroy();

    const closedError =
      reason instanceof ConnectionClosedError ? reason : new ConnectionClosedError(reason.message);
    this.rejectAllPending(closedError);
    this.methods.clear();

    this.setState('closed');
    this.emit('close', reason);
  }

  /**
   * 수신한 바이트를 파서에 넣고 완성된 메시지를 모두 처리합니다.
   */
  protected receive(chunk: Buffer | string): void {
    if (this.closed) {
      return;
    }
    this.parser.push(chunk);

    for (const frame of this.parser.drain()) {
      if (this.closed) {
        return;
      }
      if (frame.kind === 'invalid') {
        this.reportProtocolError(frame.error, frame.raw);
        this.failMalformedReply(frame.value);
        continue;
      }
      this.logger.debug({ rpc: frame.envelope }, '메시지 수신');
      try {
        this.handleMessage(frame.envelope);
      } catch (err) {
        this.reportProtocolError(
          err instanceof Error ? err : new InvalidRequestError(String(err)),
          frame.raw,
        );
      }
    }

    if (this.parser.bufferedBytes > this.maxFrameSize) {
      this.close(
        new ConnectionClosedError(
          `수신 버퍼가 한도(${this.maxFrameSize}바이트)를 넘어 연결을 닫습니다`,
        ),
      );
    }
  }

  /**
   * 봉투 검사에 실패한 응답이 대기 중인 요청의 id를 가지고 있으면 그 요청을 실패시킵니다.
   * method가 있는 메시지는 응답으로 보지 않습니다.
   */
  protected failMalformedReply(value: unknown): void {
    if (typeof value !== 'object' || value === null || Array.isArray(value) || 'method' in value) {
      return;
    }
    const id = 'id' in value ? value.id : undefined;
    const pending = typeof id === 'number' ? this.pending.get(id) : undefined;
    if (typeof id !== 'number' || !pending) {
      return;
    }
    this.pending.delete(id);
    clearTimeout(pending.timer);
    pending.reject(new ServerError(`서버가 잘못된 응답을 보냈습니다: ${pending.method}`));
  }

  /**
   * 수신된 JSON-RPC 메시지를 처리합니다.
   */
  protected handleMessage(envelope: JsonRpcEnvelope): void {
    const message = classifyMessage(envelope);

    switch (message.kind) {
      case 'request':
        this.handleServerRequest(message.id, message.method, message.params);
        break;
      case 'response':
        this.handleResponse(message.id, envelope);
        break;
      case 'notification':
        this.handleNotification(message.method, message.params);
        break;
      case 'malformed':
        this.reportProtocolError(
          new InvalidRequestError('id와 method가 모두 없는 메시지입니다'),
          JSON.stringify(envelope),
        );
        break;
    }
  }

  /**
   * 보류 중인 요청에 응답을 전달합니다.
   */
  protected handleResponse(id: JsonRpcId | null, envelope: JsonRpcEnvelope): void {
    const pending = typeof id === 'number' ? this.pending.get(id) : undefined;
    if (typeof id !== 'number' || !pending) {
      this.logger.warn({ id }, '대기 중인 요청이 없는 응답을 버립니다');
      return;
    }
    this.pending.delete(id);
    clearTimeout(pending.timer);

    if (envelope.error) {
      pending.reject(RpcError.fromJsonRpcError(envelope.error));
    } else if ('result' in envelope) {
      pending.resolve(envelope.result);
    } else {
      pending.reject(new ServerError(`서버가 잘못된 응답을 보냈습니다: ${pending.method}`));
    }
  }

  /**
   * 서버 → 클라이언트 요청을 처리합니다.
   * 핸들러가 Promise를 반환하면 완료 시점에 응답합니다.
   */
  protected handleServerRequest(
    id: JsonRpcId,
    method: string,
    params: JsonRpcParams | undefined,
  ): void {
    const handler = this.methods.get(method);
    if (!handler) {
      this.sendErrorResponse(id, new MethodNotFoundError(method).toJsonRpcError());
      return;
    }

    let outcome: unknown;
    try {
      outcome = handler.execute(params);
    } catch (err) {
      this.sendErrorResponse(id, toJsonRpcError(err));
      return;
    }

    if (outcome instanceof Promise) {
      outcome
        .then(
          (result: unknown) => this.sendResponse(id, result),
          (err: unknown) => this.sendErrorResponse(id, toJsonRpcError(err)),
        )
        .catch((err: unknown) => {
          this.logger.warn({ err, id, method }, '서버 요청에 응답하지 못했습니다');
        });
      return;
    }
    this.sendResponse(id, outcome);
  }

  /**
   * 알림 메시지를 처리합니다. 등록되지 않은 메서드는 무시합니다.
   */
  protected handleNotification(method: string, params: JsonRpcParams | undefined): void {
    const handler = this.methods.get(method);
    if (!handler) {
      this.logger.debug({ method }, '등록되지 않은 알림을 무시합니다');
      return;
    }

    try {
      const outcome = handler.notify(params);
      if (outcome instanceof Promise) {
        outcome.catch((err: unknown) => {
          this.logger.error({ err, method }, '알림 핸들러 에러');
        });
      }
    } catch (err) {
      this.logger.error({ err, method }, '알림 핸들러 에러');
    }
  }

  /**
   * 메시지 하나의 프로토콜 위반을 기록합니다. 수신 루프는 계속됩니다.
   */
  protected reportProtocolError(error: Error, raw: string): void {
    this.logger.warn({ err: error, raw }, '프로토콜 위반 메시지를 버립니다');
    this.emit('protocolError', error, raw);
  }

  /**
   * 메시지를 직렬화하여 스트림에 씁니다.
   */
  protected write(message: JsonRpcMessage): void {
    if (!this.stream || this.closed) {
      throw new ConnectionClosedError('연결되어 있지 않습니다');
    }
    this.logger.debug({ rpc: message }, '메시지 전송');
    this.stream.write(JSON.stringify(message) + '\n');
  }

  /**
   * 연결 상태를 업데이트하고 이벤트를 발생시킵니다.
   */
  protected setState(newState: ConnectionState): void {
    if (this.state !== newState) {
      this.state = newState;
      this.emit('stateChange', newState);
    }
  }

  /**
   * 모든 보류 중인 요청을 거부합니다.
   */
  protected rejectAllPending(error: Error): void {
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(error);
      this.pending.delete(id);
    }
  }
}
