/**
 * 전송/프로토콜 계층 에러
 * 표준 JSON-RPC 에러 코드를 그대로 보존합니다.
 */

import type { JsonRpcError } from '../types/common.js';

/** 표준 JSON-RPC 에러 코드 */
export const JsonRpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  /** 연결 끊김, 잘못된 응답 등 로컬에서 발생시키는 일반 서버 에러 */
  ServerError: -32000,
} as const;

/**
 * 코드가 붙은 JSON-RPC 에러.
 * 서버가 돌려준 error 객체도 이 클래스로 표현됩니다.
 */
export class RpcError extends Error {
  readonly code: number;
  readonly data?: unknown;

  constructor(message: string, code: number, data?: unknown) {
    super(message);
    this.name = 'RpcError';
    this.code = code;
    this.data = data;
  }

  /** 와이어로 보낼 error 객체로 변환합니다. */
  toJsonRpcError(): JsonRpcError {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }

  /** 서버가 보낸 error 객체로부터 에러를 만듭니다. */
  static fromJsonRpcError(error: JsonRpcError): RpcError {
    return new RpcError(error.message, error.code, error.data);
  }
}

export class ParseError extends RpcError {
  constructor(message = 'JSON-RPC 메시지를 파싱할 수 없습니다') {
    super(message, JsonRpcErrorCode.ParseError);
    this.name = 'ParseError';
  }
}

export class InvalidRequestError extends RpcError {
  constructor(message = '유효하지 않은 JSON-RPC 메시지입니다') {
    super(message, JsonRpcErrorCode.InvalidRequest);
    this.name = 'InvalidRequestError';
  }
}

export class MethodNotFoundError extends RpcError {
  readonly method: string;

  constructor(method: string) {
    super(`메서드를 찾을 수 없습니다: ${method}`, JsonRpcErrorCode.MethodNotFound);
    this.name = 'MethodNotFoundError';
    this.method = method;
  }
}

export class InvalidParamsError extends RpcError {
  constructor(message = '유효하지 않은 파라미터입니다') {
    super(message, JsonRpcErrorCode.InvalidParams);
    this.name = 'InvalidParamsError';
  }
}

export class InternalError extends RpcError {
  constructor(message: string) {
    super(message, JsonRpcErrorCode.InternalError);
    this.name = 'InternalError';
  }
}

export class ServerError extends RpcError {
  constructor(message: string) {
    super(message, JsonRpcErrorCode.ServerError);
    this.name = 'ServerError';
  }
}

/** 연결이 닫혀 더 이상 응답을 받을 수 없음 */
export class ConnectionClosedError extends ServerError {
  constructor(message = '연결이 닫혔습니다') {
    super(message);
    this.name = 'ConnectionClosedError';
  }
}

/** 클라이언트 측 타임아웃 (서버에는 영향 없음) */
export class RequestTimeoutError extends ServerError {
  readonly method: string;
  readonly timeoutMs: number;

  constructor(method: string, timeoutMs: number) {
    super(`요청 타임아웃 (${timeoutMs}ms): ${method}`);
    this.name = 'RequestTimeoutError';
    this.method = method;
    this.timeoutMs = timeoutMs;
  }
}
