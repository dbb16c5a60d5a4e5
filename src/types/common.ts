/**
 * JSON-RPC 2.0 공통 타입 정의
 */

/** 요청 ID (클라이언트가 보내는 ID는 항상 정수) */
export type JsonRpcId = number | string;

/** 이름 기반(object) 또는 위치 기반(array) 파라미터 */
export type JsonRpcParams = Record<string, unknown> | unknown[];

/** JSON-RPC 2.0 요청 */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: JsonRpcParams;
}

/** JSON-RPC 2.0 응답 */
export interface JsonRpcResponse<T = unknown> {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result?: T;
  error?: JsonRpcError;
}

/** JSON-RPC 2.0 알림 (id 없음) */
export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: JsonRpcParams;
}

/** JSON-RPC 2.0 에러 */
export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/** JSON-RPC 메시지 유니온 타입 */
export type JsonRpcMessage = JsonRpcRequest | JsonRpcResponse | JsonRpcNotification;

/** 보류 중인 요청 추적 */
export interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  method: string;
  /** 클라이언트 측 타임아웃이 설정된 경우에만 존재 */
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * 서버 → 클라이언트 메서드 핸들러.
 * execute는 응답이 필요한 요청, notify는 알림을 처리합니다.
 */
export interface JsonRpcMessageHandler {
  execute: (params: JsonRpcParams | undefined) => unknown;
  notify: (params: JsonRpcParams | undefined) => void | Promise<void>;
}

/** 연결 상태 */
export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'error'
  | 'closed';

/** 연결 이벤트 맵 */
export interface ConnectionEvents {
  /** 상태 변경 */
  stateChange: [state: ConnectionState];
  /** 치명적인 스트림 에러 (리스너가 있을 때만 발생) */
  error: [error: Error];
  /** 연결 종료 (재연결 없음) */
  close: [reason: Error];
  /** 개별 메시지의 프로토콜 위반 — 수신 루프는 계속 동작 */
  protocolError: [error: Error, raw: string];
}
