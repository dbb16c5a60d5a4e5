/**
 * triggerware-client
 * Triggerware 서버용 JSON-RPC 클라이언트: 결과 커서, 폴링 쿼리, 구독
 *
 * @example
 * ```typescript
 * import { TriggerwareClient, FolQuery } from 'triggerware-client';
 *
 * const client = await TriggerwareClient.connect({ host: 'localhost', port: 5221 });
 * const rows = await client.executeQuery(new FolQuery('((a) s.t. (inflation 1991 1995 a))'));
 * for await (const row of rows) {
 *   console.log(row);
 * }
 * client.close();
 * ```
 */

// === 클라이언트 ===
export { TriggerwareClient, type TriggerwareClientOptions } from './client/TriggerwareClient.js';
export type { ITriggerwareClient, TriggerwareClientEvents } from './client/ITriggerwareClient.js';

// === 연결 모듈 ===
export {
  BaseConnection,
  DEFAULT_MAX_FRAME_SIZE,
  type BaseConnectionOptions,
  type CallOptions,
} from './connection/BaseConnection.js';
export { SocketConnection, type SocketConnectionOptions } from './connection/SocketConnection.js';
export { StreamConnection, type StreamConnectionOptions } from './connection/StreamConnection.js';
export { FrameParser, decodeFrame, type FrameReadResult } from './connection/FrameParser.js';

// === 쿼리 ===
export { FolQuery, SqlQuery } from './query/Query.js';
export { applyRestriction, type QueryParameters } from './query/AbstractQuery.js';
export { View } from './query/View.js';
export { PreparedQuery, type PrepareQueryResult } from './query/PreparedQuery.js';
export { ResultSet, type ResultSetOptions } from './query/ResultSet.js';
export { PolledQuery, type PolledQueryOptions, type PolledQueryParameters } from './query/PolledQuery.js';
export {
  CalendarSchedule,
  serializeSchedule,
  type CalendarScheduleFields,
  type PolledQuerySchedule,
  type SerializedSchedule,
} from './query/CalendarSchedule.js';

// === 구독 ===
export { Subscription, type SubscriptionOptions, type SubscriptionState } from './subscription/Subscription.js';
export { BatchSubscription, type BatchMember } from './subscription/BatchSubscription.js';

// === 설정 ===
export {
  DEFAULT_FETCH_SIZE,
  DEFAULT_HOST,
  DEFAULT_NAMESPACE,
  DEFAULT_PORT,
  resolveClientConfig,
} from './config/ClientConfig.js';
export { readEnvironment, type EnvironmentConfig } from './utils/env.js';
export { createLogger } from './utils/logger.js';
export { MethodNameAllocator } from './utils/naming.js';

// === 에러 ===
export {
  JsonRpcErrorCode,
  RpcError,
  ParseError,
  InvalidRequestError,
  MethodNotFoundError,
  InvalidParamsError,
  InternalError,
  ServerError,
  ConnectionClosedError,
  RequestTimeoutError,
} from './errors/RpcErrors.js';
export {
  TriggerwareError,
  InvalidQueryError,
  PreparedQueryError,
  PolledQueryError,
  SubscriptionError,
} from './errors/TriggerwareErrors.js';

// === 타입 ===
export type * from './types/common.js';
export type * from './types/config.js';
export type * from './types/query.js';
