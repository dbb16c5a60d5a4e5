/**
 * 수신 JSON-RPC 메시지 스키마
 */

import { z } from 'zod';

const idSchema = z.union([z.number().int(), z.string()]);

const paramsSchema = z.union([z.record(z.unknown()), z.array(z.unknown())]);

const errorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

/** jsonrpc 필드가 정확히 "2.0"이어야 합니다. */
export const JsonRpcEnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: idSchema.nullable().optional(),
  method: z.string().optional(),
  params: paramsSchema.optional(),
  result: z.unknown().optional(),
  error: errorSchema.optional(),
});

export type JsonRpcEnvelope = z.infer<typeof JsonRpcEnvelopeSchema>;

/** 라우팅 단위로 분류된 수신 메시지 */
export type InboundMessage =
  | { kind: 'request'; id: string | number; method: string; params?: JsonRpcEnvelope['params'] }
  | { kind: 'response'; id: string | number | null; envelope: JsonRpcEnvelope }
  | { kind: 'notification'; method: string; params?: JsonRpcEnvelope['params'] }
  | { kind: 'malformed'; envelope: JsonRpcEnvelope };

/**
 * id/method 존재 여부로 메시지를 분류합니다.
 * 값이 null인 id도 "id 있음"으로 취급합니다.
 */
export function classifyMessage(envelope: JsonRpcEnvelope): InboundMessage {
  const { id, method } = envelope;

  if (id !== undefined && method !== undefined) {
    // 서버 요청에 null id는 허용되지 않음
    if (id === null) return { kind: 'malformed', envelope };
    return { kind: 'request', id, method, params: envelope.params };
  }
  if (id !== undefined) {
    return { kind: 'response', id, envelope };
  }
  if (method !== undefined) {
    return { kind: 'notification', method, params: envelope.params };
  }
  return { kind: 'malformed', envelope };
}
