/**
 * FrameParser - 연속된 JSON 값 스트림 디코더
 *
 * 서버는 공백으로 구분된 JSON 값을 이어서 보냅니다 (줄바꿈이 보장되지 않음).
 * 소켓 read 경계와 메시지 경계는 무관하므로, 바이트 버퍼를 누적하면서
 * 완성된 값이 생길 때마다 하나씩 꺼냅니다.
 */

import { InvalidRequestError, ParseError, type RpcError } from '../errors/RpcErrors.js';
import { JsonRpcEnvelopeSchema, type JsonRpcEnvelope } from './schema.js';

/** read() 결과 */
export type FrameReadResult =
  | { kind: 'message'; envelope: JsonRpcEnvelope; raw: string }
  | { kind: 'invalid'; error: RpcError; raw: string; value?: unknown }
  | { kind: 'incomplete' };

/** 진행 중인 값의 스캔 상태 (다음 push 이후 이어서 스캔) */
interface ScanState {
  mode: 'structured' | 'literal';
  pos: number;
  depth: number;
  inString: boolean;
  escaped: boolean;
}

const SPACE = 0x20;
const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const COMMA = 0x2c;
const COLON = 0x3a;

const INCOMPLETE: FrameReadResult = { kind: 'incomplete' };

function isWhitespace(byte: number): boolean {
  return byte === SPACE || byte === TAB || byte === LF || byte === CR;
}

/** 리터럴(숫자, true/false/null 등)의 끝을 나타내는 바이트 */
function isDelimiter(byte: number): boolean {
  return (
    isWhitespace(byte) ||
    byte === OPEN_BRACE ||
    byte === CLOSE_BRACE ||
    byte === OPEN_BRACKET ||
    byte === CLOSE_BRACKET ||
    byte === QUOTE ||
    byte === COMMA ||
    byte === COLON
  );
}

/**
 * 완성된 JSON 텍스트를 디코드하고 JSON-RPC 2.0 봉투인지 검사합니다.
 * JSON으로는 읽혔지만 봉투가 아닌 경우 파싱된 값을 value에 담습니다.
 */
export function decodeFrame(raw: string): FrameReadResult {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { kind: 'invalid', error: new ParseError(), raw };
  }

  const parsed = JsonRpcEnvelopeSchema.safeParse(value);
  if (parsed.success) {
    return { kind: 'message', envelope: parsed.data, raw };
  }

  if (typeof value === 'object' && value !== null && 'jsonrpc' in value && value.jsonrpc !== '2.0') {
    return {
      kind: 'invalid',
      error: new InvalidRequestError(`지원하지 않는 프로토콜 버전: ${String(value.jsonrpc)}`),
      raw,
      value,
    };
  }
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
  return {
    kind: 'invalid',
    error: new InvalidRequestError(`유효하지 않은 JSON-RPC 메시지${where}: ${issue?.message ?? 'unknown'}`),
    raw,
    value,
  };
}

/**
 * 증분 JSON 값 파서.
 * 불완전한 값은 버리지 않고 다음 push를 기다립니다.
 */
export class FrameParser {
  private buffer: Buffer = Buffer.alloc(0);
  private scan: ScanState | null = null;

  /** 아직 소비되지 않은 바이트 수 */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /** 소켓에서 읽은 바이트를 버퍼 끝에 추가합니다. */
  push(chunk: Buffer | string): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);
  }

  /**
   * 버퍼 앞에서 완성된 값 하나를 꺼냅니다.
   * 값이 아직 완성되지 않았으면 'incomplete'를 반환하고 버퍼는 그대로 둡니다.
   */
  read(): FrameReadResult {
    if (!this.scan) {
      let start = 0;
      while (start < this.buffer.length && isWhitespace(this.buffer[start])) {
        start++;
      }
      this.buffer = this.buffer.subarray(start);
      if (this.buffer.length === 0) {
        return INCOMPLETE;
      }
      this.scan = this.beginScan(this.buffer[0]);
    }

    const end = this.advance(this.scan);
    if (end < 0) {
      return INCOMPLETE;
    }

    this.scan = null;
    const raw = this.buffer.toString('utf8', 0, end);
    this.buffer = this.buffer.subarray(end);
    return decodeFrame(raw);
  }

  /** 완성된 값을 모두 꺼냅니다. */
  *drain(): Generator<Exclude<FrameReadResult, { kind: 'incomplete' }>> {
    for (;;) {
      const result = this.read();
      if (result.kind === 'incomplete') return;
      yield result;
    }
  }

  private beginScan(first: number): ScanState {
    const structured =
      first === OPEN_BRACE ||
      first === OPEN_BRACKET ||
      first === QUOTE ||
      first === CLOSE_BRACE ||
      first === CLOSE_BRACKET;
    return {
      mode: structured ? 'structured' : 'literal',
      pos: structured ? 0 : 1,
      depth: 0,
      inString: false,
      escaped: false,
    };
  }

  /**
   * 스캔을 이어서 진행합니다.
   * 값의 끝(배타적 인덱스)을 반환하고, 아직 끝나지 않았으면 -1.
   */
  private advance(scan: ScanState): number {
    const buf = this.buffer;

    if (scan.mode === 'literal') {
      for (; scan.pos < buf.length; scan.pos++) {
        if (isDelimiter(buf[scan.pos])) return scan.pos;
      }
      return -1;
    }

    // UTF-8 멀티바이트 시퀀스는 모두 0x80 이상이라 구조 문자와 겹치지 않음
    for (; scan.pos < buf.length; scan.pos++) {
      const byte = buf[scan.pos];

      if (scan.inString) {
        if (scan.escaped) {
          scan.escaped = false;
        } else if (byte === BACKSLASH) {
          scan.escaped = true;
        } else if (byte === QUOTE) {
          scan.inString = false;
          if (scan.depth === 0) return scan.pos + 1;
        }
        continue;
      }

      if (byte === QUOTE) {
        scan.inString = true;
      } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
        scan.depth++;
      } else if (byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
        scan.depth--;
        // depth < 0: 짝이 없는 닫는 괄호 — 1바이트짜리 잘못된 값으로 소비
        if (scan.depth <= 0) return scan.pos + 1;
      }
    }
    return -1;
  }
}
