/**
 * StreamConnection - 이미 열린 Duplex 스트림 위의 연결
 * TLS 소켓, 파이프 등 직접 연 스트림을 그대로 사용할 때 씁니다.
 */

import type { Duplex } from 'stream';
import { BaseConnection, type BaseConnectionOptions } from './BaseConnection.js';

/** StreamConnection 생성 옵션 */
export interface StreamConnectionOptions extends BaseConnectionOptions {
  /** 서버와 연결된 양방향 스트림 */
  stream: Duplex;
}

export class StreamConnection extends BaseConnection {
  private readonly source: Duplex;

  constructor(options: StreamConnectionOptions) {
    super(options);
    this.source = options.stream;
  }

  protected async openStream(): Promise<Duplex> {
    return this.source;
  }
}
