/**
 * SocketConnection - TCP 소켓 연결
 */

import { createConnection, type Socket } from 'net';
import type { Duplex } from 'stream';
import { ServerError } from '../errors/RpcErrors.js';
import { BaseConnection, type BaseConnectionOptions } from './BaseConnection.js';

/** SocketConnection 생성 옵션 */
export interface SocketConnectionOptions extends BaseConnectionOptions {
  /** 서버 주소 */
  host: string;
  /** 서버 포트 */
  port: number;
  /** 연결 수립 타임아웃 (ms, 기본: 10000) */
  connectTimeout?: number;
}

/**
 * TCP로 서버에 연결하는 클래스.
 * 연결이 끊기면 인스턴스는 영구적으로 닫힙니다.
 */
export class SocketConnection extends BaseConnection {
  readonly host: string;
  readonly port: number;
  private readonly connectTimeout: number;

  constructor(options: SocketConnectionOptions) {
    super(options);
    this.host = options.host;
    this.port = options.port;
    this.connectTimeout = options.connectTimeout ?? 10_000;
  }

  protected openStream(): Promise<Duplex> {
    return new Promise<Socket>((resolve, reject) => {
      const socket = createConnection({ host: this.host, port: this.port });

      const timer = setTimeout(() => {
        socket.destroy();
        reject(
          new ServerError(`연결 타임아웃 (${this.connectTimeout}ms): ${this.host}:${this.port}`),
        );
      }, this.connectTimeout);

      const onError = (err: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(err);
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        socket.setNoDelay(true);
        this.logger.debug({ host: this.host, port: this.port }, '서버에 연결되었습니다');
        resolve(socket);
      });
    });
  }
}
