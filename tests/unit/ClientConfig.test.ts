/**
 * 클라이언트 설정 해석 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_FETCH_SIZE,
  DEFAULT_HOST,
  DEFAULT_PORT,
  resolveClientConfig,
} from '../../src/config/ClientConfig.js';
import { createLogger } from '../../src/utils/logger.js';

describe('resolveClientConfig', () => {
  it('옵션과 환경변수가 없으면 기본값을 써야 합니다', () => {
    const config = resolveClientConfig({}, {});

    expect(config.host).toBe(DEFAULT_HOST);
    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.fetchSize).toBe(DEFAULT_FETCH_SIZE);
    expect(config.timeout).toBeNull();
    expect(config.requestTimeout).toBeUndefined();
    expect(config.logger.level).toBe('warn');
  });

  it('환경변수가 기본값보다 우선해야 합니다', () => {
    const config = resolveClientConfig(
      {},
      { TRIGGERWARE_HOST: 'tw.internal', TRIGGERWARE_PORT: '6000', TRIGGERWARE_LOG_LEVEL: 'debug' },
    );

    expect(config.host).toBe('tw.internal');
    expect(config.port).toBe(6000);
    expect(config.logger.level).toBe('debug');
  });

  it('명시적 옵션이 환경변수보다 우선해야 합니다', () => {
    const logger = createLogger({ level: 'silent' });

    const config = resolveClientConfig(
      { port: 7000, fetchSize: 10, timeout: 4, requestTimeout: 1000, logger },
      { TRIGGERWARE_PORT: '6000', TRIGGERWARE_HOST: 'tw.internal', TRIGGERWARE_FETCH_SIZE: '50' },
    );

    expect(config).toEqual({
      host: 'tw.internal',
      port: 7000,
      fetchSize: 10,
      timeout: 4,
      requestTimeout: 1000,
      logger,
    });
  });
});
