/**
 * 쿼리 값 객체
 */

import { DEFAULT_NAMESPACE } from '../config/ClientConfig.js';
import type { Query } from '../types/query.js';

/** FOL로 작성된 쿼리 */
export class FolQuery implements Query {
  readonly query: string;
  readonly language = 'fol' as const;
  readonly namespace: string;

  constructor(query: string, namespace: string = DEFAULT_NAMESPACE) {
    this.query = query;
    this.namespace = namespace;
  }
}

/** SQL로 작성된 쿼리 */
export class SqlQuery implements Query {
  readonly query: string;
  readonly language = 'sql' as const;
  readonly namespace: string;

  constructor(query: string, namespace: string = DEFAULT_NAMESPACE) {
    this.query = query;
    this.namespace = namespace;
  }
}
