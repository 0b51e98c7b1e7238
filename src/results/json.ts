// src/results/json.ts
import type { ResultFormatter } from './base.js'
import type { QueryResponse } from '../core/types.js'

export class JsonFormatter implements ResultFormatter {
  format(response: QueryResponse): string {
    return JSON.stringify(response, null, 2)
  }
}
