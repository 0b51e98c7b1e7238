// src/results/base.ts
import type { QueryResponse } from '../core/types.js'

export interface ResultFormatter {
  format(response: QueryResponse): string
}
