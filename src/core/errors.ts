// src/core/errors.ts

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly fields: string[] = [],
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

export type UpstreamErrorCode = 'HTTP' | 'TIMEOUT' | 'PARSE' | 'NETWORK'

export class UpstreamError extends Error {
  constructor(
    public readonly code: UpstreamErrorCode,
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message)
    this.name = 'UpstreamError'
  }
}
