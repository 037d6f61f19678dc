export type ParseErrorCode =
  | 'empty'
  | 'unknown-type'
  | 'missing-separator'
  | 'frame-length'
  | 'frame-hex'
  | 'field-count'
  | 'field-value'
  | 'missing-field'
  | 'line-too-long';

const MAX_EXCERPT = 80;

function excerpt(raw: string) {
  return raw.length > MAX_EXCERPT ? `${raw.slice(0, MAX_EXCERPT)}…` : raw;
}

export class ParseError extends Error {
  readonly code: ParseErrorCode;
  readonly raw: string;
  readonly locationId: string | null;

  constructor(code: ParseErrorCode, message: string, raw: string, locationId: string | null = null) {
    super(message);
    this.name = 'ParseError';
    this.code = code;
    this.raw = excerpt(raw);
    this.locationId = locationId;
  }
}

export class ConnectionError extends Error {
  readonly peer: string;

  constructor(message: string, peer: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
    this.peer = peer;
  }
}

export class DispatchError extends Error {
  readonly deviceId: number;
  readonly command: string;
  readonly isTimeout: boolean;

  constructor(
    message: string,
    details: { deviceId: number; command: string; isTimeout?: boolean; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = 'DispatchError';
    this.deviceId = details.deviceId;
    this.command = details.command;
    this.isTimeout = details.isTimeout ?? false;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[], prefix = 'Invalid configuration') {
    super(`${prefix}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
