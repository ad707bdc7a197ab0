/**
 * Stack Service - wire contract for the HTTP and WebSocket surface
 *
 * Everything here is JSON-serializable. Integers travel as decimal strings
 * since they are 64-bit.
 */

import type { Failure, FailureReason } from '../outcome/failure';
import { failureKind, formatFailure } from '../outcome/failure';
import type { WireEvent } from '../ports/sink';
import type { SpawnInfo } from '../core/spawn/spawn';
import type { StackInfo } from '../core/stack/typedStack';

// ============================================================
// SERVICE TYPES - What clients receive
// ============================================================

/**
 * A stack with its contents, storage order
 */
export interface StackView extends StackInfo {
  items: string[];
  rendering: string;
}

export type SpawnView = SpawnInfo;

export interface CommandResponse {
  ok: boolean;
  target?: string;
  kind: string;
  lines: string[];
}

export interface ErrorResponse {
  error: string;
  kind: string;
  reason: FailureReason | 'bad-request';
}

// ============================================================
// WEBSOCKET PROTOCOL
// ============================================================

/**
 * Server -> client
 */
export type ServerEvent =
  | { type: 'hello'; stacks: StackInfo[]; spawns: SpawnView[] }
  | { type: 'output'; event: WireEvent }
  | { type: 'result'; response: CommandResponse }
  | { type: 'error'; error: string };

/**
 * Client -> server
 */
export type ClientCommand =
  | { type: 'command'; line: string }
  | { type: 'deposit'; spawn: string; script: string }
  | { type: 'list' };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Read a string field from an untyped request body. */
export function stringField(body: unknown, key: string): string | undefined {
  if (!isRecord(body)) return undefined;
  const v = body[key];
  return typeof v === 'string' ? v : undefined;
}

export function numberField(body: unknown, key: string): number | undefined {
  if (!isRecord(body)) return undefined;
  const v = body[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

export function booleanField(body: unknown, key: string): boolean | undefined {
  if (!isRecord(body)) return undefined;
  const v = body[key];
  return typeof v === 'boolean' ? v : undefined;
}

export function parseClientCommand(raw: string): ClientCommand | undefined {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return undefined;
  }
  switch (stringField(data, 'type')) {
    case 'command': {
      const line = stringField(data, 'line');
      return line === undefined ? undefined : { type: 'command', line };
    }
    case 'deposit': {
      const spawn = stringField(data, 'spawn');
      const script = stringField(data, 'script');
      return spawn === undefined || script === undefined ? undefined : { type: 'deposit', spawn, script };
    }
    case 'list':
      return { type: 'list' };
    default:
      return undefined;
  }
}

// ============================================================
// ERROR MAPPING
// ============================================================

const STATUS_BY_REASON: Partial<Record<FailureReason, number>> = {
  'unknown-target': 404,
  'duplicate-target': 409,
  'mailbox-full': 409,
  'spawn-stopped': 409,
  'internal-error': 500,
};

export function statusFor(failure: Failure): number {
  return STATUS_BY_REASON[failure.reason] ?? 400;
}

export function errorBody(failure: Failure): ErrorResponse {
  return { error: formatFailure(failure), kind: failureKind(failure), reason: failure.reason };
}

export function badRequest(message: string): ErrorResponse {
  return { error: message, kind: 'BadRequest', reason: 'bad-request' };
}

export function serverError(message: string): ErrorResponse {
  return { error: `InternalError: ${message}`, kind: 'InternalError', reason: 'internal-error' };
}
