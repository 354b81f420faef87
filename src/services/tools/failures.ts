// Tool failure helpers
// Collaborators report failures as tagged values; ToolFailureError carries one through a throw

import { FailureKind } from './types.js';
import type { ArgValue, FailureDetail, ToolFailure } from './types.js';

export class ToolFailureError extends Error {
  constructor(public readonly detail: FailureDetail) {
    super(detail.message);
    this.name = 'ToolFailureError';
  }
}

export function fail(kind: FailureKind, message: string, context?: Record<string, ArgValue>): ToolFailure {
  return {
    success: false,
    error: context ? { kind, message, context } : { kind, message },
  };
}

export const invalidParameter = (param: string, message: string): ToolFailure =>
  fail(FailureKind.PARAMETER_INVALID, message, { param });

export const entityNotFound = (message: string, context?: Record<string, ArgValue>): ToolFailure =>
  fail(FailureKind.ENTITY_NOT_FOUND, message, context);

export const transient = (message: string): ToolFailure => fail(FailureKind.TRANSIENT, message);

export function isRetryableKind(kind: FailureKind): boolean {
  return kind === FailureKind.PARAMETER_INVALID || kind === FailureKind.TRANSIENT;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function readString(args: Record<string, ArgValue>, name: string): string | undefined {
  const value = args[name];
  if (value === undefined) return undefined;
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

// Validates a YYYY-MM-DD argument that is also a real calendar day
export function readIsoDate(
  args: Record<string, ArgValue>,
  name: string,
): { ok: true; value: string | undefined } | { ok: false; failure: ToolFailure } {
  const raw = readString(args, name);
  if (raw === undefined) return { ok: true, value: undefined };
  if (!ISO_DATE.test(raw)) {
    return { ok: false, failure: invalidParameter(name, `${name} must be YYYY-MM-DD, got "${raw}"`) };
  }
  const parsed = new Date(`${raw}T00:00:00Z`);
  if (isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== raw) {
    return { ok: false, failure: invalidParameter(name, `${name} is not a calendar date: "${raw}"`) };
  }
  return { ok: true, value: raw };
}

export function readEnum<T extends string>(
  args: Record<string, ArgValue>,
  name: string,
  choices: readonly T[],
): { ok: true; value: T | undefined } | { ok: false; failure: ToolFailure } {
  const raw = readString(args, name);
  if (raw === undefined) return { ok: true, value: undefined };
  const match = choices.find(choice => choice === raw);
  if (!match) {
    return { ok: false, failure: invalidParameter(name, `${name} must be one of ${choices.join(', ')}; got "${raw}"`) };
  }
  return { ok: true, value: match };
}

export function readInteger(
  args: Record<string, ArgValue>,
  name: string,
  min: number,
  max: number,
): { ok: true; value: number | undefined } | { ok: false; failure: ToolFailure } {
  const raw = args[name];
  if (raw === undefined) return { ok: true, value: undefined };
  const value = typeof raw === 'number' ? raw : Number(String(raw).trim());
  if (!Number.isInteger(value) || value < min || value > max) {
    return { ok: false, failure: invalidParameter(name, `${name} must be an integer from ${min} to ${max}; got "${raw}"`) };
  }
  return { ok: true, value };
}
