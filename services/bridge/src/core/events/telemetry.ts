/**
 * Telemetry hooks for the event bus.
 *
 * Log details are single line, formatted: key=value key2=value2 ...
 * Structured objects are never handed to the logger so pretty output stays on one line.
 */

import type { ChannelLogger } from '@marauder-link/logging';

export interface BusTelemetry {
  published(kind: string): void;
  delivered(kind: string): void;
  handlerThrew(kind: string): void;

  error(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
}

export const NoopTelemetry: BusTelemetry = {
  published: () => {},
  delivered: () => {},
  handlerThrew: () => {},
  error: () => {},
  warn: () => {},
};

export interface BusTelemetryCounters {
  published: Record<string, number>;
  delivered: Record<string, number>;
  handlerThrew: Record<string, number>;
}

export interface BusTelemetryWithCounters extends BusTelemetry {
  snapshotCounters(): BusTelemetryCounters;
}

function inc(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

function snapshot(map: Map<string, number>): Record<string, number> {
  return Object.fromEntries(map.entries());
}

function quoteIfNeeded(s: string): string {
  // Quote if spaces, equals or quotes exist (keeps parsing unambiguous)
  if (!/[\s="]/.test(s)) return s;
  return `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function fmtValue(v: unknown): string {
  if (v === null) return 'null';
  if (v === undefined) return 'undefined';
  if (typeof v === 'string') return quoteIfNeeded(v);
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  if (v instanceof Error) return quoteIfNeeded(v.message);

  const json = JSON.stringify(v);
  return quoteIfNeeded(typeof json === 'string' ? json : String(v));
}

export function fmtKVs(fields?: Record<string, unknown>): string {
  if (!fields) return '';
  return Object.keys(fields)
    .sort() // deterministic ordering
    .map((k) => `${k}=${fmtValue(fields[k])}`)
    .join(' ');
}

function line(msg: string, fields?: Record<string, unknown>): string {
  const kvs = fmtKVs(fields);
  return kvs ? `${msg} ${kvs}` : msg;
}

/**
 * Telemetry that logs through a channel logger and keeps per-kind counters in memory.
 */
export function makeBusTelemetry(log: Pick<ChannelLogger, 'warn' | 'error'>): BusTelemetryWithCounters {
  const c_published = new Map<string, number>();
  const c_delivered = new Map<string, number>();
  const c_handlerThrew = new Map<string, number>();

  return {
    published: (kind: string) => inc(c_published, kind),
    delivered: (kind: string) => inc(c_delivered, kind),
    handlerThrew: (kind: string) => inc(c_handlerThrew, kind),

    error: (msg: string, fields?: Record<string, unknown>) => {
      log.error(line(msg, fields));
    },
    warn: (msg: string, fields?: Record<string, unknown>) => {
      log.warn(line(msg, fields));
    },

    snapshotCounters: () => ({
      published: snapshot(c_published),
      delivered: snapshot(c_delivered),
      handlerThrew: snapshot(c_handlerThrew),
    }),
  };
}
