/**
 * Shared test doubles: recording logger and metrics, a manual clock, and an
 * in-process axios adapter that stands in for the crawl backend and for
 * target websites.
 */

import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import type { Clock, Logger, Metrics } from '../src/types/index.js';

// ============================================================================
// Logger / Metrics
// ============================================================================

export type LogLevelName = 'info' | 'warn' | 'error' | 'debug';

export interface LogEntry {
  level: LogLevelName;
  message: string;
  meta?: Record<string, unknown>;
}

export function createMockLogger(): Logger & { entries: LogEntry[]; messages(level: LogLevelName): string[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevelName) => (message: string, meta?: Record<string, unknown>) => {
    entries.push(meta ? { level, message, meta } : { level, message });
  };
  return {
    entries,
    messages: (level) => entries.filter((entry) => entry.level === level).map((entry) => entry.message),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    debug: record('debug'),
  };
}

export interface MetricRecord {
  type: 'increment' | 'gauge' | 'timing';
  metric: string;
  value?: number;
  tags?: Record<string, string>;
}

export function createMockMetrics(): Metrics & { records: MetricRecord[]; names(type: MetricRecord['type']): string[] } {
  const records: MetricRecord[] = [];
  return {
    records,
    names: (type) => records.filter((record) => record.type === type).map((record) => record.metric),
    increment: (metric, tags) => {
      records.push(tags ? { type: 'increment', metric, tags } : { type: 'increment', metric });
    },
    gauge: (metric, value, tags) => {
      records.push(tags ? { type: 'gauge', metric, value, tags } : { type: 'gauge', metric, value });
    },
    timing: (metric, value, tags) => {
      records.push(tags ? { type: 'timing', metric, value, tags } : { type: 'timing', metric, value });
    },
  };
}

// ============================================================================
// Clock
// ============================================================================

export interface FakeClock extends Clock {
  /** Every requested sleep, in call order */
  sleeps: number[];
  advance(ms: number): void;
}

/**
 * Clock whose sleep advances virtual time instantly
 */
export function createFakeClock(start = 0): FakeClock {
  let time = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
    advance: (ms: number) => {
      time += ms;
    },
  };
}

// ============================================================================
// HTTP
// ============================================================================

export interface RecordedRequest {
  method: string;
  /** Path for backend calls, absolute URL for direct fetches */
  url: string;
  body: unknown;
  authorization: string | null;
}

export type FakeReply =
  | { status: number; data?: unknown }
  | { fail: 'timeout' | 'network' };

export type FakeAdapter = AxiosAdapter & { requests: RecordedRequest[] };

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

/**
 * Axios adapter answering every request through `handler`
 */
export function createFakeAdapter(
  handler: (request: RecordedRequest) => FakeReply | Promise<FakeReply>
): FakeAdapter {
  const requests: RecordedRequest[] = [];

  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const auth = config.headers.get('Authorization');
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      body: parseBody(config.data),
      authorization: typeof auth === 'string' ? auth : null,
    };
    requests.push(request);

    const reply = await handler(request);
    if ('fail' in reply) {
      throw reply.fail === 'timeout'
        ? new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED', config)
        : new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    }
    return {
      data: reply.data ?? null,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
  };

  return Object.assign(adapter, { requests });
}

/**
 * Adapter that replays `replies` in order and repeats the last one
 */
export function createSequenceAdapter(replies: FakeReply[]): FakeAdapter {
  let index = 0;
  return createFakeAdapter(() => {
    const reply = replies[Math.min(index, replies.length - 1)] ?? { status: 500 };
    index += 1;
    return reply;
  });
}
