/**
 * Sinks receiving registry diagnostics
 * @module sinks
 */

import { stdout } from 'node:process';
import type { DiagnosticEvent, DiagnosticLevel, MemorySink, Sink } from './types.js';

/**
 * ANSI color codes for diagnostic levels
 */
const levelColors: Record<DiagnosticLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const reset = '\x1b[0m';
const dim = '\x1b[2m';
const bold = '\x1b[1m';

/**
 * Format ISO timestamp to readable time
 */
function FormatTimestamp(iso: string): string {
  const date = new Date(iso);
  return date.toLocaleTimeString('en-US', {
    hour12: false,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

/**
 * Format a value for display
 */
export function FormatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    return value.length === 0 ? '[]' : `[${value.length}]`;
  }
  if (typeof value === 'object') {
    return Object.keys(value).length === 0 ? '{}' : '{…}';
  }
  return String(value);
}

/**
 * Create a visual sink for development output
 *
 * Outputs one colored line per event:
 * ```
 * 14:32:15 DEBUG identity.hash.created models.user.User hash=3f2a9c01b7de
 * ```
 *
 * @returns Sink for visual output
 */
export function CreateVisualSink(): Sink<DiagnosticEvent> {
  return (event) => {
    const color = levelColors[event.level];
    const timestamp = FormatTimestamp(event.ts);
    const fields = Object.entries(event.payload)
      .map(([key, value]) => `${key}=${FormatValue(value)}`)
      .join(' ');

    stdout.write(
      `${dim}${timestamp}${reset} ${color}${bold}${event.level.toUpperCase()}${reset} ${event.name} ${event.model}${fields.length > 0 ? ` ${dim}${fields}${reset}` : ''}\n`,
    );
  };
}

/**
 * Create a structured sink for JSON output
 *
 * Outputs events as JSON lines (NDJSON format), suitable for production:
 * ```
 * {"name":"identity.hash.created","ts":"2024-01-15T14:32:15.123Z","level":"debug",...}
 * ```
 *
 * @returns Sink for JSON output
 */
export function CreateStructuredSink(): Sink<DiagnosticEvent> {
  return (event) => {
    stdout.write(`${JSON.stringify(event)}\n`);
  };
}

/**
 * Create a memory sink for testing
 *
 * Captures events in memory for assertions:
 * ```typescript
 * const memory = CreateMemorySink();
 * const registry = CreateIdentityRegistry({ sinks: [memory] });
 *
 * registry.Hash(User);
 *
 * expect(memory.events[0]?.name).toBe('identity.hash.created');
 * ```
 *
 * @returns Sink function with captured events
 */
export function CreateMemorySink(): MemorySink {
  const events: DiagnosticEvent[] = [];

  const sink = (event: DiagnosticEvent): void => {
    events.push(event);
  };

  return Object.assign(sink, { events });
}

/**
 * Create an environment-aware sink
 *
 * Uses visual sink in development, structured sink in production:
 * - Development: `NODE_ENV !== 'production'` → visual output
 * - Production: `NODE_ENV === 'production'` → JSON output
 *
 * @param options - Options with development override
 * @returns Environment-appropriate sink
 */
export function CreateEnvironmentSink(options: { development?: boolean } = {}): Sink<DiagnosticEvent> {
  const isDev = options.development ?? process.env.NODE_ENV !== 'production';
  return isDev ? CreateVisualSink() : CreateStructuredSink();
}

/**
 * Deliver an event to every sink. Sink failures never reach the caller.
 */
export function DispatchToSinks(sinks: readonly Sink<DiagnosticEvent>[], event: DiagnosticEvent): void {
  for (const sink of sinks) {
    try {
      const result = sink(event);
      void Promise.resolve(result).catch((error: unknown) => {
        console.error('Sink error:', error);
      });
    } catch (error) {
      console.error('Sink error:', error);
    }
  }
}
