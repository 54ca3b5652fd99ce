import { z } from 'zod';
import type { Diagnosis } from '../types';
import { DiagnosisSchema } from './schema';

export const DIAGNOSIS_PHASES = ['resolving', 'competitors', 'ranking', 'crawling', 'scoring', 'deep-analysis'] as const;

export type DiagnosisPhase = typeof DIAGNOSIS_PHASES[number];

export type DiagnosisStreamEvent =
  | { type: 'phase'; phase: DiagnosisPhase; detail: string }
  | { type: 'result'; data: Diagnosis }
  | { type: 'error'; message: string };

const StreamEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('phase'), phase: z.enum(DIAGNOSIS_PHASES), detail: z.string().default('') }),
  z.object({ type: z.literal('result'), data: DiagnosisSchema }),
  z.object({ type: z.literal('error'), message: z.string() }),
]);

/** One NDJSON line, newline included. */
export function encodeStreamEvent(event: DiagnosisStreamEvent): string {
  return JSON.stringify(event) + '\n';
}

/**
 * Server side of the stream. Sends after the client disconnects, or after the
 * stream has failed, are dropped.
 */
export function createDiagnosisStream() {
  const encoder = new TextEncoder();
  let controller: ReadableStreamDefaultController<Uint8Array> | null = null;
  let closed = false;

  const stream = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c;
    },
    cancel() {
      closed = true;
    },
  });

  const send = (event: DiagnosisStreamEvent) => {
    if (closed || !controller) return;
    try {
      controller.enqueue(encoder.encode(encodeStreamEvent(event)));
    } catch (error) {
      closed = true;
      console.warn('[Diagnosis] Dropping stream event:', error);
    }
  };

  const close = () => {
    if (closed || !controller) return;
    closed = true;
    try {
      controller.close();
    } catch (error) {
      console.warn('[Diagnosis] Stream already closed:', error);
    }
  };

  return { stream, send, close };
}

export function parseStreamLine(line: string): DiagnosisStreamEvent | null {
  if (!line.trim()) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = StreamEventSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    console.warn(`[Diagnosis] Ignoring stream line: ${issue.path.join('.')}: ${issue.message}`);
    return null;
  }
  return parsed.data;
}

/**
 * Reads a diagnosis stream to the end and returns the result event's payload.
 * Throws on an error event, or when the stream ends without a result.
 */
export async function readDiagnosisStream(
  body: ReadableStream<Uint8Array>,
  onPhase?: (phase: DiagnosisPhase, detail: string) => void
): Promise<Diagnosis> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let result: Diagnosis | null = null;
  let buffer = '';

  const handle = (line: string): Diagnosis | null => {
    const event = parseStreamLine(line);
    if (!event) return null;
    if (event.type === 'error') throw new Error(event.message);
    if (event.type === 'result') return event.data;
    onPhase?.(event.phase, event.detail);
    return null;
  };

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    buffer += decoder.decode(value, { stream: true });
    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';
    for (const line of lines) {
      result = handle(line) ?? result;
    }
  }
  buffer += decoder.decode();
  result = handle(buffer) ?? result;

  if (!result) throw new Error('Diagnosis failed: no result received');
  return result;
}
