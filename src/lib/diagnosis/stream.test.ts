import { describe, expect, it, vi } from 'vitest';
import { makeDiagnosis } from '@/lib/testing/fixtures';
import { createDiagnosisStream, encodeStreamEvent, parseStreamLine, readDiagnosisStream, type DiagnosisPhase } from './stream';

function streamOf(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      chunks.forEach(chunk => controller.enqueue(encoder.encode(chunk)));
      controller.close();
    },
  });
}

describe('parseStreamLine', () => {
  it('parses phase events and defaults the detail', () => {
    expect(parseStreamLine('{"type":"phase","phase":"ranking"}')).toEqual({ type: 'phase', phase: 'ranking', detail: '' });
  });

  it('ignores blank, malformed and unknown lines', () => {
    expect(parseStreamLine('   ')).toBeNull();
    expect(parseStreamLine('{"type":"phase"')).toBeNull();
    expect(parseStreamLine('{"type":"phase","phase":"sleeping"}')).toBeNull();
  });
});

describe('readDiagnosisStream', () => {
  it('reports phases and returns the result, across chunk boundaries', async () => {
    const diagnosis = makeDiagnosis();
    const body = encodeStreamEvent({ type: 'phase', phase: 'resolving', detail: 'Looking up "golden dumpling"' })
      + encodeStreamEvent({ type: 'phase', phase: 'scoring', detail: 'Scoring checklists' })
      + encodeStreamEvent({ type: 'result', data: diagnosis });
    const phases: Array<[DiagnosisPhase, string]> = [];

    const result = await readDiagnosisStream(
      streamOf([body.slice(0, 17), body.slice(17, 90), body.slice(90)]),
      (phase, detail) => phases.push([phase, detail])
    );

    expect(phases).toEqual([
      ['resolving', 'Looking up "golden dumpling"'],
      ['scoring', 'Scoring checklists'],
    ]);
    expect(result).toEqual(diagnosis);
  });

  it('reads a final line without a trailing newline', async () => {
    const diagnosis = makeDiagnosis();
    const body = JSON.stringify({ type: 'result', data: diagnosis });

    await expect(readDiagnosisStream(streamOf([body]))).resolves.toEqual(diagnosis);
  });

  it('throws the error event message', async () => {
    const body = encodeStreamEvent({ type: 'error', message: 'Could not find a restaurant matching "zzz"' });

    await expect(readDiagnosisStream(streamOf([body]))).rejects.toThrow('Could not find a restaurant matching "zzz"');
  });

  it('throws when the stream ends without a result', async () => {
    const body = encodeStreamEvent({ type: 'phase', phase: 'resolving', detail: '' });

    await expect(readDiagnosisStream(streamOf([body]))).rejects.toThrow('Diagnosis failed: no result received');
  });
});

describe('createDiagnosisStream', () => {
  it('writes events the client reader understands', async () => {
    const diagnosis = makeDiagnosis();
    const { stream, send, close } = createDiagnosisStream();
    const phases: DiagnosisPhase[] = [];

    send({ type: 'phase', phase: 'scoring', detail: 'Scoring checklists' });
    send({ type: 'result', data: diagnosis });
    close();

    await expect(readDiagnosisStream(stream, phase => phases.push(phase))).resolves.toEqual(diagnosis);
    expect(phases).toEqual(['scoring']);
  });

  it('drops events once the client has gone away', async () => {
    const { stream, send, close } = createDiagnosisStream();
    await stream.getReader().cancel();

    expect(() => send({ type: 'error', message: 'Local rank failed' })).not.toThrow();
    expect(() => close()).not.toThrow();
  });

  it('drops events sent after close', async () => {
    const { stream, send, close } = createDiagnosisStream();
    close();
    send({ type: 'result', data: makeDiagnosis() });
    close();

    await expect(readDiagnosisStream(stream)).rejects.toThrow('Diagnosis failed: no result received');
  });

  it('logs a result line that fails validation', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const line = JSON.stringify({ type: 'result', data: { query: 'golden dumpling' } });

    expect(parseStreamLine(line)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
