import { NextRequest } from 'next/server';
import { DiagnosisRequestSchema } from '@/lib/diagnosis/schema';
import { createDefaultDeps, runDiagnosis, type DiagnosisDeps } from '@/lib/diagnosis/run';
import { createDiagnosisStream, encodeStreamEvent } from '@/lib/diagnosis/stream';
import { describeError } from '@/lib/errors';

export const runtime = 'nodejs';

const STREAM_HEADERS = {
  'Content-Type': 'application/x-ndjson',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
};

function errorResponse(message: string, status: number) {
  return new Response(encodeStreamEvent({ type: 'error', message }), { status, headers: STREAM_HEADERS });
}

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return errorResponse('Invalid request body', 400);
  }

  const parsed = DiagnosisRequestSchema.safeParse(body);
  if (!parsed.success) {
    return errorResponse(parsed.error.issues.map(i => i.message).join(', ') || 'Invalid input', 400);
  }

  const input = parsed.data;

  let deps: DiagnosisDeps;
  try {
    deps = createDefaultDeps();
  } catch (error) {
    console.error('POST /api/diagnose config error:', error);
    return errorResponse(describeError(error), 500);
  }

  const { stream, send, close } = createDiagnosisStream();
  const streamingDeps: DiagnosisDeps = {
    ...deps,
    onPhase: (phase, detail) => send({ type: 'phase', phase, detail }),
  };

  const work = async () => {
    try {
      const diagnosis = await runDiagnosis(input, streamingDeps);
      send({ type: 'result', data: diagnosis });
    } catch (error) {
      console.error('POST /api/diagnose error:', error);
      send({ type: 'error', message: describeError(error) });
    } finally {
      close();
    }
  };
  void work();

  return new Response(stream, { headers: STREAM_HEADERS });
}
