import { NextRequest, NextResponse } from 'next/server';
import { DiagnosisPayloadSchema } from '@/lib/diagnosis/schema';
import { buildDeepAnalysisRequest, generateDeepAnalysis } from '@/lib/analyzers/deep-analysis';

export const runtime = 'nodejs';

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'Invalid request body' }, { status: 400 });
  }

  const parsed = DiagnosisPayloadSchema.safeParse(body);
  if (!parsed.success) {
    const message = parsed.error.issues.map(issue => issue.message).join(', ') || 'Invalid diagnosis payload';
    return NextResponse.json({ error: message }, { status: 400 });
  }

  try {
    const analysis = await generateDeepAnalysis(buildDeepAnalysisRequest(parsed.data.diagnosis));
    return NextResponse.json(analysis);
  } catch (err) {
    console.error('POST /api/deep-analysis error:', err);
    return NextResponse.json({ error: 'Failed to generate deep analysis' }, { status: 500 });
  }
}
