import { NextRequest, NextResponse } from 'next/server';
import { DiagnosisPayloadSchema } from '@/lib/diagnosis/schema';
import { buildReportFilename, generateDiagnosisReportPdf } from '@/lib/report/pdf-report';

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
    const message = parsed.error.issues.map(issue => issue.message).join(', ') || 'Invalid report payload';
    return NextResponse.json({ error: message }, { status: 400 });
  }

  try {
    const { diagnosis } = parsed.data;
    const pdfBytes = await generateDiagnosisReportPdf(diagnosis);
    const filename = buildReportFilename(diagnosis.place.name || diagnosis.query, diagnosis.diagnosedAt);

    const normalizedBytes = Uint8Array.from(pdfBytes);
    const blob = new Blob([normalizedBytes], { type: 'application/pdf' });

    return new NextResponse(blob, {
      status: 200,
      headers: {
        'Content-Type': 'application/pdf',
        'Content-Disposition': `attachment; filename="${filename}"`,
        'Content-Length': String(pdfBytes.length),
        'Cache-Control': 'no-store',
      },
    });
  } catch (err) {
    console.error('POST /api/report error:', err);
    return NextResponse.json({ error: 'Failed to generate PDF report' }, { status: 500 });
  }
}
