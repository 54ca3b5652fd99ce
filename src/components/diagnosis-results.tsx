'use client';

import { useState } from 'react';
import {
  MapPin, Globe, Phone, Star, ExternalLink, Download, Sparkles, Loader2,
  AlertTriangle, Zap, ArrowUp, Clock, DollarSign, Users, Utensils,
} from 'lucide-react';
import ReactMarkdown from 'react-markdown';
import remarkGfm from 'remark-gfm';
import { renderDeepAnalysisMarkdown } from '@/lib/analyzers/deep-analysis-markdown';
import {
  CHECKLIST_LABELS, RANK_BUCKET_LABELS,
  type ChecklistKey, type DeepAnalysis, type Diagnosis, type Recommendation,
} from '@/lib/types';
import { ScoreRing, StandingLabel } from '@/components/score-ring';
import { ChecklistCard } from '@/components/checklist-card';
import { RecommendationCard } from '@/components/recommendation-card';

const CHECKLIST_ORDER: ChecklistKey[] = ['profile', 'website', 'menu', 'pricing'];

const MARKUP_LABELS = {
  'too-low': 'Below healthy range',
  healthy: 'Healthy',
  'too-high': 'Above healthy range',
  unknown: 'Unknown',
} as const;

function formatMoney(value: number): string {
  return value.toLocaleString('en-US', { style: 'currency', currency: 'USD', maximumFractionDigits: 0 });
}

async function readError(response: Response, fallback: string): Promise<string> {
  const body: unknown = await response.json().catch(() => null);
  if (body && typeof body === 'object' && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return fallback;
}

export function DiagnosisResultsView({ diagnosis }: { diagnosis: Diagnosis }) {
  const [deepAnalysis, setDeepAnalysis] = useState<DeepAnalysis | null>(diagnosis.deepAnalysis);
  const [deepLoading, setDeepLoading] = useState(false);
  const [downloading, setDownloading] = useState(false);
  const [actionError, setActionError] = useState<string | null>(null);

  const { place, checklists } = diagnosis;
  const current: Diagnosis = { ...diagnosis, deepAnalysis };

  const handleDeepAnalysis = async () => {
    setDeepLoading(true);
    setActionError(null);
    try {
      const res = await fetch('/api/deep-analysis', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ diagnosis: current }),
      });
      if (!res.ok) throw new Error(await readError(res, 'Deep analysis failed'));
      const analysis: DeepAnalysis = await res.json();
      setDeepAnalysis(analysis);
    } catch (err) {
      setActionError(err instanceof Error ? err.message : 'Deep analysis failed');
    } finally {
      setDeepLoading(false);
    }
  };

  const handleDownload = async () => {
    setDownloading(true);
    setActionError(null);
    try {
      const res = await fetch('/api/report', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ diagnosis: current }),
      });
      if (!res.ok) throw new Error(await readError(res, 'Report generation failed'));

      const disposition = res.headers.get('Content-Disposition') ?? '';
      const filename = /filename="([^"]+)"/.exec(disposition)?.[1] ?? 'dinerscope-report.pdf';
      const url = URL.createObjectURL(await res.blob());
      const link = document.createElement('a');
      link.href = url;
      link.download = filename;
      link.click();
      URL.revokeObjectURL(url);
    } catch (err) {
      setActionError(err instanceof Error ? err.message : 'Report generation failed');
    } finally {
      setDownloading(false);
    }
  };

  return (
    <div style={{ animation: 'fadeInUp 0.6s ease-out' }}>
      {/* Business bar */}
      <div className="flex flex-col sm:flex-row items-stretch sm:items-center gap-3 mb-6">
        <div className="flex flex-wrap items-center gap-x-4 gap-y-2 px-5 py-3 rounded-xl bg-bg-card border border-border flex-1 min-w-0">
          <h2 className="font-semibold text-text text-base truncate">{place.name || diagnosis.query}</h2>
          {place.formattedAddress && (
            <span className="flex items-center gap-1.5 text-xs text-text-secondary truncate">
              <MapPin size={12} className="shrink-0" /> {place.formattedAddress}
            </span>
          )}
          {place.formattedPhoneNumber && (
            <span className="flex items-center gap-1.5 text-xs text-text-secondary">
              <Phone size={12} /> {place.formattedPhoneNumber}
            </span>
          )}
          {place.website && (
            <a href={place.website} target="_blank" rel="noopener noreferrer" className="flex items-center gap-1.5 text-xs text-accent-light hover:underline truncate">
              <Globe size={12} className="shrink-0" /> {place.website} <ExternalLink size={10} />
            </a>
          )}
          <button
            onClick={handleDownload}
            disabled={downloading}
            className="ml-auto flex items-center gap-1.5 px-3 py-1.5 rounded-md text-xs font-medium border border-border hover:bg-bg-elevated transition-colors cursor-pointer disabled:opacity-50"
          >
            {downloading ? <Loader2 size={13} className="animate-spin" /> : <Download size={13} />}
            PDF report
          </button>
        </div>
        <IssueSummaryBar recommendations={diagnosis.topRecommendations} />
      </div>

      {actionError && (
        <p className="mb-4 text-sm text-score-fail">{actionError}</p>
      )}

      {/* Scores */}
      <div className="grid grid-cols-2 md:grid-cols-5 gap-4 mb-6">
        <div className="col-span-2 md:col-span-1 p-6 rounded-xl bg-bg-card border border-border flex flex-col items-center justify-center">
          <ScoreRing score={diagnosis.overallScore} grade={diagnosis.overallGrade} size={140} label="Overall" />
        </div>
        {CHECKLIST_ORDER.map((key, i) => (
          <div key={key} className="p-5 rounded-xl bg-bg-card border border-border flex flex-col items-center justify-center">
            <ScoreRing
              score={checklists[key].score}
              maxScore={checklists[key].maxScore}
              grade={checklists[key].grade}
              size={100}
              label={CHECKLIST_LABELS[key]}
              delay={150 * (i + 1)}
            />
          </div>
        ))}
      </div>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-5 mb-6">
        <RevenueCard diagnosis={diagnosis} />
        <CompetitorCard diagnosis={diagnosis} />
      </div>

      {/* Recommendations */}
      <section className="mb-6">
        <SectionTitle icon={Zap} title="Recommendations" meta={`${diagnosis.topRecommendations.length} total`} />
        {diagnosis.topRecommendations.length === 0 ? (
          <p className="text-sm text-text-muted">Every check passed.</p>
        ) : (
          <div className="space-y-3">
            {diagnosis.topRecommendations.map((rec, i) => (
              <div key={`${rec.checklist}-${rec.check}`} style={{ animation: `slideInRight 0.3s ease-out ${i * 60}ms both` }}>
                <RecommendationCard rec={rec} />
              </div>
            ))}
          </div>
        )}
      </section>

      {/* Checklists */}
      <section className="mb-6">
        <SectionTitle icon={Utensils} title="Checklists" />
        <div className="space-y-3">
          {CHECKLIST_ORDER.map(key => (
            <ChecklistCard key={key} name={CHECKLIST_LABELS[key]} checklist={checklists[key]}>
              {key === 'menu' && (
                <p className="text-xs text-text-muted px-3 pb-2">
                  {diagnosis.menu.dineInItems.length} dine-in item(s)
                  {diagnosis.menu.menuUrl && <> from <a className="text-accent-light hover:underline" href={diagnosis.menu.menuUrl} target="_blank" rel="noopener noreferrer">{diagnosis.menu.menuUrl}</a></>}
                </p>
              )}
              {key === 'pricing' && (
                <p className="text-xs text-text-muted px-3 pb-2">
                  {diagnosis.menu.deliveryItems.length} delivery item(s)
                  {diagnosis.menu.delivery && <> on {diagnosis.menu.delivery.platform ?? diagnosis.menu.delivery.url}</>}
                  {' '}| markup: {MARKUP_LABELS[checklists.pricing.markupBand]}
                  {checklists.pricing.averageMarkup !== null && ` (${(checklists.pricing.averageMarkup * 100).toFixed(1)}%)`}
                </p>
              )}
            </ChecklistCard>
          ))}
        </div>
      </section>

      {/* Deep analysis */}
      <section className="mb-6">
        <SectionTitle icon={Sparkles} title="Deep Analysis" />
        {deepAnalysis ? (
          <div className="p-7 rounded-xl bg-bg-card border border-border max-w-none text-[15px] leading-relaxed text-text-secondary
              [&_h2]:text-lg [&_h2]:font-bold [&_h2]:text-text [&_h2]:mt-6 [&_h2]:mb-3 [&_h2:first-child]:mt-0
              [&_h3]:text-base [&_h3]:font-semibold [&_h3]:text-text [&_h3]:mt-4 [&_h3]:mb-2
              [&_p]:mb-3 [&_strong]:text-text
              [&_ul]:list-disc [&_ul]:pl-5 [&_ul]:mb-3
              [&_ol]:list-decimal [&_ol]:pl-5 [&_ol]:mb-3
              [&_li]:mb-1.5">
            <ReactMarkdown remarkPlugins={[remarkGfm]}>{renderDeepAnalysisMarkdown(deepAnalysis)}</ReactMarkdown>
          </div>
        ) : (
          <button
            onClick={handleDeepAnalysis}
            disabled={deepLoading}
            className="flex items-center gap-2 px-4 py-2.5 rounded-lg text-sm font-medium bg-accent text-white hover:bg-accent/90 transition-colors cursor-pointer disabled:opacity-50"
          >
            {deepLoading ? <Loader2 size={15} className="animate-spin" /> : <Sparkles size={15} />}
            {deepLoading ? 'Analyzing...' : 'Run deep analysis'}
          </button>
        )}
      </section>

      {diagnosis.warnings.length > 0 && (
        <section className="p-5 rounded-xl bg-bg-card border border-border">
          <SectionTitle icon={AlertTriangle} title="Data gaps" />
          <ul className="space-y-1 text-xs text-text-muted list-disc pl-5">
            {diagnosis.warnings.map(warning => <li key={warning}>{warning}</li>)}
          </ul>
        </section>
      )}
    </div>
  );
}

function SectionTitle({ icon: Icon, title, meta }: { icon: typeof Zap; title: string; meta?: string }) {
  return (
    <div className="flex items-center gap-2.5 mb-4">
      <div className="w-8 h-8 rounded-lg bg-accent-dim flex items-center justify-center">
        <Icon size={16} className="text-accent-light" />
      </div>
      <h3 className="font-semibold text-base">{title}</h3>
      {meta && <span className="ml-auto text-xs text-text-muted">{meta}</span>}
    </div>
  );
}

function IssueSummaryBar({ recommendations }: { recommendations: Recommendation[] }) {
  const items = [
    { priority: 'critical', label: 'Critical', color: 'var(--color-score-fail)', icon: AlertTriangle },
    { priority: 'high', label: 'High', color: 'var(--color-score-caution)', icon: Zap },
    { priority: 'medium', label: 'Medium', color: 'var(--color-score-warn)', icon: ArrowUp },
    { priority: 'low', label: 'Low', color: 'var(--color-accent-light)', icon: Clock },
  ] as const;

  return (
    <div className="flex items-center gap-3.5 px-5 py-3 rounded-xl bg-bg-card border border-border">
      {items.map(item => (
        <div key={item.priority} className="flex items-center gap-1.5">
          <span className="w-2.5 h-2.5 rounded-full" style={{ background: item.color }} />
          <span className="font-mono text-sm font-bold tabular-nums" style={{ color: item.color }}>
            {recommendations.filter(r => r.priority === item.priority).length}
          </span>
          <span className="text-[11px] text-text-muted hidden sm:inline">{item.label}</span>
        </div>
      ))}
    </div>
  );
}

function RevenueCard({ diagnosis }: { diagnosis: Diagnosis }) {
  const { revenue, localRank } = diagnosis;
  return (
    <div className="p-7 rounded-xl bg-bg-card border border-border">
      <SectionTitle icon={DollarSign} title="Estimated revenue impact" />
      <p className="text-3xl font-mono font-bold text-text tabular-nums">
        {formatMoney(revenue.monthlyLoss)}<span className="text-sm text-text-muted font-medium"> / month</span>
      </p>
      <p className="text-xs text-text-muted mt-1">{formatMoney(revenue.annualLoss)} per year, hypothetical</p>
      <dl className="grid grid-cols-2 gap-x-4 gap-y-2 mt-5 text-sm">
        <dt className="text-text-muted">Keyword</dt>
        <dd className="text-text">&ldquo;{localRank.keyword}&rdquo;</dd>
        <dt className="text-text-muted">Local position</dt>
        <dd className="text-text">{localRank.position === null ? 'Not found' : `#${localRank.position}`} ({RANK_BUCKET_LABELS[localRank.bucket]})</dd>
        <dt className="text-text-muted">Search volume</dt>
        <dd className="text-text tabular-nums">{revenue.monthlySearchVolume.toLocaleString('en-US')} / month</dd>
        <dt className="text-text-muted">Lost customers</dt>
        <dd className="text-text tabular-nums">{revenue.lostCustomers} / month</dd>
        <dt className="text-text-muted">Average order</dt>
        <dd className="text-text tabular-nums">{formatMoney(revenue.averageOrderValue)}</dd>
      </dl>
    </div>
  );
}

function CompetitorCard({ diagnosis }: { diagnosis: Diagnosis }) {
  const { reputation, competitors, place } = diagnosis;
  return (
    <div className="p-7 rounded-xl bg-bg-card border border-border">
      <SectionTitle icon={Users} title="Nearby competitors" />
      <div className="flex items-center gap-2 mb-4">
        <StandingLabel status={reputation.status} />
        {reputation.ratingGap !== null && (
          <span className="text-xs text-text-muted">
            Rating {reputation.ratingGap >= 0 ? '+' : ''}{reputation.ratingGap.toFixed(2)} vs median
          </span>
        )}
      </div>
      {competitors.length === 0 ? (
        <p className="text-sm text-text-muted">No nearby competitors found.</p>
      ) : (
        <table className="w-full text-sm">
          <thead>
            <tr className="text-left text-[11px] uppercase tracking-wider text-text-muted">
              <th className="py-1.5 font-medium">Name</th>
              <th className="py-1.5 font-medium text-right">Rating</th>
              <th className="py-1.5 font-medium text-right">Reviews</th>
            </tr>
          </thead>
          <tbody>
            <tr className="border-t border-border font-semibold text-text">
              <td className="py-1.5 truncate">{place.name} (you)</td>
              <td className="py-1.5 text-right tabular-nums">{place.rating?.toFixed(1) ?? '-'}</td>
              <td className="py-1.5 text-right tabular-nums">{place.userRatingsTotal ?? 0}</td>
            </tr>
            {competitors.map(c => (
              <tr key={c.placeId} className="border-t border-border text-text-secondary">
                <td className="py-1.5 truncate">{c.name}</td>
                <td className="py-1.5 text-right tabular-nums">
                  {c.rating === null ? '-' : <span className="inline-flex items-center gap-1"><Star size={11} /> {c.rating.toFixed(1)}</span>}
                </td>
                <td className="py-1.5 text-right tabular-nums">{c.reviews}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
}
