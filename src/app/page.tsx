'use client';

import { useRef, useState } from 'react';
import {
  Search, Loader2, MapPin, Store, BarChart3, Sparkles, ArrowRight,
  AlertTriangle, RotateCcw, SlidersHorizontal, Utensils,
} from 'lucide-react';
import Link from 'next/link';
import type { Diagnosis } from '@/lib/types';
import { DIAGNOSIS_PHASES, readDiagnosisStream, type DiagnosisPhase } from '@/lib/diagnosis/stream';
import { getErrorGuidance } from '@/lib/diagnosis/guidance';
import { ThemeToggle } from '@/components/theme-toggle';
import { DiagnosisResultsView } from '@/components/diagnosis-results';

type PagePhase = 'idle' | DiagnosisPhase | 'done' | 'error';

const PHASE_LABELS: Record<DiagnosisPhase, { label: string; desc: string }> = {
  resolving: { label: 'Listing', desc: 'Finding the business' },
  competitors: { label: 'Competitors', desc: 'Scanning nearby places' },
  ranking: { label: 'Local rank', desc: 'Checking search results' },
  crawling: { label: 'Website', desc: 'Reading site and menus' },
  scoring: { label: 'Scoring', desc: 'Running checklists' },
  'deep-analysis': { label: 'AI analysis', desc: 'Writing the summary' },
};

const PIPELINE_STEPS = [
  { icon: Store, title: 'Find the listing', desc: 'Name or address resolves to a Google Business Profile' },
  { icon: MapPin, title: 'Map the area', desc: 'Nearby competitors and local search position' },
  { icon: Utensils, title: 'Read the menus', desc: 'Website, dine-in menu and delivery storefront' },
  { icon: BarChart3, title: 'Score and advise', desc: 'Four checklists, revenue estimate and fixes' },
];

function optionalNumber(value: string): number | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : undefined;
}

export default function Home() {
  const [query, setQuery] = useState('');
  const [keyword, setKeyword] = useState('restaurant');
  const [deliveryUrl, setDeliveryUrl] = useState('');
  const [averageOrderValue, setAverageOrderValue] = useState('');
  const [includeDeepAnalysis, setIncludeDeepAnalysis] = useState(false);
  const [optionsOpen, setOptionsOpen] = useState(false);
  const [phase, setPhase] = useState<PagePhase>('idle');
  const [phaseDetail, setPhaseDetail] = useState('');
  const [diagnosis, setDiagnosis] = useState<Diagnosis | null>(null);
  const [error, setError] = useState('');
  const resultsRef = useRef<HTMLDivElement>(null);

  const isLoading = phase !== 'idle' && phase !== 'done' && phase !== 'error';
  const visiblePhases = DIAGNOSIS_PHASES.filter(p => includeDeepAnalysis || p !== 'deep-analysis');

  const handleDiagnose = async () => {
    if (query.trim().length < 3) return;

    setPhase('resolving');
    setPhaseDetail('');
    setError('');
    setDiagnosis(null);

    try {
      const response = await fetch('/api/diagnose', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          query: query.trim(),
          keyword: keyword.trim() || undefined,
          deliveryUrl: deliveryUrl.trim() || undefined,
          averageOrderValue: optionalNumber(averageOrderValue),
          includeDeepAnalysis,
        }),
      });
      if (!response.body) throw new Error('No response body');

      const result = await readDiagnosisStream(response.body, (p, detail) => {
        setPhase(p);
        setPhaseDetail(detail);
      });

      setPhase('done');
      setPhaseDetail('');
      setDiagnosis(result);
      setTimeout(() => {
        resultsRef.current?.scrollIntoView({ behavior: 'smooth', block: 'start' });
      }, 300);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Diagnosis failed');
      setPhase('error');
    }
  };

  return (
    <div className="min-h-screen flex flex-col">
      {/* ── Sticky Nav ─────────────────────────────────────────────────── */}
      <nav
        className="sticky top-0 z-50 backdrop-blur-xl border-b border-border"
        style={{ backgroundColor: 'var(--nav-bg)' }}
      >
        <div className="max-w-6xl mx-auto px-6 flex items-center justify-between h-16">
          <Link href="/" className="flex items-center gap-3">
            <div className="w-8 h-8 rounded-lg bg-gradient-to-br from-accent to-accent-light flex items-center justify-center">
              <Utensils size={16} className="text-white" />
            </div>
            <span className="text-base font-bold tracking-tight">Dinerscope</span>
          </Link>
          <ThemeToggle />
        </div>
      </nav>

      {/* ── Hero ───────────────────────────────────────────────────────── */}
      <header className="relative overflow-hidden">
        <div className="absolute inset-0 dot-grid opacity-50" />

        <div className={`relative max-w-5xl mx-auto px-6 ${diagnosis ? 'pt-10 pb-10' : 'pt-24 pb-20'}`}>
          <div className="text-center max-w-3xl mx-auto">
            {!diagnosis && (
              <>
                <h1 className="text-5xl sm:text-[60px] font-bold tracking-[-0.03em] leading-[1.1] mb-6">
                  How healthy is your
                  <br />
                  <span
                    className="bg-clip-text text-transparent"
                    style={{ backgroundImage: 'linear-gradient(to right, var(--color-gradient-start), var(--color-gradient-mid), var(--color-gradient-end))' }}
                  >
                    restaurant online?
                  </span>
                </h1>
                <p className="text-[17px] text-text-secondary leading-relaxed mb-12 max-w-xl mx-auto">
                  Check your Google listing, website, menu and delivery pricing against nearby
                  competitors, and see what a weak local ranking may be costing you.
                </p>
              </>
            )}

            {/* Input */}
            <div className="max-w-xl mx-auto">
              <div className="relative flex items-center">
                <div className="absolute left-4 text-text-muted">
                  <Search size={20} />
                </div>
                <input
                  type="text"
                  value={query}
                  onChange={(e) => setQuery(e.target.value)}
                  onKeyDown={(e) => {
                    if (e.key === 'Enter' && !isLoading) void handleDiagnose();
                  }}
                  placeholder="Restaurant name or address"
                  className="w-full h-14 pl-12 pr-40 rounded-xl bg-bg-card border border-border focus:border-accent/50 focus:ring-1 focus:ring-accent/20 outline-none text-text placeholder-text-muted transition-all text-base"
                  disabled={isLoading}
                />
                <div className="absolute right-1.5 flex items-center gap-1.5">
                  <button
                    onClick={() => setOptionsOpen(!optionsOpen)}
                    disabled={isLoading}
                    className="h-11 px-3 rounded-[10px] bg-bg-elevated border border-border text-text-secondary hover:text-text disabled:opacity-40 transition-all flex items-center cursor-pointer"
                    title="Options"
                  >
                    <SlidersHorizontal size={15} />
                  </button>
                  <button
                    onClick={() => void handleDiagnose()}
                    disabled={query.trim().length < 3 || isLoading}
                    className="h-11 px-5 rounded-[10px] bg-accent hover:bg-accent-light disabled:opacity-40 disabled:cursor-not-allowed text-white font-semibold text-[15px] transition-all flex items-center gap-2 analyze-glow cursor-pointer"
                  >
                    {isLoading ? (
                      <Loader2 size={16} className="animate-spin" />
                    ) : (
                      <>
                        <span>Diagnose</span>
                        <ArrowRight size={15} />
                      </>
                    )}
                  </button>
                </div>
              </div>

              {optionsOpen && (
                <div className="mt-4 p-4 rounded-xl bg-bg-card border border-border grid grid-cols-1 sm:grid-cols-2 gap-3 text-left" style={{ animation: 'fadeInUp 0.3s ease-out' }}>
                  <label className="flex flex-col gap-1 text-xs text-text-muted">
                    Search keyword
                    <input
                      value={keyword}
                      onChange={(e) => setKeyword(e.target.value)}
                      placeholder="restaurant"
                      className="h-10 px-3 rounded-lg bg-bg-elevated border border-border outline-none text-sm text-text"
                      disabled={isLoading}
                    />
                  </label>
                  <label className="flex flex-col gap-1 text-xs text-text-muted">
                    Average order value (USD)
                    <input
                      value={averageOrderValue}
                      onChange={(e) => setAverageOrderValue(e.target.value)}
                      inputMode="decimal"
                      placeholder="25"
                      className="h-10 px-3 rounded-lg bg-bg-elevated border border-border outline-none text-sm text-text"
                      disabled={isLoading}
                    />
                  </label>
                  <label className="flex flex-col gap-1 text-xs text-text-muted sm:col-span-2">
                    Delivery storefront URL
                    <input
                      type="url"
                      value={deliveryUrl}
                      onChange={(e) => setDeliveryUrl(e.target.value)}
                      placeholder="https://www.doordash.com/store/..."
                      className="h-10 px-3 rounded-lg bg-bg-elevated border border-border outline-none text-sm text-text"
                      disabled={isLoading}
                    />
                  </label>
                  <label className="flex items-center gap-2 text-sm text-text-secondary sm:col-span-2 cursor-pointer">
                    <input
                      type="checkbox"
                      checked={includeDeepAnalysis}
                      onChange={(e) => setIncludeDeepAnalysis(e.target.checked)}
                      disabled={isLoading}
                    />
                    <Sparkles size={14} className="text-accent-light" />
                    Include AI deep analysis
                  </label>
                </div>
              )}

              {/* Visual stepper */}
              {isLoading && (
                <div className="mt-8 flex flex-wrap items-start justify-center gap-y-4" style={{ animation: 'fadeIn 0.3s ease-out' }}>
                  {visiblePhases.map((p, i) => {
                    const phaseIndex = visiblePhases.findIndex(ph => ph === phase);
                    const isActive = i === phaseIndex;
                    const isDone = i < phaseIndex;

                    return (
                      <div key={p} className="flex items-center">
                        <div className="flex flex-col items-center gap-1.5 w-24">
                          <div
                            className={`w-9 h-9 rounded-lg flex items-center justify-center text-xs font-bold transition-all ${
                              isActive
                                ? 'bg-accent text-white'
                                : isDone
                                ? 'bg-score-pass/20 text-score-pass'
                                : 'bg-bg-card text-text-muted'
                            }`}
                            style={isActive ? { animation: 'stepperPulse 2s ease-in-out infinite' } : {}}
                          >
                            {isDone ? '✓' : i + 1}
                          </div>
                          <div className="text-center">
                            <div className={`text-xs font-medium ${isActive ? 'text-text' : isDone ? 'text-score-pass' : 'text-text-muted'}`}>
                              {PHASE_LABELS[p].label}
                            </div>
                            {isActive && (
                              <div className="text-[11px] text-text-secondary" style={{ animation: 'fadeIn 0.3s ease-out' }}>
                                {phaseDetail || PHASE_LABELS[p].desc}
                              </div>
                            )}
                          </div>
                        </div>
                        {i < visiblePhases.length - 1 && (
                          <div className={`w-6 h-px mt-[-20px] ${isDone ? 'bg-score-pass/30' : 'bg-border'}`} />
                        )}
                      </div>
                    );
                  })}
                </div>
              )}

              {error && (() => {
                const guidance = getErrorGuidance(error);
                return (
                  <div className="mt-5 p-5 rounded-xl bg-bg-card border border-border border-l-4 border-l-danger text-left" style={{ animation: 'fadeInUp 0.3s ease-out' }}>
                    <div className="flex items-start gap-3">
                      <AlertTriangle size={18} className="text-danger shrink-0 mt-0.5" />
                      <div className="flex-1">
                        <h4 className="font-semibold text-text text-[15px]">{guidance.title}</h4>
                        <p className="text-sm text-text-secondary mt-1.5 leading-relaxed">{guidance.suggestion}</p>
                        <p className="text-xs text-text-muted mt-1.5 font-mono">{error}</p>
                        <div className="flex items-center gap-3 mt-4">
                          <button
                            onClick={() => void handleDiagnose()}
                            className="px-4 py-2 rounded-lg bg-accent hover:bg-accent-light text-white text-sm font-medium transition-all cursor-pointer flex items-center gap-1.5"
                          >
                            <RotateCcw size={13} />
                            Try Again
                          </button>
                          <button
                            onClick={() => { setError(''); setPhase('idle'); }}
                            className="px-4 py-2 rounded-lg bg-bg-elevated text-text-secondary hover:text-text text-sm font-medium transition-all cursor-pointer"
                          >
                            Clear
                          </button>
                        </div>
                      </div>
                    </div>
                  </div>
                );
              })()}
            </div>
          </div>
        </div>
      </header>

      {/* ── How it works ──────────────────────────────────────────────── */}
      {!diagnosis && !isLoading && phase !== 'error' && (
        <section id="how-it-works" className="max-w-6xl mx-auto px-6 py-16">
          <h2 className="text-3xl font-bold text-center mb-12 tracking-tight">How it Works</h2>
          <div className="grid grid-cols-2 md:grid-cols-4 gap-8">
            {PIPELINE_STEPS.map((step, i) => (
              <div key={step.title} className="flex flex-col items-center gap-3.5 text-center">
                <div className="relative">
                  <div className="w-16 h-16 rounded-xl border border-accent/20 bg-accent-dim flex items-center justify-center">
                    <step.icon size={24} className="text-accent-light" />
                  </div>
                  <span className="absolute -top-1.5 -right-1.5 w-6 h-6 rounded-full bg-accent text-white text-[11px] font-bold flex items-center justify-center">
                    {i + 1}
                  </span>
                </div>
                <div>
                  <div className="text-[15px] font-semibold text-text">{step.title}</div>
                  <div className="text-sm text-text-secondary mt-1">{step.desc}</div>
                </div>
              </div>
            ))}
          </div>
        </section>
      )}

      {/* ── Results ─────────────────────────────────────────────────────── */}
      {diagnosis && (
        <div ref={resultsRef} className="max-w-6xl w-full mx-auto px-6 pb-24">
          <DiagnosisResultsView key={diagnosis.diagnosedAt} diagnosis={diagnosis} />
        </div>
      )}

      {/* ── Footer ─────────────────────────────────────────────────────── */}
      <footer className="mt-auto border-t border-border py-8 text-center">
        <p className="text-xs text-text-muted">
          &copy; {new Date().getFullYear()} Dinerscope &mdash; Revenue figures are estimates from search volume and typical click-through rates.
        </p>
      </footer>
    </div>
  );
}
