'use client';

import { Zap, ArrowUp, Clock, AlertTriangle, TrendingUp } from 'lucide-react';
import { CHECKLIST_LABELS, type Recommendation } from '@/lib/types';

const PRIORITY_CONFIG = {
  critical: { color: 'var(--color-score-fail)', icon: AlertTriangle, label: 'Critical' },
  high: { color: 'var(--color-score-caution)', icon: Zap, label: 'High' },
  medium: { color: 'var(--color-score-warn)', icon: ArrowUp, label: 'Medium' },
  low: { color: 'var(--color-accent-light)', icon: Clock, label: 'Low' },
} as const;

const EFFORT_CONFIG = {
  low: { label: 'Quick Win', color: 'var(--color-score-pass)' },
  medium: { label: 'Moderate', color: 'var(--color-score-warn)' },
  high: { label: 'Investment', color: 'var(--color-score-caution)' },
} as const;

export function RecommendationCard({ rec }: { rec: Recommendation }) {
  const p = PRIORITY_CONFIG[rec.priority];
  const e = EFFORT_CONFIG[rec.effort];
  const Icon = p.icon;

  return (
    <div className="rounded-xl bg-bg-card p-5 hover:bg-bg-elevated/50 transition-all ring-1 ring-transparent hover:ring-border">
      <div className="flex items-start gap-4">
        <div
          className="shrink-0 w-9 h-9 rounded-lg flex items-center justify-center"
          style={{ background: `color-mix(in srgb, ${p.color} 8%, transparent)` }}
        >
          <Icon size={16} style={{ color: p.color }} />
        </div>
        <div className="flex-1 min-w-0">
          <div className="flex items-center gap-2 flex-wrap mb-1.5">
            <span
              className="text-[9px] font-bold px-2 py-0.5 rounded-full uppercase tracking-widest"
              style={{ background: `color-mix(in srgb, ${p.color} 8%, transparent)`, color: p.color }}
            >
              {p.label}
            </span>
            <span className="text-[9px] font-bold px-2 py-0.5 rounded-full uppercase tracking-widest bg-accent-dim text-accent-light">
              {CHECKLIST_LABELS[rec.checklist]}
            </span>
            <span
              className="text-[9px] font-bold px-2 py-0.5 rounded-full uppercase tracking-widest"
              style={{ background: `color-mix(in srgb, ${e.color} 6%, transparent)`, color: e.color }}
            >
              {e.label}
            </span>
          </div>
          <h3 className="font-semibold text-text text-[15px] leading-snug">{rec.title}</h3>
          <p className="text-sm text-text-secondary mt-1.5 leading-relaxed">{rec.description}</p>
          <div className="mt-3 flex items-center gap-2 text-[11px] text-text-muted">
            <TrendingUp size={12} className="text-score-pass" />
            <span>{rec.check}: up to +{rec.pointsAvailable} pts</span>
          </div>
        </div>
      </div>
    </div>
  );
}
