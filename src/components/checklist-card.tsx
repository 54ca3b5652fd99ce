'use client';

import { useState } from 'react';
import { ChevronDown, ChevronRight, Check, AlertTriangle, X } from 'lucide-react';
import type { ChecklistScore, Finding } from '@/lib/types';
import { GradeBadge, getScoreColor } from './score-ring';

interface ChecklistCardProps {
  name: string;
  checklist: ChecklistScore;
  defaultExpanded?: boolean;
  children?: React.ReactNode;
}

function StatusIcon({ status }: { status: Finding['status'] }) {
  if (status === 'pass') {
    return (
      <span className="flex items-center justify-center w-5 h-5 rounded-full bg-score-pass-dim">
        <Check size={11} className="text-score-pass" strokeWidth={3} />
      </span>
    );
  }
  if (status === 'partial') {
    return (
      <span className="flex items-center justify-center w-5 h-5 rounded-full bg-score-warn-dim">
        <AlertTriangle size={11} className="text-score-warn" strokeWidth={2.5} />
      </span>
    );
  }
  return (
    <span className="flex items-center justify-center w-5 h-5 rounded-full bg-score-fail-dim">
      <X size={11} className="text-score-fail" strokeWidth={3} />
    </span>
  );
}

export function ChecklistCard({ name, checklist, defaultExpanded = false, children }: ChecklistCardProps) {
  const [expanded, setExpanded] = useState(defaultExpanded);
  const color = getScoreColor(checklist.percent);
  const failing = checklist.findings.filter(f => f.status !== 'pass').length;

  return (
    <div className={`rounded-xl bg-bg-card overflow-hidden transition-all ${
      expanded ? 'ring-1 ring-border-bright' : 'ring-1 ring-transparent hover:ring-border'
    }`}>
      <button
        onClick={() => setExpanded(!expanded)}
        className="w-full flex items-center gap-4 px-5 py-4 text-left transition-colors hover:bg-bg-elevated/50"
      >
        <GradeBadge grade={checklist.grade} />
        <div className="flex-1 min-w-0">
          <div className="flex items-center gap-2.5">
            <h3 className="font-semibold text-text text-[15px] truncate">{name}</h3>
            {failing > 0 && (
              <span className="text-[10px] text-text-muted shrink-0">{failing} to fix</span>
            )}
          </div>
          <div className="flex items-center gap-3 mt-2">
            <div className="flex-1 h-1 bg-track rounded-full overflow-hidden">
              <div
                className="h-full rounded-full transition-all duration-1000"
                style={{ width: `${checklist.percent}%`, background: color }}
              />
            </div>
            <span className="text-xs font-mono text-text-secondary tabular-nums">
              {checklist.score}/{checklist.maxScore}
            </span>
          </div>
        </div>
        <span className="text-text-muted ml-1">
          {expanded ? <ChevronDown size={16} /> : <ChevronRight size={16} />}
        </span>
      </button>

      {expanded && (
        <div className="border-t border-border px-5 py-4 space-y-1.5" style={{ animation: 'fadeIn 0.2s ease-out' }}>
          {children}
          {checklist.findings.map(finding => (
            <div key={finding.check} className="flex items-start gap-3 py-2 px-3 rounded-lg hover:bg-bg-elevated/30 transition-colors">
              <span className="mt-0.5 shrink-0">
                <StatusIcon status={finding.status} />
              </span>
              <div className="min-w-0 flex-1">
                <div className="flex items-center gap-2">
                  <span className="text-sm font-medium text-text">{finding.check}</span>
                  <span className="text-[11px] font-mono text-text-muted tabular-nums">{finding.points}/{finding.maxPoints}</span>
                </div>
                <p className="text-xs text-text-secondary mt-0.5 leading-relaxed">{finding.details}</p>
                {finding.recommendation && (
                  <p className="text-xs text-accent-light mt-1 leading-relaxed">{finding.recommendation}</p>
                )}
              </div>
            </div>
          ))}
        </div>
      )}
    </div>
  );
}
