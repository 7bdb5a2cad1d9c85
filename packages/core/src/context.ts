/**
 * Inference trace
 *
 * In-memory log carried by a knowledge base and a game run
 */

export type TraceStage = 'observe' | 'reobserve' | 'pass' | 'move';

export interface TraceEntry {
  stage: TraceStage;
  summary: string;
  durationMs: number;
  timestamp: number;
}

export function addTrace(
  trace: readonly TraceEntry[],
  stage: TraceStage,
  summary: string,
  durationMs: number
): TraceEntry[] {
  return [...trace, { stage, summary, durationMs, timestamp: Date.now() }];
}

export function traceByStage(trace: readonly TraceEntry[], stage: TraceStage): TraceEntry[] {
  return trace.filter(entry => entry.stage === stage);
}

export function formatTrace(trace: readonly TraceEntry[]): string {
  return trace
    .map(entry => `[${entry.stage}] ${entry.summary} (${entry.durationMs.toFixed(2)}ms)`)
    .join('\n');
}
