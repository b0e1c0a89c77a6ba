import { scoreTier, type PasswordAnalysis } from '../strength/analyzer.js';
import { MAX_SCORE } from '../strength/const.js';
import { ENTROPY_DECIMALS, REPORT_TIP, REPORT_TITLE } from './const.js';

export interface ReportOptions {
  tips?: boolean;
}

function roundEntropy(bits: number): number {
  const factor = 10 ** ENTROPY_DECIMALS;
  return Math.round(bits * factor) / factor;
}

export function formatReport(analysis: PasswordAnalysis, options: ReportOptions = {}): string[] {
  const lines = [
    REPORT_TITLE,
    `Score         : ${analysis.score}/${MAX_SCORE} (${scoreTier(analysis.score)})`,
    `Entropy       : ~${roundEntropy(analysis.entropyBits).toFixed(ENTROPY_DECIMALS)} bits (approx.)`,
    `Length        : ${analysis.length} chars`,
  ];
  if (analysis.notes.length) lines.push(`Notes         : ${analysis.notes.join(' | ')}`);
  if (options.tips ?? true) lines.push('', REPORT_TIP);
  return lines;
}

export function formatJson(analysis: PasswordAnalysis): string {
  return JSON.stringify({
    score: analysis.score,
    tier: scoreTier(analysis.score),
    entropyBits: roundEntropy(analysis.entropyBits),
    length: analysis.length,
    patterns: analysis.patterns,
    notes: analysis.notes,
  }, null, 2);
}
