import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ActionSummary } from '../types/summary.js';
import type { ElementInfo } from '../types/action-record.js';

export const SUMMARY_FILE = 'summary.md';

export interface SessionReportInfo {
  directory: string;
  sessionId?: string;
  task?: string;
}

/**
 * Write the markdown report of a session next to its logs.
 * Returns the path of the written file.
 */
export async function writeSessionReport(summary: ActionSummary, info: SessionReportInfo): Promise<string> {
  const path = join(info.directory, SUMMARY_FILE);
  await writeFile(path, buildSessionReport(summary, info), 'utf-8');
  return path;
}

export function buildSessionReport(summary: ActionSummary, info: SessionReportInfo): string {
  const lines: string[] = ['# Session Summary'];

  if (info.sessionId) lines.push(`- Session: ${info.sessionId}`);
  lines.push(`- Log directory: ${info.directory}`);
  if (info.task) lines.push(`- Task: ${info.task.split('\n')[0]}`);
  lines.push(`- Result: ${overallResult(summary)}`);
  lines.push(`- Duration: ${formatDuration(summary.totalDurationMs)}`);
  lines.push(`- Actions: ${summary.byOutcome.success}/${summary.total} succeeded`);
  lines.push('');

  lines.push('## Actions');
  if (summary.actions.length === 0) {
    lines.push('- No completed actions');
  } else {
    lines.push('| # | Action | Outcome | Duration |');
    lines.push('|---|--------|---------|----------|');
    for (const action of summary.actions) {
      lines.push(`| ${action.sequenceIndex} | ${action.actionType} | ${action.outcome} | ${Math.round(action.durationMs)}ms |`);
    }
  }

  const failures = summary.actions.filter((a) => a.outcome === 'error');
  if (failures.length > 0) {
    lines.push('');
    lines.push('## Errors');
    failures.forEach((failure, i) => {
      lines.push(`${i + 1}. Action ${failure.sequenceIndex} "${failure.actionType}": ${failure.errorDetail ?? 'no details'}`);
    });
  }

  if (summary.incomplete.length > 0) {
    lines.push('');
    lines.push('## Incomplete Actions');
    for (const index of summary.incomplete) {
      lines.push(`- Action ${index} was started but never completed`);
    }
  }

  if (summary.elements.length > 0) {
    lines.push('');
    lines.push('## Elements');
    for (const element of summary.elements) {
      lines.push(`- ${describeElement(element)}`);
    }
  }

  return lines.join('\n') + '\n';
}

function overallResult(summary: ActionSummary): string {
  if (summary.byOutcome.error > 0) return 'Partial Failure';
  if (summary.incomplete.length > 0) return 'Incomplete';
  return 'Success';
}

function describeElement(element: ElementInfo): string {
  const locator = element.cssSelector ?? element.xpath;
  return locator ? `${element.tagName} (${locator})` : element.tagName;
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
