/**
 * Summary Report
 *
 * Counts by priority and the most frequent matched keywords. Built from the
 * classified table only, so it reflects every run that fed the table.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Priority } from '../../domain/entities/Candidate.js';
import type { CsvRow } from './CsvTable.js';
import { LIST_SEPARATOR, type CandidateColumn } from './CandidateTables.js';

export const SUMMARY_FILE = 'summary.json';
const TOP_KEYWORDS = 10;

const PRIORITIES: readonly Priority[] = ['High', 'Medium', 'Low', 'Unscreened'];

export interface KeywordCount {
  keyword: string;
  count: number;
}

export interface SummaryReport {
  runId: string;
  generatedAt: string;
  totalCandidates: number;
  byPriority: Record<Priority, number>;
  topKeywords: KeywordCount[];
}

export function buildSummary(
  rows: Array<CsvRow<CandidateColumn>>,
  runId: string,
  generatedAt: Date = new Date()
): SummaryReport {
  const byPriority: Record<Priority, number> = { High: 0, Medium: 0, Low: 0, Unscreened: 0 };
  const keywordCounts = new Map<string, number>();

  for (const row of rows) {
    const priority = PRIORITIES.find((p) => p === row.priority);
    if (priority) {
      byPriority[priority]++;
    }

    for (const keyword of row.found_keywords.split(LIST_SEPARATOR)) {
      const key = keyword.trim();
      if (key) {
        keywordCounts.set(key, (keywordCounts.get(key) ?? 0) + 1);
      }
    }
  }

  const topKeywords = [...keywordCounts.entries()]
    .map(([keyword, count]) => ({ keyword, count }))
    .sort((a, b) => b.count - a.count || (a.keyword < b.keyword ? -1 : 1))
    .slice(0, TOP_KEYWORDS);

  return {
    runId,
    generatedAt: generatedAt.toISOString(),
    totalCandidates: rows.length,
    byPriority,
    topKeywords,
  };
}

export async function writeSummary(outputDir: string, summary: SummaryReport): Promise<string> {
  const file = path.join(outputDir, SUMMARY_FILE);
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(file, JSON.stringify(summary, null, 2) + '\n', 'utf-8');
  return file;
}
