export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export const LOG_LEVEL_KEYWORDS: Readonly<Record<LogLevel, readonly string[]>> = {
  ERROR: ['error', 'err', 'exception', 'fatal', 'fail'],
  WARN: ['warn', 'warning'],
  INFO: ['info'],
  DEBUG: ['debug', 'trace'],
};

const STEP_HEADER = /^===\s*(.*?)\s*===$/;

export interface LogPage {
  lines: string[];
  pagination: {
    page: number;
    per_page: number;
    total_lines: number;
    total_pages: number;
    has_next: boolean;
    has_prev: boolean;
    start_line: number;
    end_line: number;
  };
}

export interface LogSummary {
  total_lines: number;
  total_steps: number;
  step_names: string[];
  error_lines: number;
  warning_lines: number;
}

export function splitLines(logs: string | null | undefined): string[] {
  return logs ? logs.split('\n') : [];
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_KEYWORDS;
}

/** Case-insensitive substring match; an empty query keeps every line. */
export function filterLogsByText(lines: readonly string[], query: string | null | undefined): string[] {
  if (!query) return [...lines];
  const needle = query.toLowerCase();
  return lines.filter((line) => line.toLowerCase().includes(needle));
}

/**
 * Keep lines mentioning one of the level's keywords. An unrecognised level is used as
 * its own keyword.
 */
export function filterLogsByLevel(lines: readonly string[], level: string | null | undefined): string[] {
  if (!level) return [...lines];
  const upper = level.toUpperCase();
  const keywords = isLogLevel(upper) ? LOG_LEVEL_KEYWORDS[upper] : [level.toLowerCase()];
  return lines.filter((line) => {
    const lower = line.toLowerCase();
    return keywords.some((keyword) => lower.includes(keyword));
  });
}

/** 1-based pages; an out-of-range page is clamped into range. */
export function paginateLogs(lines: readonly string[], page = 1, perPage = 100): LogPage {
  const size = Math.max(1, Math.floor(perPage));
  const totalLines = lines.length;
  const totalPages = Math.ceil(totalLines / size);
  const current = Math.max(1, Math.min(Math.floor(page) || 1, totalPages || 1));
  const start = (current - 1) * size;
  const end = start + size;

  return {
    lines: lines.slice(start, end),
    pagination: {
      page: current,
      per_page: size,
      total_lines: totalLines,
      total_pages: totalPages,
      has_next: current < totalPages,
      has_prev: current > 1,
      start_line: start + 1,
      end_line: Math.min(end, totalLines),
    },
  };
}

export function summarizeExecutionLogs(logs: string | null | undefined): LogSummary {
  const lines = splitLines(logs);
  const summary: LogSummary = {
    total_lines: lines.length,
    total_steps: 0,
    step_names: [],
    error_lines: 0,
    warning_lines: 0,
  };

  for (const line of lines) {
    const header = STEP_HEADER.exec(line.trim());
    if (header) {
      summary.total_steps += 1;
      if (header[1]) summary.step_names.push(header[1]);
      continue;
    }
    const lower = line.toLowerCase();
    if (['error', 'exception', 'fatal'].some((keyword) => lower.includes(keyword))) summary.error_lines += 1;
    else if (LOG_LEVEL_KEYWORDS.WARN.some((keyword) => lower.includes(keyword))) summary.warning_lines += 1;
  }
  return summary;
}
