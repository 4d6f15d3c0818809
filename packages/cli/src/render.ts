import type {
  CLIErrorView,
  CategoryCounts,
  SearchOutcome,
} from '@phrasemask/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

// Bullet on the first line, continuation lines aligned under the text
function renderDetail(detail: string, width: number): string {
  const wrapped = wrapText(detail, Math.max(width - 4, 1)).split('\n');
  return wrapped
    .map((line, index) => (index === 0 ? `  - ${line}` : `    ${line}`))
    .join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  lines.push(
    colorize(colorize(view.title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );

  if (view.location) {
    lines.push(wrapText(view.location, width));
  }
  for (const detail of view.details) {
    lines.push(renderDetail(detail, width));
  }
  if (view.workaround) {
    lines.push(wrapText(`Hint: ${view.workaround}`, width));
  }

  return lines.join('\n');
}

/**
 * One-line summary of a search that did not recover a plaintext.
 */
export function renderOutcomeSummary(outcome: SearchOutcome): string {
  if (outcome.state === 'found') {
    return `found after ${outcome.examined} candidates`;
  }
  return `search ${outcome.state}: ${outcome.count} matches in ${outcome.examined} candidates`;
}

export function renderCategoryCounts(counts: CategoryCounts): string {
  return JSON.stringify(counts, null, 2);
}

export function stripAnsi(input: string): string {
  // Simple ANSI escape code stripper
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}
