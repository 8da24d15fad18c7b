import { isValid, parseISO } from 'date-fns';
import { firstToken } from '../core/cst.js';
import { DEFAULT_CONFIG } from '../core/config.js';
import type { LineShape } from '../core/diagnostics.js';
import { warningAtToken } from '../core/errorBuilder.js';
import { parseLines } from '../core/pipeline.js';
import type { Diagnostic, ParseResult } from '../core/types.js';
import { Duration, IsoDate, TaskName, tokenize } from '../diagrams/gantt/lexer.js';
import { parse } from '../diagrams/gantt/parser.js';
import type { GanttModel, GanttTask } from './gantt-types.js';

export const GANTT_LINE: LineShape = {
  code: 'GA-MALFORMED-LINE',
  label: 'gantt',
  expected: 'Task name [YYYY-MM-DD] : Nd',
};

export interface GanttLimits {
  maxDays: number;
}

export function buildGanttModel(text: string, limits: GanttLimits = DEFAULT_CONFIG.gantt): ParseResult<GanttModel> {
  const { lines, diagnostics } = parseLines(text, { shape: GANTT_LINE, tokenize, parse });
  const tasks: GanttTask[] = [];
  const rejected: Diagnostic[] = [];

  for (const { line, cst } of lines) {
    const dateTok = firstToken(cst, IsoDate);
    const durationTok = firstToken(cst, Duration);
    if (!dateTok || !durationTok) continue;

    // parseISO rejects impossible days such as 2024-02-30
    if (!isValid(parseISO(dateTok.image))) {
      rejected.push(
        warningAtToken(dateTok, line.number, 'GA-INVALID-DATE', `"${dateTok.image}" is not a calendar date; the line was skipped`)
      );
      continue;
    }
    const durationDays = Number.parseInt(durationTok.image.slice(0, -1), 10);
    if (!Number.isSafeInteger(durationDays) || durationDays < 1) {
      rejected.push(
        warningAtToken(durationTok, line.number, 'GA-INVALID-DURATION', 'Task duration must be at least 1 day; the line was skipped', {
          hint: 'Use a whole number of days followed by "d", e.g. 3d',
        })
      );
      continue;
    }
    if (durationDays > limits.maxDays) {
      rejected.push(
        warningAtToken(durationTok, line.number, 'GA-INVALID-DURATION', `Task duration exceeds ${limits.maxDays} days; the line was skipped`, {
          hint: 'Raise gantt.maxDays to allow longer tasks',
        })
      );
      continue;
    }

    tasks.push({ name: firstToken(cst, TaskName)?.image ?? '', startDate: dateTok.image, durationDays });
  }

  return { model: { tasks }, diagnostics: [...diagnostics, ...rejected].sort((a, b) => a.line - b.line) };
}
