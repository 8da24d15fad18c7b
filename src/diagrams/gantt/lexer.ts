import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
// The first `[` ends the task name; the rest of the line is the schedule.
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/, push_mode: 'schedule' });
export const RBracket = createToken({ name: 'RBracket', pattern: /\]/ });
export const Colon = createToken({ name: 'Colon', pattern: /:/ });
export const TaskName = createToken({ name: 'TaskName', pattern: /[^\s\[](?:[^\[\n\r]*[^\s\[])?/ });
export const Text = createToken({ name: 'Text', pattern: /[^\s\[\]:](?:[^\[\]:\n\r]*[^\s\[\]:])?/ });
export const IsoDate = createToken({ name: 'IsoDate', pattern: /\d{4}-\d{2}-\d{2}/, longer_alt: Text });
export const Duration = createToken({ name: 'Duration', pattern: /\d+d/, longer_alt: Text });

export const allTokens = [WhiteSpace, LBracket, RBracket, Colon, IsoDate, Duration, Text, TaskName];

export const GanttLexer = new Lexer({
  modes: {
    name: [WhiteSpace, LBracket, TaskName],
    schedule: [WhiteSpace, LBracket, RBracket, Colon, IsoDate, Duration, Text],
  },
  defaultMode: 'name',
});

export function tokenize(line: string) {
  return GanttLexer.tokenize(line);
}
