import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Arrow = createToken({ name: 'Arrow', pattern: /->/ });
// Node text runs up to the next arrow; a lone '-' is allowed inside labels.
// Trailing blanks are kept here and trimmed by the model builder.
export const Text = createToken({ name: 'Text', pattern: /(?:[^\s-]|-(?!>))(?:[^\n\r-]|-(?!>))*/ });

export const allTokens = [WhiteSpace, Arrow, Text];

export const FlowchartLexer = new Lexer(allTokens);

export function tokenize(line: string) {
  return FlowchartLexer.tokenize(line);
}
