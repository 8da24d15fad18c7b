import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Composition = createToken({ name: 'Composition', pattern: /\|\+\|/ });
export const Aggregation = createToken({ name: 'Aggregation', pattern: /\|o\|/ });
export const EntityName = createToken({ name: 'EntityName', pattern: /[^\s|](?:[^\n\r|]*[^\s|])?/ });

export const allTokens = [WhiteSpace, Composition, Aggregation, EntityName];

export const ClassLexer = new Lexer(allTokens);

export function tokenize(line: string) {
  return ClassLexer.tokenize(line);
}
