import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Arrow = createToken({ name: 'Arrow', pattern: /->/ });
export const Colon = createToken({ name: 'Colon', pattern: /:/, push_mode: 'message' });
export const ActorName = createToken({ name: 'ActorName', pattern: /(?:[^\s:-]|-(?!>))(?:[^\n\r:-]|-(?!>))*/ });
export const MessageText = createToken({ name: 'MessageText', pattern: /[^\n\r]+/ });

export const allTokens = [WhiteSpace, Arrow, Colon, ActorName, MessageText];

export const SequenceLexer = new Lexer({
  modes: {
    actors: [WhiteSpace, Arrow, Colon, ActorName],
    message: [WhiteSpace, MessageText],
  },
  defaultMode: 'actors',
});

export function tokenize(line: string) {
  return SequenceLexer.tokenize(line);
}
