import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Arrow = createToken({ name: 'Arrow', pattern: /->/ });
// The first colon switches to label mode: everything after it is the event text.
export const Colon = createToken({ name: 'Colon', pattern: /:/, push_mode: 'label' });
export const Text = createToken({ name: 'Text', pattern: /(?:[^\s:-]|-(?!>))(?:[^\n\r:-]|-(?!>))*/ });
export const LabelText = createToken({ name: 'LabelText', pattern: /[^\n\r]+/ });

export const allTokens = [WhiteSpace, Arrow, Colon, Text, LabelText];

export const StateLexer = new Lexer({
  modes: {
    transition: [WhiteSpace, Arrow, Colon, Text],
    label: [WhiteSpace, LabelText],
  },
  defaultMode: 'transition',
});

export function tokenize(line: string) {
  return StateLexer.tokenize(line);
}
