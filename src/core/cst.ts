import type { CstElement, CstNode, IToken, TokenType } from 'chevrotain';

function isToken(el: CstElement): el is IToken {
  return 'image' in el;
}

/** Tokens of one type collected directly under a CST node, in source order. */
export function tokensOf(node: CstNode, type: TokenType): IToken[] {
  const children = node.children[type.name] ?? [];
  return children.filter(isToken).sort((a, b) => a.startOffset - b.startOffset);
}

export function firstToken(node: CstNode, type: TokenType): IToken | undefined {
  return tokensOf(node, type)[0];
}

export function hasToken(tokens: IToken[], type: TokenType): boolean {
  return tokens.some((t) => t.tokenType === type);
}
