import { tokensOf } from '../core/cst.js';
import type { LineShape } from '../core/diagnostics.js';
import { parseLines } from '../core/pipeline.js';
import type { ParseResult } from '../core/types.js';
import { Composition, EntityName, tokenize } from '../diagrams/class/lexer.js';
import { parse } from '../diagrams/class/parser.js';
import type { ClassEntity, ClassModel, ClassRelationship } from './class-types.js';

export const CLASS_LINE: LineShape = {
  code: 'CL-MALFORMED-LINE',
  label: 'class diagram',
  expected: 'Entity |+| Entity  or  Entity |o| Entity',
};

export function buildClassModel(text: string): ParseResult<ClassModel> {
  const { lines, diagnostics } = parseLines(text, { shape: CLASS_LINE, tokenize, parse });

  const entities: ClassEntity[] = [];
  const relationships: ClassRelationship[] = [];
  const byName = new Map<string, number>();

  const intern = (name: string): number => {
    const known = byName.get(name);
    if (known !== undefined) return known;
    const index = entities.length;
    entities.push({ name });
    byName.set(name, index);
    return index;
  };

  for (const { cst } of lines) {
    const [ownerTok, memberTok] = tokensOf(cst, EntityName);
    if (!ownerTok || !memberTok) continue;
    const owner = intern(ownerTok.image);
    const member = intern(memberTok.image);
    // the operator token alone decides the kind
    const kind = tokensOf(cst, Composition).length > 0 ? 'composition' : 'aggregation';
    relationships.push({ owner, member, kind });
  }

  return { model: { entities, relationships }, diagnostics };
}
