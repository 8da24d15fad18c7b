import type { Box, Canvas, Point, TitleLayout } from '../core/types.js';

export type RelationshipKind = 'composition' | 'aggregation';

export interface ClassEntity {
  name: string;
}

export interface ClassRelationship {
  /** Entity on the left of the operator; carries the diamond. */
  owner: number;
  member: number;
  kind: RelationshipKind;
}

export interface ClassModel {
  entities: ClassEntity[];
  relationships: ClassRelationship[];
}

export interface ClassLayoutEntity extends Box {
  index: number;
  name: string;
  column: number;
  row: number;
}

export interface ClassLayoutRelationship {
  owner: number;
  member: number;
  kind: RelationshipKind;
  /** Point on the owner's border. */
  from: Point;
  /** Point on the member's border. */
  to: Point;
  self: boolean;
}

export interface ClassLayout extends Canvas {
  title?: TitleLayout;
  columns: number;
  rows: number;
  entities: ClassLayoutEntity[];
  relationships: ClassLayoutRelationship[];
}
