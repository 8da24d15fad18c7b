import type { Box, Canvas, TitleLayout } from '../core/types.js';

export interface SequenceActor {
  name: string;
  /** Order of first appearance; doubles as the lane index. */
  lane: number;
}

export interface SequenceMessage {
  /** Lane of the sender. */
  from: number;
  /** Lane of the receiver. */
  to: number;
  text: string;
  /** Position in source order. */
  index: number;
}

export interface SequenceModel {
  actors: SequenceActor[];
  messages: SequenceMessage[];
}

export interface SequenceLayoutActor extends Box {
  lane: number;
  name: string;
  centerX: number;
}

export interface SequenceLayoutMessage {
  index: number;
  from: number;
  to: number;
  text: string;
  y: number;
  x1: number;
  x2: number;
  self: boolean;
}

export interface SequenceLayout extends Canvas {
  title?: TitleLayout;
  actors: SequenceLayoutActor[];
  lifelines: Array<{ x: number; y1: number; y2: number }>;
  messages: SequenceLayoutMessage[];
}
