export type StateKind = 'normal' | 'initial' | 'final';

export interface StateNode {
  id: string;
  label: string;
  kind: StateKind;
}

export interface StateTransition {
  source: number;
  target: number;
  /** Event text after the trailing colon, or '' when the line carries none. */
  label: string;
}

export interface StateModel {
  states: StateNode[];
  transitions: StateTransition[];
}
