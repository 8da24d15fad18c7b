import type { EngineConfig } from '../core/config.js';
import { infoAt } from '../core/errorBuilder.js';
import { placeTitle, titleOffset } from './geometry.js';
import type { LayoutResult } from './interfaces.js';
import type { SequenceLayout, SequenceLayoutActor, SequenceLayoutMessage, SequenceModel } from './sequence-types.js';

export function layoutSequence(model: SequenceModel, config: EngineConfig, title?: string): LayoutResult<SequenceLayout> {
  const s = config.sequence;
  const offset = titleOffset(title, config.titleHeight);

  if (model.actors.length === 0) {
    const width = config.emptyCanvas.width;
    return {
      layout: { width, height: config.emptyCanvas.height + offset, title: placeTitle(title, width, config.titleHeight), actors: [], lifelines: [], messages: [] },
      diagnostics: [infoAt('EmptyDiagram', 'GEN-EMPTY-DIAGRAM', 'Sequence diagram has no messages; rendering an empty canvas')],
    };
  }

  const top = offset + s.topMargin;
  const actors: SequenceLayoutActor[] = model.actors.map((a) => {
    const x = s.margin + a.lane * s.laneSpacing;
    return { lane: a.lane, name: a.name, x, y: top, width: s.actorWidth, height: s.actorHeight, centerX: x + s.actorWidth / 2 };
  });
  const centerOf = (lane: number) => actors[lane]?.centerX ?? 0;

  const actorBottom = top + s.actorHeight;
  const firstMessageY = actorBottom + s.messageGap;
  const messages: SequenceLayoutMessage[] = model.messages.map((m) => ({
    index: m.index,
    from: m.from,
    to: m.to,
    text: m.text,
    y: firstMessageY + m.index * s.messageSpacing,
    x1: centerOf(m.from),
    x2: centerOf(m.to),
    self: m.from === m.to,
  }));

  const lastY = messages.length ? firstMessageY + (messages.length - 1) * s.messageSpacing : actorBottom;
  const lifelineEnd = lastY + s.messageGap;
  const lifelines = actors.map((a) => ({ x: a.centerX, y1: actorBottom, y2: lifelineEnd }));

  const loopRoom = messages.some((m) => m.self) ? s.selfLoopWidth : 0;
  const width = 2 * s.margin + (actors.length - 1) * s.laneSpacing + s.actorWidth + loopRoom;

  return {
    layout: { width, height: lifelineEnd + s.bottomMargin, title: placeTitle(title, width, config.titleHeight), actors, lifelines, messages },
    diagnostics: [],
  };
}
