import { z } from 'zod';
import { ConfigError } from './errors.js';

const px = (value: number) => z.number().nonnegative().default(value);
const size = (value: number) => z.number().positive().default(value);

const paint = (fill: string, stroke: string) =>
  z.object({ fill: z.string().min(1).default(fill), stroke: z.string().min(1).default(stroke) }).strict().default({});

const keywords = (values: string[]) => z.array(z.string().trim().min(1)).default(values);

export const ThemeSchema = z.object({
  fontFamily: z.string().min(1).default('Inter, sans-serif'),
  textColor: z.string().min(1).default('#1f2937'),
  labelColor: z.string().min(1).default('#374151'),
  mutedColor: z.string().min(1).default('#6b7280'),
  edgeColor: z.string().min(1).default('#3b82f6'),
  gridColor: z.string().min(1).default('#e5e7eb'),
  lifelineColor: z.string().min(1).default('#9ca3af'),
  terminal: paint('#d1fae5', '#059669'),
  decision: paint('#fef3c7', '#d97706'),
  process: paint('#dbeafe', '#2563eb'),
  state: paint('#dbeafe', '#2563eb'),
  actor: paint('#dbeafe', '#2563eb'),
  entity: paint('#dbeafe', '#2563eb'),
  task: paint('#3b82f6', '#2563eb'),
}).strict();

export const GraphConfigSchema = z.object({
  canvasWidth: size(800),
  columnWidth: size(140),
  nodeWidth: size(120),
  nodeHeight: size(50),
  levelHeight: size(100),
  topMargin: px(40),
  bottomMargin: px(40),
  sideMargin: px(20),
  /** `center` draws edges between node centres; `boundary` trims them at the node border. */
  edgeAnchor: z.enum(['center', 'boundary']).default('center'),
}).strict();

export const EngineConfigSchema = z.object({
  titleHeight: px(40),
  emptyCanvas: z.object({ width: size(200), height: size(100) }).strict().default({}),
  theme: ThemeSchema.default({}),
  graph: GraphConfigSchema.default({}),
  flowchart: z.object({
    terminalKeywords: keywords(['start', 'end']),
    decisionKeywords: keywords(['decision']),
    questionIsDecision: z.boolean().default(true),
  }).strict().default({}),
  state: z.object({
    initialKeywords: keywords([]),
    finalKeywords: keywords([]),
  }).strict().default({}),
  gantt: z.object({
    dayWidth: size(20),
    rowHeight: size(40),
    barHeight: size(28),
    headerHeight: px(40),
    margin: px(20),
    tickDays: z.number().int().positive().default(7),
    labelPadding: px(16),
    minLabelWidth: px(80),
    /** Longest accepted task; longer lines are skipped with a warning. */
    maxDays: z.number().int().positive().default(3650),
    /** Upper bound on axis ticks; the tick step widens in multiples of tickDays to stay under it. */
    maxTicks: z.number().int().positive().default(60),
  }).strict().default({}),
  sequence: z.object({
    margin: px(40),
    laneSpacing: size(150),
    actorWidth: size(100),
    actorHeight: size(40),
    topMargin: px(30),
    messageGap: px(40),
    messageSpacing: size(50),
    selfLoopWidth: px(40),
    bottomMargin: px(30),
  }).strict().default({}),
  class: z.object({
    cellWidth: size(200),
    cellHeight: size(140),
    boxWidth: size(140),
    boxHeight: size(60),
    margin: px(30),
  }).strict().default({}),
}).strict();

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type Theme = EngineConfig['theme'];
export type GraphConfig = EngineConfig['graph'];

/**
 * Validates a (partial) configuration and fills in every default.
 * Throws ConfigError listing each offending path.
 */
export function resolveConfig(input: unknown = {}, source?: string): EngineConfig {
  const res = EngineConfigSchema.safeParse(input ?? {});
  if (!res.success) throw new ConfigError(res.error.issues, source);
  const cfg = res.data;
  if (cfg.graph.nodeWidth > cfg.graph.columnWidth) {
    throw new ConfigError(
      [{ code: 'custom', path: ['graph', 'nodeWidth'], message: 'must not exceed graph.columnWidth' }],
      source
    );
  }
  if (cfg.class.boxWidth > cfg.class.cellWidth || cfg.class.boxHeight > cfg.class.cellHeight) {
    throw new ConfigError(
      [{ code: 'custom', path: ['class'], message: 'entity box must fit inside its grid cell' }],
      source
    );
  }
  return cfg;
}

export const DEFAULT_CONFIG: EngineConfig = resolveConfig();
