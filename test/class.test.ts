import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../src/core/config.js';
import { buildClassModel } from '../src/renderer/class-builder.js';
import { layoutClassDiagram } from '../src/renderer/class-layout.js';

const config = resolveConfig();

describe('class diagram parser', () => {
  it('takes the relationship kind from the operator', () => {
    const { model, diagnostics } = buildClassModel('User |+| Database\nAPI |o| Cache');
    expect(diagnostics).toEqual([]);
    expect(model.entities.map((e) => e.name)).toEqual(['User', 'Database', 'API', 'Cache']);
    expect(model.relationships).toEqual([
      { owner: 0, member: 1, kind: 'composition' },
      { owner: 2, member: 3, kind: 'aggregation' },
    ]);
  });

  it('never infers the kind from entity names', () => {
    const { model } = buildClassModel('Aggregator |+| Portfolio\nComposite |o| Logo');
    expect(model.relationships.map((r) => r.kind)).toEqual(['composition', 'aggregation']);
  });

  it('reuses entities mentioned again', () => {
    const { model } = buildClassModel('Order |+| Line Item\nCustomer |o| Order');
    expect(model.entities.map((e) => e.name)).toEqual(['Order', 'Line Item', 'Customer']);
    expect(model.relationships[1]).toEqual({ owner: 2, member: 0, kind: 'aggregation' });
  });

  it('warns about lines without a relationship operator', () => {
    const { model, diagnostics } = buildClassModel('Foo -> Bar\nA |+| B');
    expect(model.entities.map((e) => e.name)).toEqual(['A', 'B']);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({ line: 1, code: 'CL-MALFORMED-LINE', severity: 'warning' });
  });

  it('warns about an unknown operator', () => {
    const { diagnostics } = buildClassModel('A | B');
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({ line: 1, column: 3, code: 'CL-MALFORMED-LINE' });
  });
});

describe('layoutClassDiagram', () => {
  it('places entities on a ceil(sqrt(n)) grid', () => {
    const { model } = buildClassModel('A |+| B\nC |o| D\nE |+| A');
    const { layout } = layoutClassDiagram(model, config);
    expect([layout.columns, layout.rows]).toEqual([3, 2]);
    expect(layout.entities.map((e) => [e.column, e.row])).toEqual([
      [0, 0],
      [1, 0],
      [2, 0],
      [0, 1],
      [1, 1],
    ]);
    const fifth = layout.entities[4];
    expect(fifth && [fifth.x, fifth.y]).toEqual([260, 210]);
    expect([layout.width, layout.height]).toEqual([660, 340]);
  });

  it('trims relationship lines at the box borders', () => {
    const { model } = buildClassModel('A |+| B');
    const { layout } = layoutClassDiagram(model, config);
    expect(layout.relationships).toEqual([
      { owner: 0, member: 1, kind: 'composition', from: { x: 200, y: 100 }, to: { x: 260, y: 100 }, self: false },
    ]);
  });

  it('draws a relationship to itself as a loop', () => {
    const { model } = buildClassModel('Node |o| Node');
    const { layout } = layoutClassDiagram(model, config);
    expect(layout.relationships[0]).toMatchObject({ self: true, from: { x: 200, y: 85 }, to: { x: 200, y: 115 } });
  });

  it('reports an empty diagram', () => {
    const { layout, diagnostics } = layoutClassDiagram({ entities: [], relationships: [] }, config);
    expect([layout.width, layout.height]).toEqual([200, 100]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({ kind: 'EmptyDiagram', severity: 'info' });
  });
});
