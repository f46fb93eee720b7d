import { describe, it, expect } from 'vitest';
import { GraphRecordBuilder } from '../record-builder.js';
import type { GraphNodeRecord, GraphRelationshipRecord, RecordBatch } from '../types.js';

function node(stableId: string, properties: GraphNodeRecord['properties'] = {}): GraphNodeRecord {
  return { stableId, label: 'SketchLine', categoryLabels: ['SketchCurve', 'SketchEntity'], properties };
}

function rel(sourceId: string, targetId: string, properties?: GraphRelationshipRecord['properties']): GraphRelationshipRecord {
  return { sourceId, targetId, type: 'BOUNDED_BY', properties };
}

describe('GraphRecordBuilder', () => {
  it('deduplicates identical nodes', () => {
    const builder = new GraphRecordBuilder();
    builder.addNode(node('a', { length: 10 }));
    builder.addNode(node('a', { length: 10 }));

    const batch = builder.flush();
    expect(batch?.nodes).toHaveLength(1);
    expect(builder.stats.duplicateNodes).toBe(1);
    expect(builder.stats.conflictingNodes).toBe(0);
  });

  it('keeps the latest version of a conflicting node', () => {
    const builder = new GraphRecordBuilder();
    builder.addNode(node('a', { length: 10 }));
    builder.addNode(node('a', { length: 12 }));

    expect(builder.flush()?.nodes).toEqual([node('a', { length: 12 })]);
    expect(builder.stats.conflictingNodes).toBe(1);
  });

  it('merges properties of a repeated relationship', () => {
    const builder = new GraphRecordBuilder();
    builder.add({ node: node('a'), relationships: [rel('a', 'b', { role: 'start' })] });
    builder.addRelationship(rel('a', 'b', { sequenceIndex: 0 }));

    expect(builder.flush()?.relationships).toEqual([rel('a', 'b', { role: 'start', sequenceIndex: 0 })]);
    expect(builder.stats.duplicateRelationships).toBe(1);
  });

  it('hands full batches to onBatch with increasing sequence numbers', () => {
    const batches: RecordBatch[] = [];
    const builder = new GraphRecordBuilder({ maxBatchSize: 2, onBatch: batch => batches.push(batch) });

    builder.addNode(node('a'));
    builder.addNode(node('b'));
    builder.addNode(node('c'));
    builder.addRelationship(rel('c', 'a'));

    expect(batches.map(batch => batch.sequence)).toEqual([1, 2]);
    expect(batches[0].nodes.map(n => n.stableId)).toEqual(['a', 'b']);
    expect(batches[1].nodes.map(n => n.stableId)).toEqual(['c']);
    expect(batches[1].relationships).toEqual([rel('c', 'a')]);
    expect(builder.size).toBe(0);
    expect(builder.flush()).toBeNull();
  });

  it('drops records already flushed unless a node changed', () => {
    const builder = new GraphRecordBuilder();
    builder.add({ node: node('a', { length: 1 }), relationships: [rel('a', 'b')] });
    builder.flush();

    builder.addNode(node('a', { length: 1 }));
    builder.addRelationship(rel('a', 'b'));
    expect(builder.size).toBe(0);

    builder.addNode(node('a', { length: 2 }));
    expect(builder.size).toBe(1);
    expect(builder.stats.conflictingNodes).toBe(1);
    expect(builder.hasNode('a')).toBe(true);
  });

  it('reports source entities for relationship-only batches', () => {
    const builder = new GraphRecordBuilder();
    builder.addNode(node('a'));
    builder.flush();
    builder.addRelationship(rel('a', 'b'));
    builder.addRelationship(rel('x', 'b'));

    expect(builder.flush()?.sourceEntities).toEqual([
      { stableId: 'a', label: 'SketchLine' },
      { stableId: 'x', label: 'unknown' },
    ]);
  });

  it('rejects a non-positive batch size', () => {
    expect(() => new GraphRecordBuilder({ maxBatchSize: 0 })).toThrow('maxBatchSize must be a positive integer, got 0');
  });
});
