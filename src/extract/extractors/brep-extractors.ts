/**
 * BRep topology extractors: bodies, lumps, shells, faces, edges, vertices.
 *
 * Relationships mirror the host's topology as reported; no adjacency is
 * inferred here.
 */

import {
  isBRepBody,
  isBRepEdge,
  isBRepFace,
  isBRepLump,
  isBRepShell,
  isBRepVertex,
  type HostBRepBody,
  type HostBRepEdge,
  type HostBRepFace,
  type HostBRepLump,
  type HostBRepShell,
  type HostBRepVertex,
  type HostEntity,
} from '../../host/types.js';
import { BaseExtractor, type PropertyInputMap, type RelationshipCollector } from '../base-extractor.js';

const BREP_LABELS: readonly string[] = ['BRepEntity'];

export class BRepBodyExtractor extends BaseExtractor<HostBRepBody> {
  readonly name = 'BRepBodyExtractor';
  readonly kind = 'brepBody';
  protected readonly categoryLabels = BREP_LABELS;

  accepts(entity: HostEntity): entity is HostBRepBody {
    return isBRepBody(entity);
  }

  protected properties(body: HostBRepBody): PropertyInputMap {
    return {
      isSolid: body.isSolid,
      isVisible: body.isVisible,
      area: body.area,
      volume: body.volume,
      faceCount: body.faces.length,
      edgeCount: body.edges.length,
      vertexCount: body.vertices.length,
    };
  }

  protected relate(body: HostBRepBody, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', body.parentComponent);
  }
}

export class BRepLumpExtractor extends BaseExtractor<HostBRepLump> {
  readonly name = 'BRepLumpExtractor';
  readonly kind = 'brepLump';
  protected readonly categoryLabels = BREP_LABELS;

  accepts(entity: HostEntity): entity is HostBRepLump {
    return isBRepLump(entity);
  }

  protected properties(lump: HostBRepLump): PropertyInputMap {
    return {
      area: lump.area,
      volume: lump.volume,
      shellCount: lump.shells.length,
    };
  }

  protected relate(lump: HostBRepLump, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', lump.body);
  }
}

/**
 * A shell belongs to its lump, or to the body when the host reports no lump.
 */
export class BRepShellExtractor extends BaseExtractor<HostBRepShell> {
  readonly name = 'BRepShellExtractor';
  readonly kind = 'brepShell';
  protected readonly categoryLabels = BREP_LABELS;

  accepts(entity: HostEntity): entity is HostBRepShell {
    return isBRepShell(entity);
  }

  protected properties(shell: HostBRepShell): PropertyInputMap {
    return {
      isClosed: shell.isClosed,
      isVoid: shell.isVoid,
      area: shell.area,
      volume: shell.volume,
      faceCount: shell.faces.length,
    };
  }

  protected relate(shell: HostBRepShell, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', shell.lump ?? shell.body);
    relationships.toEach('BOUNDED_BY', shell.faces);
  }
}

export class BRepFaceExtractor extends BaseExtractor<HostBRepFace> {
  readonly name = 'BRepFaceExtractor';
  readonly kind = 'brepFace';
  protected readonly categoryLabels = BREP_LABELS;

  accepts(entity: HostEntity): entity is HostBRepFace {
    return isBRepFace(entity);
  }

  protected properties(face: HostBRepFace): PropertyInputMap {
    return {
      surfaceKind: face.surfaceKind,
      area: face.area,
      isParamReversed: face.isParamReversed,
      centroid: face.centroid,
      edgeCount: face.edges.length,
    };
  }

  protected relate(face: HostBRepFace, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', face.body);
    relationships.toEach('BOUNDED_BY', face.edges);
  }
}

export class BRepEdgeExtractor extends BaseExtractor<HostBRepEdge> {
  readonly name = 'BRepEdgeExtractor';
  readonly kind = 'brepEdge';
  protected readonly categoryLabels = BREP_LABELS;

  accepts(entity: HostEntity): entity is HostBRepEdge {
    return isBRepEdge(entity);
  }

  protected properties(edge: HostBRepEdge): PropertyInputMap {
    return {
      curveKind: edge.curveKind,
      length: edge.length,
      isDegenerate: edge.isDegenerate,
      isTolerant: edge.isTolerant,
      tolerance: edge.tolerance,
      faceCount: edge.faces.length,
    };
  }

  protected relate(edge: HostBRepEdge, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', edge.body);
    relationships.to('BOUNDED_BY', edge.startVertex, { role: 'start' });
    relationships.to('BOUNDED_BY', edge.endVertex, { role: 'end' });
    for (const face of edge.faces) {
      relationships.to('SHARES_EDGE', face);
    }
  }
}

export class BRepVertexExtractor extends BaseExtractor<HostBRepVertex> {
  readonly name = 'BRepVertexExtractor';
  readonly kind = 'brepVertex';
  protected readonly categoryLabels = BREP_LABELS;

  accepts(entity: HostEntity): entity is HostBRepVertex {
    return isBRepVertex(entity);
  }

  protected properties(vertex: HostBRepVertex): PropertyInputMap {
    return {
      x: vertex.geometry?.x,
      y: vertex.geometry?.y,
      z: vertex.geometry?.z,
      isTolerant: vertex.isTolerant,
      tolerance: vertex.tolerance,
    };
  }

  protected relate(vertex: HostBRepVertex, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', vertex.body);
  }
}
