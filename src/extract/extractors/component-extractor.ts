import { isComponent, type HostComponent, type HostEntity } from '../../host/types.js';
import { BaseExtractor, type PropertyInputMap, type RelationshipCollector } from '../base-extractor.js';

export class ComponentExtractor extends BaseExtractor<HostComponent> {
  readonly name = 'ComponentExtractor';
  readonly kind = 'component';

  accepts(entity: HostEntity): entity is HostComponent {
    return isComponent(entity);
  }

  protected properties(component: HostComponent): PropertyInputMap {
    return {
      isRoot: component.isRoot,
      partNumber: component.partNumber,
      description: component.description,
      volume: component.volume,
      sketchCount: component.sketches.length,
      featureCount: component.features.length,
      bodyCount: component.bodies.length,
      childCount: component.children.length,
      parameterCount: component.parameters.length,
      constructionGeometryCount: component.constructionGeometry.length,
    };
  }

  protected relate(component: HostComponent, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', component.parentComponent);
  }
}
