import type { EntityType } from '../../store/types';
import type { EntityMetadataTable } from './entity-metadata';
import { logger } from '../logging';

export interface EntityOrderPlan {
  /** Required-reference targets first */
  order: EntityType[];
  /** Type -> types it requires, restricted to the planned set */
  dependencies: Record<EntityType, EntityType[]>;
  /** Types whose required references form a cycle; placed in input order */
  cyclic: EntityType[];
}

/**
 * Order entity types so that every required-reference target precedes its dependants.
 * Same-type edges are ignored. Types caught in a cycle keep their input order.
 */
export function planEntityOrder(
  metadata: EntityMetadataTable,
  types: Iterable<EntityType>,
  external: ReadonlySet<EntityType> = new Set()
): EntityOrderPlan {
  const planned = Array.from(new Set(types)).filter(type => metadata.has(type));
  const inPlan = new Set(planned);
  const dependencies: Record<EntityType, EntityType[]> = {};

  for (const type of planned) {
    dependencies[type] = metadata
      .requiredReferenceTargets(type, external)
      .filter(target => target !== type && inPlan.has(target));
  }

  const order: EntityType[] = [];
  const placed = new Set<EntityType>();
  let progressed = true;

  while (progressed && order.length < planned.length) {
    progressed = false;
    for (const type of planned) {
      if (placed.has(type)) continue;
      if (dependencies[type].every(dep => placed.has(dep))) {
        order.push(type);
        placed.add(type);
        progressed = true;
      }
    }
  }

  const cyclic = planned.filter(type => !placed.has(type));
  if (cyclic.length > 0) {
    logger.warn('Required references form a cycle between entity types', { entityTypes: cyclic });
    order.push(...cyclic);
  }

  return { order, dependencies, cyclic };
}
