import { Logger, TypeRegistry, field } from '@shapecast/core';

export class Point {
  x!: number;
  y!: number;
}

export class Location {
  name!: string;
  at!: Point;
}

export class Route {
  label!: string;
  stops!: Point[];
}

export class Segment {
  from!: Point;
  to!: Point;
}

export class ListNode {
  value!: number;
  next!: ListNode | null;
}

export function createRegistry(): TypeRegistry {
  const registry = new TypeRegistry();
  registry.register(Point, { fields: { x: field.scalar(), y: field.scalar() } });
  registry.register(Location, {
    fields: { name: field.scalar(), at: field.nested(() => Point) },
  });
  registry.register(Route, {
    fields: { label: field.scalar(), stops: field.list(() => Point) },
  });
  registry.register(Segment, {
    fields: { from: field.nested(() => Point), to: field.nested(() => Point) },
  });
  registry.register(ListNode, {
    fields: { value: field.scalar(), next: field.nested(() => ListNode) },
  });
  return registry;
}

/** Logger that keeps JSON records in memory */
export function memoryLogger(level: 'debug' | 'warn' = 'debug') {
  const records: Array<Record<string, unknown>> = [];
  const logger = new Logger({
    level,
    format: 'json',
    write: (line) => {
      records.push(JSON.parse(line));
    },
  });
  return { logger, records };
}
