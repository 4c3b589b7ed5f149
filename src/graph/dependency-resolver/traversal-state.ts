/**
 * Cascade Traversal State
 *
 * Visited set and frontier bookkeeping for one breadth-first cascade.
 * Objects are keyed by schema-qualified name; the first discovery wins.
 */

import { objectKey, SchemaObject } from '../../database/models';

export class CascadeTraversalState {
  private visited = new Map<string, SchemaObject>();
  private nextFrontier: SchemaObject[] = [];

  constructor(root: SchemaObject) {
    this.visited.set(objectKey(root), root);
  }

  /**
   * Record an edge endpoint. Returns true when the object is new and has
   * been queued for the next level.
   */
  discover(object: SchemaObject): boolean {
    const key = objectKey(object);
    if (this.visited.has(key)) {
      return false;
    }

    this.visited.set(key, object);
    this.nextFrontier.push(object);
    return true;
  }

  /**
   * Hand over the objects discovered since the last call and start a new
   * frontier.
   */
  takeFrontier(): SchemaObject[] {
    const frontier = this.nextFrontier;
    this.nextFrontier = [];
    return frontier;
  }

  getVisited(): SchemaObject[] {
    return Array.from(this.visited.values());
  }
}
