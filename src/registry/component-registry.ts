/**
 * Component registry.
 *
 * Index of declared component versions by id. Several versions of one id
 * may coexist; lookups return them in descending precedence so resolution
 * is independent of declaration order.
 */

import { Component, componentKey } from '../domain/component';
import { CompatError, duplicateComponentError } from '../domain/errors';
import { Constraint, satisfies } from '../semver/constraint';
import { formatVersion, sortDescending } from '../semver/parser';

export interface Resolution {
  /** Highest version satisfying the constraint, if any. */
  match?: Component;
  /** Highest declared version of the id, whether or not it matched. */
  latest?: Component;
}

export class ComponentRegistry {
  private byId = new Map<string, Component[]>();
  private keys = new Set<string>();

  constructor(components: Iterable<Component> = []) {
    for (const component of components) {
      this.register(component);
    }
  }

  /** Add a component version. Throws on an exact id@version duplicate. */
  register(component: Component): void {
    const key = componentKey(component);
    if (this.keys.has(key)) {
      throw new CompatError(duplicateComponentError(component.id, formatVersion(component.version)));
    }
    this.keys.add(key);
    const versions = this.byId.get(component.id) ?? [];
    this.byId.set(component.id, sortDescending([...versions, component]));
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  versionsOf(id: string): Component[] {
    return [...(this.byId.get(id) ?? [])];
  }

  latest(id: string): Component | undefined {
    return this.byId.get(id)?.[0];
  }

  resolve(id: string, constraint: string | Constraint): Resolution {
    const versions = this.byId.get(id) ?? [];
    return {
      match: versions.find((component) => satisfies(component.version, constraint)),
      latest: versions[0],
    };
  }

  list(): Component[] {
    return [...this.byId.keys()].sort().flatMap((id) => this.versionsOf(id));
  }

  get size(): number {
    return this.keys.size;
  }
}
