import type { Definition } from './types.js';

/**
 * Liveness is read straight from the provider's usage data. Self-references
 * are already excluded by the provider, and references from files the policy
 * skips still count.
 */
export function isUnused(definition: Definition): boolean {
  return definition.usages.length === 0;
}

export function countUsages(definition: Definition): number {
  return definition.usages.length;
}
