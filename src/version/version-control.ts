/**
 * Version Control
 *
 * Optimistic concurrency through the model's version attribute: every write
 * is conditioned on the version the caller last saw, and moves it forward.
 */

import type { AttributeMap } from '../attributes/index.js';
import { and } from '../expressions/index.js';
import type { Condition, UpdateAction } from '../expressions/index.js';
import type { Schema } from '../schema/index.js';

/**
 * Version handling for one write
 */
export interface VersionPlan {
  /** Condition the store must satisfy; absent when no version is held */
  condition?: Condition;
  /** Stored version the condition checks for */
  expectedVersion?: number;
  /** Version the item carries after the write */
  nextVersion?: number;
  /** SET action moving the version forward (updates only) */
  action?: UpdateAction;
}

const NO_VERSION: VersionPlan = Object.freeze({});

/**
 * Version currently held by the item, if any
 */
export function versionOf(schema: Schema<AttributeMap>, item: object): number | undefined {
  if (!schema.version) {
    return undefined;
  }
  const value: unknown = Reflect.get(item, schema.version.name);
  return typeof value === 'number' ? value : undefined;
}

/**
 * Plan for a put. A first save writes version 1 unconditionally; a save over
 * a held version requires the stored item to exist with that version.
 *
 * @example
 * ```typescript
 * // item.version === 3
 * planSave(schema, item);
 * // condition: (attribute_exists(version)) AND (version = 3), nextVersion: 4
 * ```
 */
export function planSave(schema: Schema<AttributeMap>, item: object): VersionPlan {
  const attribute = schema.version;
  if (!attribute) {
    return NO_VERSION;
  }
  const stored = versionOf(schema, item);
  if (stored === undefined) {
    return { nextVersion: 1 };
  }
  return {
    condition: and(attribute.exists(), attribute.eq(stored)),
    expectedVersion: stored,
    nextVersion: stored + 1,
  };
}

/**
 * Plan for an update: `version = stored` plus `SET version = stored + 1`
 */
export function planUpdate(schema: Schema<AttributeMap>, item: object): VersionPlan {
  const attribute = schema.version;
  if (!attribute) {
    return NO_VERSION;
  }
  const stored = versionOf(schema, item);
  const nextVersion = (stored ?? 0) + 1;
  return {
    condition: stored === undefined ? attribute.notExists() : attribute.eq(stored),
    expectedVersion: stored,
    nextVersion,
    action: attribute.set(nextVersion),
  };
}

/**
 * Plan for a delete: `version = stored` when a version is held
 */
export function planDelete(schema: Schema<AttributeMap>, item: object): VersionPlan {
  const attribute = schema.version;
  const stored = versionOf(schema, item);
  if (!attribute || stored === undefined) {
    return NO_VERSION;
  }
  return { condition: attribute.eq(stored), expectedVersion: stored };
}

/**
 * Records the version a successful write produced on the in-memory item
 */
export function applyVersion(schema: Schema<AttributeMap>, item: object, plan: VersionPlan): void {
  if (schema.version && plan.nextVersion !== undefined) {
    Reflect.set(item, schema.version.name, plan.nextVersion);
  }
}
