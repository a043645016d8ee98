import type { ElementInfo, PropertyChange, PropertyValue } from '../types/action-record.js';

const COMPARED_PROPERTIES = [
  'tagName',
  'textContent',
  'innerText',
  'isVisible',
  'isEnabled',
  'xpath',
  'cssSelector',
] as const;

/**
 * Properties of an element that differ between two snapshots. Scalar
 * properties are compared when both snapshots carry them; attributes are
 * compared over the union of both attribute sets, a missing attribute
 * reading as null.
 */
export function diffElementInfo(before: ElementInfo, after: ElementInfo): Record<string, PropertyChange> {
  const changes: Record<string, PropertyChange> = {};

  for (const key of COMPARED_PROPERTIES) {
    const a: PropertyValue | undefined = before[key];
    const b: PropertyValue | undefined = after[key];
    if (a === undefined || b === undefined) continue;
    if (a !== b) changes[key] = { before: a, after: b };
  }

  const attributeNames = new Set([...Object.keys(before.attributes), ...Object.keys(after.attributes)]);
  for (const name of attributeNames) {
    const a = before.attributes[name] ?? null;
    const b = after.attributes[name] ?? null;
    if (a !== b) changes[`attributes.${name}`] = { before: a, after: b };
  }

  return changes;
}
