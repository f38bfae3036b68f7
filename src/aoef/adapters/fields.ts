/**
 * Field conversions shared by the adapters.
 */

import { Feature } from "../../data/entities.js";

/**
 * Drop empty lists so they are omitted from the document.
 */
export function nonEmpty<T>(items: T[]): T[] | undefined {
  return items.length > 0 ? items : undefined;
}

export function featuresToRecord(features: Feature[]): Record<string, number> | undefined {
  if (features.length === 0) {
    return undefined;
  }
  const map: Record<string, number> = {};
  for (const feature of features) {
    map[feature.name] = feature.value;
  }
  return map;
}

export function featuresFromRecord(map: Record<string, number> | undefined): Feature[] {
  return Object.entries(map ?? {}).map(([name, value]) => new Feature({ name, value }));
}

export function toTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Parse an optional timestamp. Records written without one get the load
 * time.
 */
export function fromTimestamp(value: string | undefined): Date {
  return value !== undefined ? new Date(value) : new Date();
}
