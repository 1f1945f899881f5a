/**
 * Region/Model Table
 *
 * The default table ships as data/models.json. A replacement file with the
 * same shape can be supplied through config; either way it is validated
 * and frozen before any probe runs.
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import { ConfigError } from "./errors.js";
import type { ModelSpec, ProbePair, RegionModelTable } from "./types.js";

export const DEFAULT_MODELS_FILE = fileURLToPath(new URL("../data/models.json", import.meta.url));

/** e.g. us-west-2, ap-northeast-1, us-gov-west-1 */
export const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

// ============================================
// LOADING
// ============================================

export function loadRegionModelTable(filePath: string = DEFAULT_MODELS_FILE): RegionModelTable {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (e) {
    throw new ConfigError(`Cannot read model table ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Model table ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  return parseRegionModelTable(raw, filePath);
}

/**
 * Validate `{ "<region>": [{ "id": "...", "name": "..." }] }` and build an
 * immutable table. Key and entry order are kept as declared.
 */
export function parseRegionModelTable(raw: unknown, source = "model table"): RegionModelTable {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${source}: expected an object keyed by region`);
  }

  const table = new Map<string, readonly ModelSpec[]>();

  for (const [region, entries] of Object.entries(raw)) {
    if (!REGION_PATTERN.test(region)) {
      throw new ConfigError(`${source}: "${region}" is not a region identifier`);
    }
    if (!Array.isArray(entries)) {
      throw new ConfigError(`${source}: models for ${region} must be an array`);
    }

    // Result keys are "{name} @ {region}", so names must be unique per region
    const names = new Set<string>();
    const models = entries.map((entry: unknown, i: number): ModelSpec => {
      if (typeof entry !== "object" || entry === null) {
        throw new ConfigError(`${source}: ${region}[${i}] must be an object`);
      }
      const id: unknown = Reflect.get(entry, "id");
      const name: unknown = Reflect.get(entry, "name");
      if (typeof id !== "string" || !id.trim()) {
        throw new ConfigError(`${source}: ${region}[${i}].id must be a non-empty string`);
      }
      if (typeof name !== "string" || !name.trim()) {
        throw new ConfigError(`${source}: ${region}[${i}].name must be a non-empty string`);
      }
      if (names.has(name)) {
        throw new ConfigError(`${source}: duplicate model name "${name}" in ${region}`);
      }
      names.add(name);
      return Object.freeze({ id, displayName: name });
    });

    table.set(region, Object.freeze(models));
  }

  return table;
}

// ============================================
// QUERIES
// ============================================

/** Restrict a table to the given regions, keeping the table's own order. */
export function selectRegions(table: RegionModelTable, regions?: readonly string[]): RegionModelTable {
  if (!regions || regions.length === 0) return table;

  const unknown = regions.filter(r => !table.has(r));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown region(s): ${unknown.join(", ")} (table has ${[...table.keys()].join(", ")})`);
  }

  const selected = new Map<string, readonly ModelSpec[]>();
  for (const [region, models] of table) {
    if (regions.includes(region)) selected.set(region, models);
  }
  return selected;
}

export function resultKey(model: ModelSpec, region: string): string {
  return `${model.displayName} @ ${region}`;
}

export function listPairs(table: RegionModelTable): ProbePair[] {
  const pairs: ProbePair[] = [];
  for (const [region, models] of table) {
    for (const model of models) {
      pairs.push({ key: resultKey(model, region), region, model });
    }
  }
  return pairs;
}

export function countModels(table: RegionModelTable): number {
  let count = 0;
  for (const models of table.values()) count += models.length;
  return count;
}
