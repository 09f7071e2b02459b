/**
 * Migration Registry
 *
 * Exports all migrations in order. Add new migrations here.
 *
 * @module
 */

import type { Migration } from "../migration-runner.js";
import { migration as migration001 } from "./001_initial_schema.js";
import { migration as migration002 } from "./002_add_base_stardust.js";
import { migration as migration003 } from "./003_drop_legacy_constraints.js";

/**
 * All registered migrations in version order.
 */
export const migrations: Migration[] = [migration001, migration002, migration003];

/**
 * Gets the latest migration version.
 */
export function getLatestVersion(): number {
  return migrations.at(-1)?.version ?? 0;
}
