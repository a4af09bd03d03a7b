// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ledgerchat/ai-tools/schema`
 * Purpose: Compile action contracts (Zod) to ActionDefinitions (JSON Schema) for wire formats.
 * Scope: Schema compilation only. Does not execute actions or touch IO.
 * Invariants:
 *   - NO_MANUAL_SCHEMA_DUPLICATION: JSON Schema derived from Zod, never hand-written
 *   - parameters.type is always "object"; the $schema key is stripped
 * Side-effects: none
 * Links: catalog.ts, types.ts
 * @public
 */

import { zodToJsonSchema } from "zod-to-json-schema";

import type { ActionCatalog } from "./catalog";
import type { ActionDefinition, BoundAction, JsonSchemaObject } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Compile one bound action to its wire definition.
 */
export function toActionDefinition(action: BoundAction): ActionDefinition {
  const compiled: unknown = zodToJsonSchema(action.inputSchema, {
    $refStrategy: "none",
  });

  const keywords: Record<string, unknown> = isRecord(compiled)
    ? { ...compiled }
    : {};
  delete keywords.$schema;

  const parameters: JsonSchemaObject = { ...keywords, type: "object" };

  return {
    name: action.name,
    description: action.description,
    parameters,
  };
}

/**
 * Compile a whole catalog in registration order.
 */
export function catalogToDefinitions(
  catalog: ActionCatalog
): readonly ActionDefinition[] {
  return Object.freeze(Object.values(catalog).map(toActionDefinition));
}
