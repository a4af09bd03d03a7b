// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ledgerchat/ai-tools/types`
 * Purpose: Core type definitions for action contracts, bound actions and wire definitions.
 * Scope: Defines ActionContract, BoundAction, ActionDefinition. Pure types plus the bindAction helper.
 * Invariants:
 *   - EFFECT_TYPED: every contract declares `effect` (read_only | state_change)
 *   - inputSchema is the source of truth; ActionDefinition.parameters is compiled from it
 *   - Schemas describe, they do not gate: parse failures surface as tool results, never as pre-flight rejects
 * Side-effects: none
 * Links: catalog.ts, schema.ts, capabilities/document-store.ts
 * @public
 */

import type { z } from "zod";

import type {
  ActionEnvelope,
  DocumentStoreCapability,
} from "./capabilities/document-store";

/**
 * Side-effect level of an action.
 */
export type ActionEffect = "read_only" | "state_change";

/**
 * Action contract: schema and description without implementation.
 */
export interface ActionContract<
  TName extends string,
  TSchema extends z.ZodTypeAny,
> {
  /** Stable action name (snake_case) */
  readonly name: TName;
  /** Human-readable description consumed by the model */
  readonly description: string;
  readonly effect: ActionEffect;
  readonly inputSchema: TSchema;
}

/**
 * Runs a validated input against the document store.
 */
export type ActionHandler<TInput> = (
  store: DocumentStoreCapability,
  input: TInput
) => Promise<ActionEnvelope>;

/**
 * Type-erased action held by the catalog.
 * `run` parses raw model arguments with the contract schema, then dispatches.
 */
export interface BoundAction {
  readonly name: string;
  readonly description: string;
  readonly effect: ActionEffect;
  readonly inputSchema: z.ZodTypeAny;
  readonly run: (
    store: DocumentStoreCapability,
    rawArgs: unknown
  ) => Promise<ActionEnvelope>;
}

/**
 * JSON Schema object for action parameters.
 */
export interface JsonSchemaObject {
  readonly type: "object";
  readonly [keyword: string]: unknown;
}

/**
 * Wire contract handed to every provider adapter.
 * Stable across provider swaps.
 */
export interface ActionDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonSchemaObject;
}

/**
 * Bind a contract to its handler.
 * Parsing throws (ZodError) on bad arguments; the executor turns that into a failed tool result.
 */
export function bindAction<TName extends string, TSchema extends z.ZodTypeAny>(
  contract: ActionContract<TName, TSchema>,
  handler: ActionHandler<z.output<TSchema>>
): BoundAction {
  return {
    name: contract.name,
    description: contract.description,
    effect: contract.effect,
    inputSchema: contract.inputSchema,
    run: async (store, rawArgs) => {
      const input: z.output<TSchema> = contract.inputSchema.parse(rawArgs);
      return handler(store, input);
    },
  };
}
