// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ledgerchat/ai-tools/actions/remote-method`
 * Purpose: Escape hatch for arbitrary whitelisted server methods.
 * Scope: Single contract; effect is state_change since the target method is unknown.
 * Side-effects: IO via capability
 * @public
 */

import { z } from "zod";

import { bindAction } from "../types";

export const CallMethodInputSchema = z
  .object({
    method: z
      .string()
      .min(1)
      .describe(
        "Dotted method path, e.g. 'erpnext.accounts.utils.get_balance_on'"
      ),
    args: z
      .record(z.unknown())
      .optional()
      .describe("Keyword arguments for the method"),
  })
  .passthrough();

export const callMethodAction = bindAction(
  {
    name: "call_method",
    description:
      "Call any whitelisted ERPNext/Frappe server method. Use this for reports, special " +
      "actions, or any API endpoint not covered by other tools.",
    effect: "state_change",
    inputSchema: CallMethodInputSchema,
  },
  (store, input) => store.callRemoteMethod(input.method, input.args ?? {})
);
