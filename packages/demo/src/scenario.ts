/**
 * @nestlock/demo — Scenario file format.
 *
 * A scenario names starting balances and a list of top-level sessions.
 * Each session is a tree of steps executed inside nested locks; a
 * `lock` step opens a child lock for another (or the same) participant.
 *
 * Amounts are decimal strings scaled by the currency's decimals.
 */

import { z } from "zod";

// =============================================================================
// Steps
// =============================================================================

export type Step =
  | { op: "pay"; currency: string; amount: string }
  | { op: "settle"; currency: string }
  | { op: "take"; currency: string; amount: string; to?: string | undefined }
  | { op: "lock"; owner: string; steps: Step[] }
  | { op: "expectDelta"; currency: string; amount: string; participant?: string | undefined }
  | { op: "fail"; message: string };

const Identifier = z.string().trim().min(1);
const UnsignedAmount = z.string().regex(/^\d+(\.\d+)?$/, "must be an unsigned decimal string");
const SignedAmount = z.string().regex(/^-?\d+(\.\d+)?$/, "must be a decimal string");

export const StepSchema: z.ZodType<Step> = z.lazy(() =>
  z.discriminatedUnion("op", [
    z.object({ op: z.literal("pay"), currency: Identifier, amount: UnsignedAmount }),
    z.object({ op: z.literal("settle"), currency: Identifier }),
    z.object({
      op: z.literal("take"),
      currency: Identifier,
      amount: UnsignedAmount,
      to: Identifier.optional(),
    }),
    z.object({ op: z.literal("lock"), owner: Identifier, steps: z.array(StepSchema) }),
    z.object({
      op: z.literal("expectDelta"),
      currency: Identifier,
      amount: SignedAmount,
      participant: Identifier.optional(),
    }),
    z.object({ op: z.literal("fail"), message: z.string() }),
  ]),
);

// =============================================================================
// Scenario
// =============================================================================

export const ScenarioSchema = z.object({
  name: Identifier,
  description: z.string().default(""),
  currencies: z
    .array(z.object({ id: Identifier, decimals: z.number().int().min(0).max(18).optional() }))
    .min(1),
  balances: z
    .array(z.object({ holder: Identifier, currency: Identifier, amount: UnsignedAmount }))
    .default([]),
  sessions: z
    .array(
      z.object({
        owner: Identifier,
        steps: z.array(StepSchema),
        /** Error code the session must fail with; omitted → must commit. */
        expectError: z.string().optional(),
      }),
    )
    .min(1),
  expect: z
    .object({
      locksLength: z.number().int().min(0).optional(),
      parents: z.array(z.number().int().min(0)).optional(),
      depths: z.array(z.number().int().min(1)).optional(),
    })
    .default({}),
});

export type Scenario = z.infer<typeof ScenarioSchema>;

/**
 * Validate raw JSON as a scenario.
 *
 * @throws {z.ZodError} if the document does not match the format
 */
export function parseScenario(raw: unknown): Scenario {
  return ScenarioSchema.parse(raw);
}
