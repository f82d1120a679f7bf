/**
 * Wire shapes returned by the entitlement service
 *
 * @module service/schemas
 */

import { Type, type Static } from "@sinclair/typebox";

export const ConsumerSchema = Type.Object({
  uuid: Type.String(),
  name: Type.Optional(Type.String()),
  autoheal: Type.Optional(Type.Union([Type.Boolean(), Type.Null()])),
});

export const EntitlementSchema = Type.Object({
  id: Type.String(),
  quantity: Type.Optional(Type.Number()),
  startDate: Type.String(),
  endDate: Type.String(),
  pool: Type.Optional(
    Type.Object({
      productId: Type.Optional(Type.String()),
      productName: Type.Optional(Type.String()),
    }),
  ),
});

export const EntitlementListSchema = Type.Array(EntitlementSchema);

export const ComplianceSchema = Type.Object({
  status: Type.String(),
  compliant: Type.Boolean(),
  date: Type.Optional(Type.String()),
  compliantUntil: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export type EntitlementPayload = Static<typeof EntitlementSchema>;
