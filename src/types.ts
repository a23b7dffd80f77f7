// src/types.ts
import { z } from 'zod';

const optionalString = z.string().optional().catch(undefined);

const metaSchema = z
  .object({
    href: optionalString,
    type: optionalString,
  })
  .passthrough();

/** Reference to another ERP entity; `name` etc. are present only when expanded. */
export const erpRefSchema = z
  .object({
    meta: metaSchema.optional().catch(undefined),
    name: optionalString,
    phone: optionalString,
    email: optionalString,
  })
  .passthrough();

const attributeSchema = z
  .object({
    name: z.string().catch(''),
    value: z.unknown(),
  })
  .passthrough();

const shipmentAddressFullSchema = z
  .object({
    recipient: optionalString,
    address: optionalString,
    addInfo: optionalString,
    comment: optionalString,
    city: optionalString,
    region: z.union([z.string(), erpRefSchema]).optional().catch(undefined),
    deliveryService: z.union([z.string(), erpRefSchema]).optional().catch(undefined),
    shipmentMethod: z.union([z.string(), erpRefSchema]).optional().catch(undefined),
  })
  .passthrough();

export const erpPositionSchema = z
  .object({
    quantity: z.number().optional().catch(undefined),
    price: z.number().optional().catch(undefined),
    assortment: erpRefSchema.optional().catch(undefined),
  })
  .passthrough();

/**
 * Customer order as returned by the ERP. Each field degrades on its own:
 * a malformed `agent` does not invalidate the rest of the order.
 * `sum` stays unknown so the normalizer can report a wrongly typed amount.
 */
export const erpOrderSchema = z
  .object({
    id: optionalString,
    name: optionalString,
    moment: optionalString,
    sum: z.unknown(),
    description: optionalString,
    phone: optionalString,
    email: optionalString,
    shipmentAddress: optionalString,
    meta: metaSchema.optional().catch(undefined),
    state: erpRefSchema.optional().catch(undefined),
    agent: erpRefSchema.optional().catch(undefined),
    attributes: z.array(attributeSchema).optional().catch(undefined),
    shipmentAddressFull: shipmentAddressFullSchema.optional().catch(undefined),
    positions: z
      .object({
        meta: metaSchema.optional().catch(undefined),
        rows: z.array(erpPositionSchema).optional().catch(undefined),
      })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

export type ErpRef = z.infer<typeof erpRefSchema>;
export type ErpAttribute = z.infer<typeof attributeSchema>;
export type ErpPosition = z.infer<typeof erpPositionSchema>;
export type ErpOrder = z.infer<typeof erpOrderSchema>;

/** Parses a raw ERP payload; null when it is not an order-shaped object at all. */
export function parseErpOrder(raw: unknown): ErpOrder | null {
  const res = erpOrderSchema.safeParse(raw);
  return res.success ? res.data : null;
}

export const erpListSchema = z
  .object({
    rows: z.array(z.unknown()).catch([]),
  })
  .passthrough();

export const webhookBodySchema = z.object({
  events: z
    .array(
      z
        .object({
          meta: z
            .object({
              type: optionalString,
              href: optionalString,
            })
            .passthrough()
            .optional()
            .catch(undefined),
        })
        .passthrough()
        .catch({})
    )
    .catch([]),
});

// --- cache wire format ---

export const orderSummarySchema = z.object({
  id: z.string(),
  display_name: z.string(),
  status: z.string(),
  moment: z.string().nullable(),
  moment_display: z.string(),
  moment_ms: z.number().nullable(),
  total: z.number().nullable(),
  recipient: z.string().nullable(),
  phone: z.string().nullable(),
  email: z.string().nullable(),
  delivery_method: z.string().nullable(),
  city: z.string().nullable(),
  address: z.string().nullable(),
  comment: z.string().nullable(),
  link: z.string().nullable(),
});

export type OrderSummary = z.infer<typeof orderSummarySchema>;

const salesDaySchema = z.object({
  day: z.string(), // YYYY-MM-DD (UTC)
  count: z.number(),
  sum: z.number(),
});

export const snapshotStatsSchema = z.object({
  total_orders: z.number(),
  new_orders: z.number(),
  courier_orders: z.number(),
  sales: z.object({
    window_days: z.number(),
    count: z.number(),
    sum: z.number(),
    days: z.array(salesDaySchema),
  }),
});

export type SnapshotStats = z.infer<typeof snapshotStatsSchema>;

export const snapshotSchema = z.object({
  updated_at: z.string(),
  ttl_seconds: z.number(),
  stats: snapshotStatsSchema,
  orders: z.array(orderSummarySchema),
});

export type Snapshot = z.infer<typeof snapshotSchema>;

/** What the dashboard and the SSE stream receive. */
export type EventPayload = Snapshot & {
  stale: boolean;
  server_time: string;
  server_time_ms: number;
};
