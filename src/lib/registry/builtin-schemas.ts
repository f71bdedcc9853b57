/**
 * Built-in entity schemas
 *
 * Versioned constant table. Registered once at process start and never
 * removed; bump `version` when a field changes.
 */

import type { SchemaDef } from "../../types/data-model.js";

export const USER_SCHEMA: SchemaDef = {
  name: "user",
  version: 1,
  description: "Application users with contact details",
  fields: [
    { name: "id", type: "sequence" },
    { name: "name", type: "string", kind: "full-name" },
    { name: "email", type: "email" },
    { name: "phone", type: "phone", style: "human" },
    { name: "address", type: "address", part: "full" },
    { name: "created_at", type: "date-range", start: "-2y", end: "now" },
  ],
};

export const ORDER_SCHEMA: SchemaDef = {
  name: "order",
  version: 1,
  description: "Customer orders",
  fields: [
    { name: "id", type: "sequence" },
    { name: "user_id", type: "foreign-key-ref", target: "user", targetField: "id" },
    { name: "amount", type: "decimal-range", min: 10, max: 500, precision: 2 },
    {
      name: "status",
      type: "enum",
      values: ["pending", "completed", "cancelled", "shipped"],
    },
    { name: "order_date", type: "date-range", start: "-1y", end: "now" },
    { name: "product_name", type: "string", kind: "product-name" },
    { name: "quantity", type: "integer-range", min: 1, max: 10 },
  ],
};

export const PAYMENT_SCHEMA: SchemaDef = {
  name: "payment",
  version: 1,
  description: "Payment transactions, including failed ones",
  fields: [
    { name: "id", type: "sequence" },
    {
      name: "order_id",
      type: "foreign-key-ref",
      target: "order",
      targetField: "id",
      assumedCount: 1000,
    },
    { name: "amount", type: "decimal-range", min: 5, max: 1000, precision: 2 },
    {
      name: "payment_method",
      type: "enum",
      values: ["credit_card", "debit_card", "paypal", "bank_transfer"],
    },
    {
      name: "status",
      type: "enum",
      values: ["completed", "pending", "refunded", "failed"],
    },
    { name: "transaction_date", type: "date-range", start: "-1y", end: "now" },
    {
      name: "gateway",
      type: "enum",
      values: ["stripe", "paypal", "square", "authorize_net"],
    },
    {
      name: "failure_reason",
      type: "enum",
      values: ["insufficient_funds", "card_declined", "network_error"],
      nullable: true,
      presentWhen: { field: "status", in: ["failed"] },
    },
  ],
};

export const PRODUCT_SCHEMA: SchemaDef = {
  name: "product",
  version: 1,
  description: "Catalog products",
  fields: [
    { name: "id", type: "sequence" },
    { name: "name", type: "string", kind: "product-name" },
    { name: "description", type: "string", kind: "sentence", maxLength: 200 },
    { name: "price", type: "decimal-range", min: 10, max: 1000, precision: 2 },
    {
      name: "category",
      type: "enum",
      values: ["Electronics", "Clothing", "Books", "Home & Garden", "Sports", "Beauty"],
    },
    { name: "sku", type: "string", pattern: "???-###-???" },
    { name: "stock_quantity", type: "integer-range", min: 0, max: 100 },
    { name: "created_at", type: "date-range", start: "-1y", end: "now" },
  ],
};

export const BUILTIN_SCHEMAS: readonly SchemaDef[] = [
  USER_SCHEMA,
  ORDER_SCHEMA,
  PAYMENT_SCHEMA,
  PRODUCT_SCHEMA,
];

/**
 * Synonyms callers use for the built-in entities, beyond name and plural
 */
export const BUILTIN_ALIASES: Readonly<Record<string, string>> = {
  customer: "user",
  customers: "user",
  purchase: "order",
  purchases: "order",
  transaction: "payment",
  transactions: "payment",
  item: "product",
  items: "product",
};
