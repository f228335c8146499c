/**
 * Names of the scalars stored under a question's path.
 */
export const Scalar = {
  ENTITY_NAME: "entity_name",
  FIRST_NAME: "first_name",
  MIDDLE_NAME: "middle_name",
  LAST_NAME: "last_name",
  DATE: "date",
  ID: "id",
  NUMBER: "number",
  TEXT: "text",
  SELECTION: "selection",
  CURRENCY_CENTS: "currency_cents",
} as const

export type Scalar = (typeof Scalar)[keyof typeof Scalar]
