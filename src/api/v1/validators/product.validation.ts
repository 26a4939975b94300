import Joi from "joi";
import { ValidationError } from "../utils/AppError";

const PG_INT_MAX = 2147483647;

// numeric(12,2): up to 10 integer digits and 2 fractional digits
const DECIMAL_AMOUNT = /^\d{1,10}(\.\d{1,2})?$/;
const PRICE_REASON = "must be a non-negative decimal amount with at most 2 fractional digits";

export interface WarehouseQuantity {
  warehouseId: number;
  quantity: number;
}

export interface CreateProductRequest {
  name: string;
  sku: string;
  price: string;
  supplierId: number | null;
  lowStockThreshold: number | null;
  warehouseQuantities: WarehouseQuantity[];
}

interface CreateProductBody {
  name: string;
  sku: string;
  price: string;
  supplier_id?: number | null;
  low_stock_threshold?: number | null;
  warehouse_quantities: { warehouse_id: number; quantity: number }[];
}

/**
 * Normalises a price to its exact decimal string. Numbers go through their
 * shortest round-trip representation, so 19.99 stays "19.99".
 */
export const toDecimalAmount = (value: unknown): string | null => {
  let text: string;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    text = String(value);
  } else if (typeof value === "string") {
    text = value.trim();
  } else {
    return null;
  }
  return DECIMAL_AMOUNT.test(text) ? text : null;
};

const id = Joi.number().integer().positive().max(PG_INT_MAX).strict();

export const createProductSchema = Joi.object<CreateProductBody>({
  name: Joi.string().trim().min(1).max(255).required(),
  sku: Joi.string().trim().min(1).max(64).required(),
  price: Joi.any()
    .required()
    .custom((value: unknown, helpers) => {
      const amount = toDecimalAmount(value);
      return amount === null ? helpers.error("any.invalid") : amount;
    })
    .messages({ "any.invalid": PRICE_REASON }),
  warehouse_quantities: Joi.array()
    .items(
      Joi.object({
        warehouse_id: id.required(),
        quantity: Joi.number().integer().min(0).max(PG_INT_MAX).strict().required(),
      })
    )
    .min(1)
    .unique("warehouse_id")
    .required(),
  supplier_id: id.allow(null),
  low_stock_threshold: Joi.number().integer().min(0).max(PG_INT_MAX).strict().allow(null),
})
  .required()
  .options({ abortEarly: true, stripUnknown: true, errors: { wrap: { label: false } } });

export const formatFieldPath = (path: (string | number)[]): string => {
  if (path.length === 0) return "body";
  return path
    .map((segment, index) => (typeof segment === "number" ? `[${segment}]` : index === 0 ? segment : `.${segment}`))
    .join("");
};

const reasonFor = (detail: Joi.ValidationErrorItem): string => {
  if (detail.type === "any.invalid" && detail.path[0] === "price") return PRICE_REASON;
  if (detail.type === "array.unique") return "warehouse_id must not repeat within warehouse_quantities";
  const label = detail.context?.label;
  // joi prefixes the message with the label; the field is reported separately
  return label && detail.message.startsWith(`${label} `) ? detail.message.slice(label.length + 1) : detail.message;
};

/**
 * Pure structural validation of a create-product payload. The whole request
 * is rejected on the first invalid field; nothing is partially accepted.
 */
export const validateCreateRequest = (raw: unknown): CreateProductRequest => {
  const { error, value } = createProductSchema.validate(raw);
  if (error) {
    const [detail] = error.details;
    throw new ValidationError(formatFieldPath(detail.path), reasonFor(detail));
  }

  return {
    name: value.name,
    sku: value.sku,
    price: value.price,
    supplierId: value.supplier_id ?? null,
    lowStockThreshold: value.low_stock_threshold ?? null,
    warehouseQuantities: value.warehouse_quantities.map((entry) => ({
      warehouseId: entry.warehouse_id,
      quantity: entry.quantity,
    })),
  };
};

/** Parses a positive integer path or query value such as a company id or window length. */
export const parsePositiveInt = (raw: unknown, field: string, max: number = PG_INT_MAX): number => {
  const { error, value } = Joi.number().integer().min(1).max(max).required().validate(raw);
  if (error) {
    throw new ValidationError(field, `must be an integer between 1 and ${max}`);
  }
  return value;
};
