import { describe, expect, it } from "vitest";
import { ConflictError, ConstraintError, NotFoundError, UnexpectedError } from "../utils/AppError";
import { translateStoreError } from "../utils/storeError";

describe("translateStoreError", () => {
    it("maps a SKU unique violation to a conflict", () => {
        const err = translateStoreError({ code: "23505", constraint: "product_sku_unique" });

        expect(err).toBeInstanceOf(ConflictError);
        expect(err.statusCode).toBe(409);
        expect(err.message).toBe("SKU must be unique");
    });

    it("maps other unique violations to a conflict", () => {
        const err = translateStoreError({ code: "23505", constraint: "inventory_product_warehouse_unique" });

        expect(err).toBeInstanceOf(ConflictError);
        expect(err.message).toBe("Duplicate entry violates a uniqueness constraint");
    });

    it("maps a foreign key violation found on a wrapped cause to a constraint error", () => {
        const err = translateStoreError(new Error("insert failed", { cause: { code: "23503", constraint: "inventory_warehouse_id_warehouse_id_fk" } }));

        expect(err).toBeInstanceOf(ConstraintError);
        expect(err.statusCode).toBe(400);
    });

    it("maps a check violation to a constraint error", () => {
        expect(translateStoreError({ code: "23514", constraint: "inventory_quantity_non_negative" })).toBeInstanceOf(ConstraintError);
    });

    it("passes service errors through untouched", () => {
        const original = new NotFoundError("Product with id 9 not found");
        expect(translateStoreError(original)).toBe(original);
    });

    it("wraps anything else as unexpected without exposing its text", () => {
        const original = new Error("connection terminated unexpectedly");
        const err = translateStoreError(original);

        expect(err).toBeInstanceOf(UnexpectedError);
        expect(err.statusCode).toBe(500);
        expect(err.message).toBe("Internal Server Error");
        expect(err.cause).toBe(original);
    });

    it("does not treat a non-integrity SQLSTATE as a constraint failure", () => {
        expect(translateStoreError({ code: "22P02" })).toBeInstanceOf(UnexpectedError);
    });
});
