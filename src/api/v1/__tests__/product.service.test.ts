import { beforeEach, describe, expect, it, vi } from "vitest";
import { ProductService } from "../service/product.service";
import { ConflictError, ConstraintError, NotFoundError } from "../utils/AppError";
import type { CreateProductRequest } from "../validators/product.validation";
import { countRows, resetDb, seedCompany, seedSupplier } from "./helpers/seed";

vi.mock("../drizzle/db", async () => {
    const { createTestDb } = await import("./helpers/testDb");
    return createTestDb();
});

const request = (overrides: Partial<CreateProductRequest> = {}): CreateProductRequest => ({
    name: "Widget A",
    sku: "WID-001",
    price: "19.99",
    supplierId: 1,
    lowStockThreshold: 20,
    warehouseQuantities: [
        { warehouseId: 1, quantity: 50 },
        { warehouseId: 2, quantity: 0 },
    ],
    ...overrides,
});

describe("ProductService.createProductWithInventory", () => {
    beforeEach(async () => {
        await resetDb();
        await seedCompany("Acme Distribution", ["Main Warehouse", "Overflow"]);
        await seedSupplier("Supplier Corp", "orders@supplier.test");
    });

    it("creates one inventory row per requested warehouse", async () => {
        const productId = await ProductService.createProductWithInventory(request());

        expect(productId).toBe(1);
        expect(await ProductService.getProductWithInventory(productId)).toEqual({
            id: 1,
            name: "Widget A",
            sku: "WID-001",
            price: "19.99",
            low_stock_threshold: 20,
            supplier_id: 1,
            inventory: [
                { id: 1, warehouse_id: 1, quantity: 50 },
                { id: 2, warehouse_id: 2, quantity: 0 },
            ],
        });
    });

    it("leaves nothing behind when one warehouse does not exist", async () => {
        await expect(ProductService.createProductWithInventory(request({
            warehouseQuantities: [
                { warehouseId: 1, quantity: 50 },
                { warehouseId: 999, quantity: 5 },
            ],
        }))).rejects.toBeInstanceOf(ConstraintError);

        expect(await countRows()).toEqual({ products: 0, inventory: 0 });
    });

    it("leaves nothing behind when the supplier does not exist", async () => {
        await expect(ProductService.createProductWithInventory(request({ supplierId: 42 })))
            .rejects.toBeInstanceOf(ConstraintError);

        expect(await countRows()).toEqual({ products: 0, inventory: 0 });
    });

    it("rejects a second product with the same SKU", async () => {
        await ProductService.createProductWithInventory(request());

        await expect(ProductService.createProductWithInventory(request({ name: "Widget B" })))
            .rejects.toThrow(new ConflictError("SKU must be unique"));
        expect(await countRows()).toEqual({ products: 1, inventory: 2 });
    });

    it("lets only one of two concurrent creations with the same SKU succeed", async () => {
        const results = await Promise.allSettled([
            ProductService.createProductWithInventory(request()),
            ProductService.createProductWithInventory(request({ name: "Widget B" })),
        ]);

        const fulfilled = results.filter((result) => result.status === "fulfilled");
        const rejected = results.filter((result): result is PromiseRejectedResult => result.status === "rejected");
        expect(fulfilled).toHaveLength(1);
        expect(rejected).toHaveLength(1);
        expect(rejected[0].reason).toBeInstanceOf(ConflictError);
        expect(await countRows()).toEqual({ products: 1, inventory: 2 });
    });

    it("accepts a product without supplier or threshold", async () => {
        const productId = await ProductService.createProductWithInventory(request({
            supplierId: null,
            lowStockThreshold: null,
            warehouseQuantities: [{ warehouseId: 2, quantity: 7 }],
        }));

        const product = await ProductService.getProductWithInventory(productId);
        expect(product.supplier_id).toBeNull();
        expect(product.low_stock_threshold).toBeNull();
        expect(product.inventory).toEqual([{ id: 1, warehouse_id: 2, quantity: 7 }]);
    });
});

describe("ProductService.getProductWithInventory", () => {
    beforeEach(async () => {
        await resetDb();
    });

    it("throws when the product does not exist", async () => {
        await expect(ProductService.getProductWithInventory(42))
            .rejects.toThrow(new NotFoundError("Product with id 42 not found"));
    });
});
