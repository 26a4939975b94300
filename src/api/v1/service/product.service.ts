import { asc, eq } from "drizzle-orm";
import { db } from "../drizzle/db";
import { inventoryTable } from "../drizzle/schema/inventory";
import { productTable } from "../drizzle/schema/product";
import { ConflictError, NotFoundError } from "../utils/AppError";
import logger from "../utils/logger";
import { translateStoreError } from "../utils/storeError";
import type { CreateProductRequest } from "../validators/product.validation";

export interface ProductWithInventory {
    id: number;
    name: string;
    sku: string;
    price: string;
    low_stock_threshold: number | null;
    supplier_id: number | null;
    inventory: {
        id: number;
        warehouse_id: number;
        quantity: number;
    }[];
}

export class ProductService {
    /**
     * Creates a product and its stock in every requested warehouse as one unit.
     *
     * The SKU lookup only produces an early, friendlier conflict; the unique
     * constraint checked at insert time is what actually guarantees uniqueness.
     * Everything inside the transaction commits once or not at all.
     */
    static async createProductWithInventory(request: CreateProductRequest): Promise<number> {
        const existingProduct = await db
            .select({ id: productTable.id })
            .from(productTable)
            .where(eq(productTable.sku, request.sku))
            .limit(1);
        if (existingProduct.length > 0) {
            throw new ConflictError("SKU must be unique");
        }

        let productId: number;
        try {
            productId = await db.transaction(async (tx) => {
                const [insertedProduct] = await tx.insert(productTable).values({
                    name: request.name,
                    sku: request.sku,
                    price: request.price,
                    lowStockThreshold: request.lowStockThreshold,
                    supplierId: request.supplierId,
                }).returning({ id: productTable.id });

                await tx.insert(inventoryTable).values(request.warehouseQuantities.map(({ warehouseId, quantity }) => ({
                    productId: insertedProduct.id,
                    warehouseId,
                    quantity,
                })));

                return insertedProduct.id;
            });
        } catch (err) {
            throw translateStoreError(err);
        }

        logger.info("Product created", {
            productId,
            sku: request.sku,
            warehouses: request.warehouseQuantities.length,
        });
        return productId;
    }

    static async getProductWithInventory(productId: number): Promise<ProductWithInventory> {
        const [product] = await db
            .select({
                id: productTable.id,
                name: productTable.name,
                sku: productTable.sku,
                price: productTable.price,
                low_stock_threshold: productTable.lowStockThreshold,
                supplier_id: productTable.supplierId,
            })
            .from(productTable)
            .where(eq(productTable.id, productId))
            .limit(1);

        if (!product) {
            throw new NotFoundError(`Product with id ${productId} not found`);
        }

        const inventory = await db
            .select({
                id: inventoryTable.id,
                warehouse_id: inventoryTable.warehouseId,
                quantity: inventoryTable.quantity,
            })
            .from(inventoryTable)
            .where(eq(inventoryTable.productId, productId))
            .orderBy(asc(inventoryTable.warehouseId));

        return { ...product, inventory };
    }
}
