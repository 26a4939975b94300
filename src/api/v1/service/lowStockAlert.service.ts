import { and, asc, eq, gt, lt, sql } from "drizzle-orm";
import { SALES_WINDOW_DAYS } from "../config/env";
import { db } from "../drizzle/db";
import { inventoryTable } from "../drizzle/schema/inventory";
import { productTable } from "../drizzle/schema/product";
import { supplierTable } from "../drizzle/schema/supplier";
import { warehouseTable } from "../drizzle/schema/warehouse";
import { type AlertRow, assembleAlerts, FALLBACK_THRESHOLD, type LowStockAlertReport } from "../utils/alertAssembler";
import { SalesVelocityService, toVelocity } from "./salesVelocity.service";

export interface LowStockQueryOptions {
    windowDays?: number;
    now?: Date;
}

export class LowStockAlertService {
    /**
     * Understocked inventory rows of a company's warehouses that also sold
     * something in the trailing window. Rows below threshold without recent
     * sales are not actionable and are left out.
     */
    static async findLowStockAlerts(companyId: number, options: LowStockQueryOptions = {}): Promise<AlertRow[]> {
        const windowDays = options.windowDays ?? SALES_WINDOW_DAYS;
        const sales = SalesVelocityService.companySalesSubquery(companyId, windowDays, options.now ?? new Date());

        const rows = await db
            .select({
                productId: productTable.id,
                productName: productTable.name,
                sku: productTable.sku,
                warehouseId: warehouseTable.id,
                warehouseName: warehouseTable.name,
                currentStock: inventoryTable.quantity,
                threshold: productTable.lowStockThreshold,
                supplier: {
                    id: supplierTable.id,
                    name: supplierTable.name,
                    contactEmail: supplierTable.contactEmail,
                },
                unitsSold: sales.unitsSold,
            })
            .from(inventoryTable)
            .innerJoin(productTable, eq(inventoryTable.productId, productTable.id))
            .innerJoin(warehouseTable, eq(inventoryTable.warehouseId, warehouseTable.id))
            .innerJoin(supplierTable, eq(productTable.supplierId, supplierTable.id))
            .leftJoin(sales, eq(sales.inventoryId, inventoryTable.id))
            .where(and(
                eq(warehouseTable.companyId, companyId),
                lt(inventoryTable.quantity, sql`coalesce(${productTable.lowStockThreshold}, ${FALLBACK_THRESHOLD})`),
                gt(sales.unitsSold, 0)
            ))
            .orderBy(asc(productTable.id), asc(warehouseTable.id));

        const alertRows: AlertRow[] = [];
        for (const { unitsSold, ...row } of rows) {
            // the SQL filter already drops rows without sales; this narrows the left join
            if (unitsSold !== null && unitsSold > 0) {
                alertRows.push({ ...row, velocity: toVelocity(unitsSold, windowDays) });
            }
        }
        return alertRows;
    }

    static async getLowStockAlerts(companyId: number, options: LowStockQueryOptions = {}): Promise<LowStockAlertReport> {
        const rows = await LowStockAlertService.findLowStockAlerts(companyId, options);
        return assembleAlerts(rows);
    }
}
