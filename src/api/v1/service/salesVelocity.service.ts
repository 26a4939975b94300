import { and, eq, gte, inArray, lt, lte, sql, type SQL } from "drizzle-orm";
import { SALES_WINDOW_DAYS } from "../config/env";
import { db } from "../drizzle/db";
import { inventoryTable } from "../drizzle/schema/inventory";
import { inventoryChangeTable } from "../drizzle/schema/inventoryChange";
import { warehouseTable } from "../drizzle/schema/warehouse";
import { ValidationError } from "../utils/AppError";

const DAY_MS = 24 * 60 * 60 * 1000;

// keeps each IN (...) list well below the protocol's bind parameter limit
const ID_BATCH_SIZE = 1000;

export interface SalesVelocity {
    unitsSold: number;
    windowDays: number;
    avgDailySales: number;
}

const assertWindow = (windowDays: number) => {
    if (!Number.isInteger(windowDays) || windowDays <= 0) {
        throw new ValidationError("window_days", "must be a positive integer");
    }
};

export const toVelocity = (unitsSold: number, windowDays: number): SalesVelocity => ({
    unitsSold,
    windowDays,
    avgDailySales: unitsSold / windowDays,
});

export class SalesVelocityService {
    /**
     * Units sold per inventory row in `[now - windowDays, now]`: `sale` ledger
     * rows with a negative delta, summed as a positive count.
     */
    private static unitsSoldInWindow(windowDays: number, now: Date, scope: SQL | undefined) {
        const since = new Date(now.getTime() - windowDays * DAY_MS);
        return db
            .select({
                inventoryId: inventoryChangeTable.inventoryId,
                unitsSold: sql<number>`sum(-${inventoryChangeTable.quantityDelta})`.mapWith(Number).as("units_sold"),
            })
            .from(inventoryChangeTable)
            .innerJoin(inventoryTable, eq(inventoryChangeTable.inventoryId, inventoryTable.id))
            .innerJoin(warehouseTable, eq(inventoryTable.warehouseId, warehouseTable.id))
            .where(and(
                eq(inventoryChangeTable.changeType, "sale"),
                lt(inventoryChangeTable.quantityDelta, 0),
                gte(inventoryChangeTable.occurredAt, since),
                lte(inventoryChangeTable.occurredAt, now),
                scope
            ))
            .groupBy(inventoryChangeTable.inventoryId);
    }

    /**
     * The window aggregate for every inventory row in a company's warehouses,
     * as a subquery to join against. Rows without sales have no entry.
     */
    static companySalesSubquery(companyId: number, windowDays: number = SALES_WINDOW_DAYS, now: Date = new Date()) {
        assertWindow(windowDays);
        return SalesVelocityService
            .unitsSoldInWindow(windowDays, now, eq(warehouseTable.companyId, companyId))
            .as("sales");
    }

    /**
     * Average daily units sold per inventory row over the trailing window.
     *
     * The divisor is always `windowDays`, whatever the number of days that
     * actually saw a sale. Rows without any sale in the window are left out
     * of the map rather than reported as zero.
     */
    static async computeAvgDailySales(
        inventoryIds: number[],
        windowDays: number = SALES_WINDOW_DAYS,
        now: Date = new Date()
    ): Promise<Map<number, SalesVelocity>> {
        assertWindow(windowDays);

        const velocities = new Map<number, SalesVelocity>();
        for (let start = 0; start < inventoryIds.length; start += ID_BATCH_SIZE) {
            const batch = inventoryIds.slice(start, start + ID_BATCH_SIZE);
            const rows = await SalesVelocityService.unitsSoldInWindow(
                windowDays,
                now,
                inArray(inventoryChangeTable.inventoryId, batch)
            );
            for (const { inventoryId, unitsSold } of rows) {
                velocities.set(inventoryId, toVelocity(unitsSold, windowDays));
            }
        }
        return velocities;
    }
}
