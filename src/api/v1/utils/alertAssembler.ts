import type { SalesVelocity } from "../service/salesVelocity.service";
import logger from "./logger";

// Used only when a product has no stored threshold
export const FALLBACK_THRESHOLD = 1;

export interface AlertRow {
    productId: number;
    productName: string;
    sku: string;
    warehouseId: number;
    warehouseName: string;
    currentStock: number | null;
    threshold: number | null;
    supplier: {
        id: number;
        name: string;
        contactEmail: string | null;
    };
    velocity: SalesVelocity | null;
}

export interface Alert {
    product_id: number;
    product_name: string;
    sku: string;
    warehouse_id: number;
    warehouse_name: string;
    current_stock: number;
    threshold: number;
    days_until_stockout: number | null;
    supplier: {
        id: number;
        name: string;
        contact_email: string | null;
    };
}

export interface LowStockAlertReport {
    alerts: Alert[];
    total_alerts: number;
}

/**
 * ceil(stock / (unitsSold / windowDays)), evaluated as an integer ratio so a
 * velocity like 3/30 does not pick up float error.
 */
export const daysUntilStockout = (currentStock: number, velocity: SalesVelocity | null): number | null => {
    if (!velocity || velocity.avgDailySales <= 0 || velocity.unitsSold <= 0) {
        return null;
    }
    return Math.ceil((currentStock * velocity.windowDays) / velocity.unitsSold);
};

export const assembleAlert = (row: AlertRow): Alert => {
    const currentStock = row.currentStock ?? 0;
    let threshold = row.threshold;
    if (threshold === null) {
        threshold = FALLBACK_THRESHOLD;
        logger.warn("Low-stock alert built with fallback threshold", {
            flag: "threshold_fallback",
            productId: row.productId,
            warehouseId: row.warehouseId,
            sku: row.sku,
        });
    }

    return {
        product_id: row.productId,
        product_name: row.productName,
        sku: row.sku,
        warehouse_id: row.warehouseId,
        warehouse_name: row.warehouseName,
        current_stock: currentStock,
        threshold,
        days_until_stockout: daysUntilStockout(currentStock, row.velocity),
        supplier: {
            id: row.supplier.id,
            name: row.supplier.name,
            contact_email: row.supplier.contactEmail,
        },
    };
};

export const assembleAlerts = (rows: AlertRow[]): LowStockAlertReport => {
    const alerts = rows.map(assembleAlert);
    return { alerts, total_alerts: alerts.length };
};
