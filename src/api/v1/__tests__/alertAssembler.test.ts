import { afterEach, describe, expect, it, vi } from "vitest";
import { type AlertRow, assembleAlert, assembleAlerts, daysUntilStockout } from "../utils/alertAssembler";
import logger from "../utils/logger";

const row = (overrides: Partial<AlertRow> = {}): AlertRow => ({
    productId: 123,
    productName: "Widget A",
    sku: "WID-001",
    warehouseId: 456,
    warehouseName: "Main Warehouse",
    currentStock: 5,
    threshold: 10,
    supplier: { id: 789, name: "Supplier Corp", contactEmail: "orders@supplier.test" },
    velocity: { unitsSold: 3, windowDays: 30, avgDailySales: 0.1 },
    ...overrides,
});

describe("daysUntilStockout", () => {
    it("rounds the stock cover up to whole days", () => {
        expect(daysUntilStockout(5, { unitsSold: 3, windowDays: 30, avgDailySales: 0.1 })).toBe(50);
        expect(daysUntilStockout(7, { unitsSold: 4, windowDays: 30, avgDailySales: 4 / 30 })).toBe(53);
    });

    it("is zero when nothing is left", () => {
        expect(daysUntilStockout(0, { unitsSold: 3, windowDays: 30, avgDailySales: 0.1 })).toBe(0);
    });

    it("is null without a positive velocity", () => {
        expect(daysUntilStockout(5, null)).toBeNull();
        expect(daysUntilStockout(5, { unitsSold: 0, windowDays: 30, avgDailySales: 0 })).toBeNull();
    });
});

describe("assembleAlert", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("shapes the alert record with a nested supplier", () => {
        expect(assembleAlert(row())).toEqual({
            product_id: 123,
            product_name: "Widget A",
            sku: "WID-001",
            warehouse_id: 456,
            warehouse_name: "Main Warehouse",
            current_stock: 5,
            threshold: 10,
            days_until_stockout: 50,
            supplier: { id: 789, name: "Supplier Corp", contact_email: "orders@supplier.test" },
        });
    });

    it("falls back to a threshold of 1 and flags the row", () => {
        const warn = vi.spyOn(logger, "warn");

        const alert = assembleAlert(row({ threshold: null, currentStock: 0 }));

        expect(alert.threshold).toBe(1);
        expect(alert.days_until_stockout).toBe(0);
        expect(warn).toHaveBeenCalledWith("Low-stock alert built with fallback threshold", {
            flag: "threshold_fallback",
            productId: 123,
            warehouseId: 456,
            sku: "WID-001",
        });
    });

    it("does not flag rows that carry their own threshold", () => {
        const warn = vi.spyOn(logger, "warn");
        assembleAlert(row());
        expect(warn).not.toHaveBeenCalled();
    });

    it("treats a missing stock figure as zero", () => {
        expect(assembleAlert(row({ currentStock: null })).current_stock).toBe(0);
    });

    it("leaves days_until_stockout null when there is no velocity", () => {
        expect(assembleAlert(row({ velocity: null })).days_until_stockout).toBeNull();
    });
});

describe("assembleAlerts", () => {
    it("counts the alerts it returns", () => {
        const report = assembleAlerts([row(), row({ warehouseId: 457, warehouseName: "Overflow" })]);

        expect(report.total_alerts).toBe(2);
        expect(report.alerts.map((alert) => alert.warehouse_id)).toEqual([456, 457]);
    });

    it("returns an empty report for no rows", () => {
        expect(assembleAlerts([])).toEqual({ alerts: [], total_alerts: 0 });
    });
});
