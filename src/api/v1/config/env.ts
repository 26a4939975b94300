import "dotenv/config";

const positiveInt = (value: string | undefined, fallback: number): number => {
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const DATABASE_URL = process.env.DATABASE_URL ?? "";
export const PORT = positiveInt(process.env.PORT, 3000);
export const NODE_ENV = process.env.NODE_ENV ?? "development";
export const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";

// Trailing window (days) used to compute sales velocity for low-stock alerts
export const SALES_WINDOW_DAYS = positiveInt(process.env.SALES_WINDOW_DAYS, 30);
