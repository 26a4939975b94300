import { AppError, ConflictError, ConstraintError, UnexpectedError } from "./AppError";
import logger from "./logger";

const UNIQUE_VIOLATION = "23505";
const INTEGRITY_CONSTRAINT_CLASS = "23";

interface PgErrorFields {
    code?: string;
    constraint?: string;
    detail?: string;
}

const readPgFields = (err: unknown): PgErrorFields | null => {
    let current: unknown = err;
    // drivers may wrap the DatabaseError, so walk the cause chain
    for (let depth = 0; depth < 5 && typeof current === "object" && current !== null; depth++) {
        const code: unknown = Reflect.get(current, "code");
        if (typeof code === "string" && /^[0-9A-Z]{5}$/.test(code)) {
            const constraint: unknown = Reflect.get(current, "constraint");
            const detail: unknown = Reflect.get(current, "detail");
            return {
                code,
                constraint: typeof constraint === "string" ? constraint : undefined,
                detail: typeof detail === "string" ? detail : undefined,
            };
        }
        current = Reflect.get(current, "cause");
    }
    return null;
};

/**
 * Maps a failure raised by the store onto the service error taxonomy.
 * Errors that are already an AppError are returned untouched.
 */
export const translateStoreError = (err: unknown): AppError => {
    if (err instanceof AppError) {
        return err;
    }

    const pg = readPgFields(err);
    if (pg?.code === UNIQUE_VIOLATION) {
        if (pg.constraint === "product_sku_unique") {
            return new ConflictError("SKU must be unique");
        }
        return new ConflictError("Duplicate entry violates a uniqueness constraint");
    }
    if (pg?.code?.startsWith(INTEGRITY_CONSTRAINT_CLASS)) {
        logger.warn("Store rejected write on integrity constraint", { code: pg.code, constraint: pg.constraint, detail: pg.detail });
        return new ConstraintError("Database constraint violated, possibly an invalid warehouse_id or supplier_id");
    }

    logger.error("Unexpected store failure", { error: err });
    return new UnexpectedError("Internal Server Error", { cause: err });
};
