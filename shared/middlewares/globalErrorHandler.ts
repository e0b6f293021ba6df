// shared/middlewares/globalErrorHandler.ts
import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError } from "../config/errorHandler";
import { logApiError } from "../config/logger";
import { DatabaseError } from "../databases/postgres/errors";
import { isRecord } from "../utils/typeGuards";
import type { FieldError } from "../utils/responseBuilder";

export interface ErrorOutcome {
    statusCode: number;
    message: string;
    errors?: FieldError[];
}

function databaseMessage(err: DatabaseError): string {
    switch (err.category) {
        case "constraint":
            return err.code === "23503" ? "Referenced resource does not exist" : "Resource already exists";
        case "invalid_input":
            return "Invalid input";
        case "connection":
            return "Database temporarily unavailable";
        default:
            return "Something went wrong";
    }
}

// body-parser and connect-timeout raise http-errors with a status and an expose flag
function httpErrorStatus(err: unknown): number | undefined {
    if (!isRecord(err) || typeof err.status !== "number") {
        return undefined;
    }
    return err.status >= 400 && err.status < 600 ? err.status : undefined;
}

export function resolveError(err: Error): ErrorOutcome {
    if (err instanceof ZodError) {
        return {
            statusCode: 400,
            message: "Validation error",
            errors: err.errors.map((e) => ({
                field: e.path.join("."),
                message: e.message,
            })),
        };
    }

    if (err instanceof DatabaseError) {
        return { statusCode: err.statusCode, message: databaseMessage(err) };
    }

    if (err instanceof AppError) {
        return {
            statusCode: err.statusCode,
            message: err.isOperational ? err.message : "Something went wrong",
        };
    }

    const status = httpErrorStatus(err);
    if (status !== undefined) {
        const exposed = isRecord(err) && err.expose === true;
        return { statusCode: status, message: exposed ? err.message : "Something went wrong" };
    }

    return { statusCode: 500, message: "Something went wrong" };
}

export const globalErrorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) => {
    const { statusCode, message, errors } = resolveError(err);

    logApiError(err, req, res, statusCode);

    return res.status(statusCode).json({
        success: false,
        message,
        ...(errors && { errors }),
        ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    });
};
