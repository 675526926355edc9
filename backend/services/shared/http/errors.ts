// backend/services/shared/http/errors.ts
import type { Request, Response } from "express";
import type { ZodError } from "zod";
import { clean, zodIssues, type Problem } from "../contracts/common";

const TITLES: Record<number, string> = {
  400: "Bad Request",
  404: "Not Found",
  409: "Conflict",
  500: "Internal Server Error",
};

export function titleFor(status: number): string {
  return (
    TITLES[status] ??
    (status >= 500 ? "Internal Server Error" : "Request Error")
  );
}

/** Send an RFC 7807 body with the problem+json content type. */
export function sendProblem(
  req: Request,
  res: Response,
  p: Omit<Problem, "type" | "title" | "instance"> & { title?: string }
) {
  return res
    .status(p.status)
    .type("application/problem+json")
    .json(
      clean({
        type: "about:blank",
        title: p.title ?? titleFor(p.status),
        status: p.status,
        code: p.code,
        detail: p.detail,
        errors: p.errors,
        instance: req.requestId,
      })
    );
}

export const notFound = (
  req: Request,
  res: Response,
  detail = "Resource not found"
) => sendProblem(req, res, { status: 404, code: "NOT_FOUND", detail });

export const zValidationError = (
  req: Request,
  res: Response,
  error: ZodError
) =>
  sendProblem(req, res, {
    status: 400,
    code: "VALIDATION_ERROR",
    detail: "Validation failed",
    errors: zodIssues(error),
  });
