/**
 * Validation Middleware
 *
 * Zod-based request validation for body, params, and query.
 * Failures are forwarded as ValidationError.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError, type ZodType, type ZodTypeDef } from "zod";
import { sectionIdSchema } from "@shared/schema";
import { ValidationError } from "../utils/errorHandler";

/** A schema whose parsed output is `T`, whatever input it accepts. */
type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface ValidationSchemas<P, B, Q> {
  body?: Schema<B>;
  params?: Schema<P>;
  query?: Schema<Q>;
}

/**
 * The returned handler carries the parsed types, so handlers registered
 * after it on the same route read typed `req.params`, `req.body` and
 * `req.query`.
 *
 * @example
 * app.patch("/api/sessions/:id",
 *   validate({ params: commonSchemas.id, body: apiSchemas.renameSession }),
 *   async (req, res) => { ... }
 * );
 */
export function validate<P = Request["params"], B = unknown, Q = Request["query"]>(
  schemas: ValidationSchemas<P, B, Q>,
): RequestHandler<P, unknown, B, Q> {
  return (req: Request<P, unknown, B, Q>, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map(e => {
          const path = e.path.join(".");
          return path ? `${path}: ${e.message}` : e.message;
        }).join(", ");
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

export const commonSchemas = {
  id: z.object({
    id: z.string().min(1, "ID is required"),
  }),
  exportFormat: z.object({
    format: z.enum(["xlsx", "pdf"]),
  }),
  sectionId: z.object({
    sectionId: sectionIdSchema,
  }),
};
