import { z } from 'zod';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from './logger';

// Query parameter schemas. Names are matched exactly, surrounding spaces included.
export const historyQuerySchema = z.object({
  owner: z
    .string({
      required_error: "Missing 'owner' query parameter",
      invalid_type_error: "'owner' must be a single value",
    })
    .min(1, "Missing 'owner' query parameter"),
});

// Administrative input: "<DisplayName>,<RemoteID>"
export const accountSpecSchema = z
  .string()
  .transform((value) => value.split(','))
  .refine((parts) => parts.length === 2, {
    message: "Invalid format. Use 'DisplayName,ProfileID'",
  })
  .transform(([displayName, remoteId]) => ({
    displayName: displayName.trim(),
    remoteId: remoteId.trim(),
  }))
  .refine((account) => account.displayName.length > 0 && account.remoteId.length > 0, {
    message: 'Display name and profile id must both be non-empty',
  });

export interface FieldIssue {
  field: string;
  message: string;
}

export function formatIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

type ValidatedQueryHandler<T> = (req: Request, res: Response, query: T) => Promise<void>;

// Validation middleware factory; the handler receives the parsed query
export function validateQuery<T extends z.ZodTypeAny>(
  schema: T,
  handler: ValidatedQueryHandler<z.infer<T>>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      const errors = formatIssues(result.error);

      logger.warn('Validation', 'Query validation failed', {
        path: req.path,
        errors,
      });

      res.status(400).json({
        error: errors[0]?.message ?? 'Validation failed',
        code: 'VALIDATION_ERROR',
      });
      return;
    }

    handler(req, res, result.data).catch(next);
  };
}

export type HistoryQuery = z.infer<typeof historyQuerySchema>;
export type AccountSpec = z.infer<typeof accountSpecSchema>;
