import { z } from 'zod';

export const filterOpSchema = z.enum(['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'contains']);

export const aggregateOpSchema = z.enum(['count', 'sum', 'avg', 'min', 'max']);

export const queryFilterSchema = z.object({
  column: z.string(),
  op: filterOpSchema,
  value: z.union([z.string(), z.number(), z.boolean()]),
});

export const queryPlanSchema = z.object({
  filters: z.array(queryFilterSchema).default([]),
  groupBy: z.string().optional(),
  aggregate: z
    .object({
      op: aggregateOpSchema,
      column: z.string().optional().describe('Omitted for count'),
    })
    .optional(),
  sort: z
    .object({
      column: z.string(),
      direction: z.enum(['asc', 'desc']).default('asc'),
    })
    .optional(),
  limit: z.number().int().positive().optional(),
  select: z.array(z.string()).optional(),
});

export const unanswerablePlanSchema = z.object({
  unanswerable: z.string().min(1),
});

export const plannerResponseSchema = z.union([unanswerablePlanSchema, queryPlanSchema]);

export type FilterOp = z.infer<typeof filterOpSchema>;
export type AggregateOp = z.infer<typeof aggregateOpSchema>;
export type QueryFilter = z.infer<typeof queryFilterSchema>;
export type QueryPlan = z.infer<typeof queryPlanSchema>;
export type PlannerResponse = z.infer<typeof plannerResponseSchema>;
