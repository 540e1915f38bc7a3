/**
 * Schemas for request options, bulk actions and auth responses
 * Used for input validation and type generation
 */

import { z } from 'zod';

export const FILTER_OPERATORS = [
  'equals',
  'notEquals',
  'greaterThan',
  'greaterThanOrEqualsTo',
  'lessThan',
  'lessThanOrEqualsTo',
  'startsWith',
  'endsWith',
  'contains',
  'notContains',
  'empty',
  'notEmpty',
  'in',
] as const;

export const SORT_ORDERS = ['asc', 'desc'] as const;

export const EXCLUDE_OPTIONS = ['__metadata', 'totalRows'] as const;

export const BULK_METHODS = ['POST', 'PUT', 'DELETE'] as const;

const jsonScalarSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

/**
 * A single filter constraint
 * - value: scalar, or a list of scalars for the `in` operator
 */
export const FilterSchema = z.object({
  fieldName: z.string().min(1, 'Filter field name is required'),
  operator: z.enum(FILTER_OPERATORS),
  value: z.union([jsonScalarSchema, z.array(jsonScalarSchema)]),
});

export const SorterSchema = z.object({
  fieldName: z.string().min(1, 'Sorter field name is required'),
  order: z.enum(SORT_ORDERS),
});

export const JsonObjectSchema = z.record(z.string(), z.unknown());

export const ActionSchema = z.object({
  method: z.enum(BULK_METHODS),
  url: z.string().min(1, 'Action URL is required'),
  data: JsonObjectSchema.optional(),
});

/**
 * Response of the `/token` endpoint
 * Only the access token is read; the rest is passed back to the caller
 */
export const SignInResponseSchema = z
  .object({
    access_token: z.string(),
  })
  .passthrough();

/**
 * Response of `/1/user/signup` when the app signs users in on registration
 */
export const SignUpResponseSchema = z
  .object({
    token: z.string(),
  })
  .passthrough();

export type FilterOperator = (typeof FILTER_OPERATORS)[number];
export type SortOrder = (typeof SORT_ORDERS)[number];
export type ExcludeOption = (typeof EXCLUDE_OPTIONS)[number];
export type BulkMethod = (typeof BULK_METHODS)[number];
export type Filter = z.infer<typeof FilterSchema>;
export type Sorter = z.infer<typeof SorterSchema>;
export type Action = z.infer<typeof ActionSchema>;
export type JsonObject = z.infer<typeof JsonObjectSchema>;
export type SignInResponse = z.infer<typeof SignInResponseSchema>;
export type SignUpResponse = z.infer<typeof SignUpResponseSchema>;
