/**
 * Query string encoding for Backand request options
 *
 * Option order is kept: each option renders one `key=value` segment in the
 * position it was given.
 */

import {
  ActionSchema,
  FilterSchema,
  SorterSchema,
  type Action,
  type ExcludeOption,
  type Filter,
  type FilterOperator,
  type JsonObject,
  type Sorter,
  type SortOrder,
} from '../schemas';

export type RequestOption =
  | { type: 'pageSize'; value: number }
  | { type: 'pageNumber'; value: number }
  | { type: 'sort'; value: Sorter[] }
  | { type: 'filter'; value: Filter[] }
  | { type: 'exclude'; value: ExcludeOption[] }
  | { type: 'deep'; value: boolean }
  | { type: 'relatedObjects'; value: boolean }
  | { type: 'returnObject'; value: boolean }
  | { type: 'search'; value: string };

/**
 * Build a validated filter constraint
 *
 * @example
 * ```typescript
 * filter('age', 'greaterThan', 21);
 * filter('status', 'in', ['active', 'pending']);
 * ```
 */
export function filter(fieldName: string, operator: FilterOperator, value: Filter['value']): Filter {
  return FilterSchema.parse({ fieldName, operator, value });
}

export function sorter(fieldName: string, order: SortOrder = 'asc'): Sorter {
  return SorterSchema.parse({ fieldName, order });
}

/**
 * Build a validated bulk action
 *
 * @example
 * ```typescript
 * action('POST', '/1/objects/items', { name: 'first' });
 * action('DELETE', '/1/objects/items/7');
 * ```
 */
export function action(method: Action['method'], url: string, data?: JsonObject): Action {
  return ActionSchema.parse(data === undefined ? { method, url } : { method, url, data });
}

/**
 * Percent-encode a value for a URL query component.
 * Leaves only unreserved characters (letters, digits, `-._~`) intact.
 */
export function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

function encodeFilters(filters: Filter[]): string {
  const payload = filters.map((item) => {
    const { fieldName, operator, value } = FilterSchema.parse(item);
    return { fieldName, operator, value };
  });
  return encodeQueryComponent(JSON.stringify(payload));
}

function encodeSorters(sorters: Sorter[]): string {
  const payload = sorters.map((item) => {
    const { fieldName, order } = SorterSchema.parse(item);
    return { fieldName, order };
  });
  return encodeQueryComponent(JSON.stringify(payload));
}

// Raw enum values, not percent-encoded
function encodeExcludes(excluded: ExcludeOption[]): string {
  return Array.from(new Set(excluded)).join(',');
}

function encodeOption(option: RequestOption): string {
  switch (option.type) {
    case 'pageSize':
      return `pageSize=${option.value}`;
    case 'pageNumber':
      return `pageNumber=${option.value}`;
    case 'filter':
      return `filter=${encodeFilters(option.value)}`;
    case 'sort':
      return `sorter=${encodeSorters(option.value)}`;
    case 'exclude':
      return `exclude=${encodeExcludes(option.value)}`;
    case 'deep':
      return `deep=${option.value}`;
    case 'relatedObjects':
      return `relatedObjects=${option.value}`;
    case 'returnObject':
      return `returnObject=${option.value}`;
    case 'search':
      return `search=${option.value}`;
  }
}

/**
 * Render request options as a query string.
 * An empty list renders as a bare `?`.
 *
 * @throws ZodError when a filter or sorter fails validation
 */
export function encodeQuery(options: RequestOption[]): string {
  return `?${options.map(encodeOption).join('&')}`;
}
