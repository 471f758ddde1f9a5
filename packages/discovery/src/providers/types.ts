export type FilterOperator = '(.)' | '=>' | '=<';

export interface FilterCondition {
  column: string;
  type: FilterOperator;
  value: string | number;
  allow_null: boolean;
}

export interface FilterGroup {
  op: 'and' | 'or';
  conditions: FilterNode[];
}

export type FilterNode = FilterCondition | FilterGroup;

/** Root of a screener query; always an AND group, possibly empty. */
export type FilterExpression = FilterGroup & { op: 'and' };

export type RawRecord = Record<string, unknown>;

/**
 * Screener responses arrive either as an array of objects or as parallel
 * field/row columns. The client resolves which one once, at ingestion.
 */
export type CompanyPayload =
  | { kind: 'records'; records: RawRecord[] }
  | { kind: 'columnar'; fields: string[]; rows: unknown[][] }
  | { kind: 'unrecognized'; reason: string };

/** Company lookup and people search bodies: a record list, or a reason it is missing. */
export type RecordListPayload =
  | { kind: 'records'; records: RawRecord[] }
  | { kind: 'unrecognized'; reason: string };

export interface ScreenCompaniesRequest {
  filters: FilterExpression;
  offset: number;
  count: number;
}

export type PeopleFilterType = 'CURRENT_COMPANY' | 'CURRENT_TITLE';

export interface PeopleSearchFilter {
  filter_type: PeopleFilterType;
  type: 'in';
  value: string[];
}

export function isFilterGroup(node: FilterNode): node is FilterGroup {
  return 'op' in node;
}
