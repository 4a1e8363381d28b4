/**
 * Mock Supabase Client for Jest Testing
 *
 * In-memory stand-in for the PostgREST query builder. Supports the subset
 * the wardrobe source uses: select, eq, in, overlaps, order, limit.
 */

type Row = Record<string, unknown>;

// Mock data store
const mockDataStore = new Map<string, Row[]>();
const mockErrors = new Map<string, string>();

// Mock Supabase response structure
export interface MockSupabaseResponse {
  data: Row[] | null;
  error: { message: string } | null;
  count: number | null;
  status: number;
  statusText: string;
}

type FilterOperator = 'eq' | 'in' | 'overlaps';

interface MockFilter {
  field: string;
  operator: FilterOperator;
  value: unknown;
}

/**
 * Mock Supabase Query Builder
 */
class MockQueryBuilder implements PromiseLike<MockSupabaseResponse> {
  private table: string;
  private filters: MockFilter[] = [];
  private limitValue?: number;
  private orderByField?: string;
  private orderDirection: 'asc' | 'desc' = 'asc';

  constructor(table: string) {
    this.table = table;
  }

  select(_fields: string = '*') {
    return this;
  }

  eq(field: string, value: unknown) {
    this.filters.push({ field, value, operator: 'eq' });
    return this;
  }

  in(field: string, values: unknown[]) {
    this.filters.push({ field, value: values, operator: 'in' });
    return this;
  }

  overlaps(field: string, values: unknown[]) {
    this.filters.push({ field, value: values, operator: 'overlaps' });
    return this;
  }

  limit(count: number) {
    this.limitValue = count;
    return this;
  }

  order(field: string, options?: { ascending?: boolean }) {
    this.orderByField = field;
    this.orderDirection = options?.ascending === false ? 'desc' : 'asc';
    return this;
  }

  private matchesFilters(record: Row): boolean {
    return this.filters.every(filter => {
      const recordValue = record[filter.field];

      switch (filter.operator) {
        case 'eq':
          return recordValue === filter.value;
        case 'in':
          return Array.isArray(filter.value) && filter.value.includes(recordValue);
        case 'overlaps': {
          const wanted = filter.value;
          return Array.isArray(recordValue) && Array.isArray(wanted) &&
            recordValue.some(v => wanted.includes(v));
        }
        default:
          return true;
      }
    });
  }

  private execute(): MockSupabaseResponse {
    const errorMessage = mockErrors.get(this.table);
    if (errorMessage) {
      return { data: null, error: { message: errorMessage }, count: null, status: 500, statusText: 'Error' };
    }

    const tableData = mockDataStore.get(this.table) || [];
    let results = tableData.filter(record => this.matchesFilters(record));

    // Apply ordering
    const orderField = this.orderByField;
    if (orderField) {
      results = [...results].sort((a, b) => {
        const aVal = String(a[orderField] ?? '');
        const bVal = String(b[orderField] ?? '');
        const comparison = aVal > bVal ? 1 : aVal < bVal ? -1 : 0;
        return this.orderDirection === 'asc' ? comparison : -comparison;
      });
    }

    // Apply limit
    if (this.limitValue !== undefined) {
      results = results.slice(0, this.limitValue);
    }

    return {
      data: results,
      error: null,
      count: results.length,
      status: 200,
      statusText: 'OK'
    };
  }

  then<TResult1 = MockSupabaseResponse, TResult2 = never>(
    onfulfilled?: ((value: MockSupabaseResponse) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return Promise.resolve(this.execute()).then(onfulfilled, onrejected);
  }
}

/**
 * Mock Supabase Client
 */
export const createMockSupabaseClient = () => ({
  from: (table: string) => new MockQueryBuilder(table)
});

/**
 * Utility to clear mock data between tests
 */
export const clearMockData = () => {
  mockDataStore.clear();
  mockErrors.clear();
};

/**
 * Utility to seed mock data for tests
 */
export const seedMockData = (table: string, data: Row[]) => {
  mockDataStore.set(table, data);
};

/**
 * Make every query against a table fail with the given message
 */
export const setMockError = (table: string, message: string) => {
  mockErrors.set(table, message);
};
