/**
 * The slice of a pg Pool the ledger needs. Tests supply an in-process fake.
 */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}

