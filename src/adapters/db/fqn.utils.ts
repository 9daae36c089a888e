const IDENTIFIER = /^[a-z_][a-z0-9_]*$/i;

/**
 * Splits a `schema.table` name into quoted-safe parts. Only plain identifiers
 * are accepted because table names are interpolated into SQL text.
 */
export function normalizeTableFqn(fqn: string): { schema: string; table: string; identifier: string } {
  const parts = fqn.trim().split('.');
  if (parts.length !== 2) {
    throw new Error(`Invalid table FQN: ${fqn}. Expected schema.table.`);
  }
  const [schema, table] = parts;
  if (!IDENTIFIER.test(schema) || !IDENTIFIER.test(table)) {
    throw new Error(`Invalid table FQN: ${fqn}. Schema and table must be plain identifiers.`);
  }
  return { schema, table, identifier: `${schema}.${table}` };
}

export function assertColumnName(column: string): string {
  if (!IDENTIFIER.test(column)) {
    throw new Error(`Invalid column name: ${column}`);
  }
  return column;
}
