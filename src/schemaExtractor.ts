import type { ForeignKeyRef, ParsedColumn, ParsedRoutine, ParsedTable } from './model.js';
import { parseParameters } from './routineParser.js';

/**
 * Database client interface - satisfied by PGlite and by the pg adapter in database.ts
 */
export interface DbClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

export interface ExtractedSchema {
  readonly tables: readonly ParsedTable[];
  readonly routines: readonly ParsedRoutine[];
}

/**
 * Read tables, keys, comments and plpgsql/sql routines of one schema from a
 * live database, in the shapes the DDL parsers produce.
 */
export async function extractSchema(client: DbClient, schemaName = 'public'): Promise<ExtractedSchema> {
  const tables = await extractTables(client, schemaName);
  const routines = await extractRoutines(client, schemaName);
  return { tables, routines };
}

async function extractTables(client: DbClient, schemaName: string): Promise<ParsedTable[]> {
  const tablesResult = await client.query<{ table_name: string; comment: string | null }>(`
    SELECT t.table_name, obj_description(c.oid, 'pg_class') AS comment
    FROM information_schema.tables t
    JOIN pg_namespace n ON n.nspname = t.table_schema
    JOIN pg_class c ON c.relnamespace = n.oid AND c.relname = t.table_name
    WHERE t.table_schema = $1
      AND t.table_type = 'BASE TABLE'
    ORDER BY t.table_name
  `, [schemaName]);

  const foreignKeys = await extractForeignKeys(client, schemaName);
  const tables: ParsedTable[] = [];

  for (const { table_name, comment } of tablesResult.rows) {
    const primaryKey = await extractPrimaryKey(client, schemaName, table_name);
    const uniqueConstraints = await extractUniqueConstraints(client, schemaName, table_name);
    const singleUnique = new Set(uniqueConstraints.filter(u => u.length === 1).map(u => u[0]));

    const columns = (await extractColumns(client, schemaName, table_name)).map(column => ({
      ...column,
      isPrimaryKey: primaryKey.includes(column.name),
      isUnique: singleUnique.has(column.name),
    }));

    const table: ParsedTable = {
      schema: schemaName,
      name: table_name,
      columns,
      primaryKey,
      uniqueConstraints,
      foreignKeys: foreignKeys.get(table_name) ?? [],
      checkConstraints: await extractCheckConstraints(client, schemaName, table_name),
    };
    tables.push(comment !== null ? { ...table, comment } : table);
  }

  return tables;
}

async function extractColumns(
  client: DbClient,
  schemaName: string,
  tableName: string
): Promise<Omit<ParsedColumn, 'isPrimaryKey' | 'isUnique'>[]> {
  const result = await client.query<{
    column_name: string;
    udt_name: string;
    is_nullable: string;
    column_default: string | null;
    is_identity: string;
  }>(`
    SELECT
      column_name,
      udt_name,
      is_nullable,
      column_default,
      is_identity
    FROM information_schema.columns
    WHERE table_schema = $1 AND table_name = $2
    ORDER BY ordinal_position
  `, [schemaName, tableName]);

  return result.rows.map(row => ({
    name: row.column_name,
    type: row.udt_name,
    isNullable: row.is_nullable === 'YES',
    hasDefault: row.column_default !== null || row.is_identity === 'YES',
  }));
}

async function extractPrimaryKey(client: DbClient, schemaName: string, tableName: string): Promise<string[]> {
  const result = await client.query<{ column_name: string }>(`
    SELECT a.attname as column_name
    FROM pg_index i
    JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY(i.indkey)
    JOIN pg_class c ON c.oid = i.indrelid
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE i.indisprimary
      AND n.nspname = $1
      AND c.relname = $2
    ORDER BY array_position(i.indkey, a.attnum)
  `, [schemaName, tableName]);

  return result.rows.map(r => r.column_name);
}

async function extractUniqueConstraints(client: DbClient, schemaName: string, tableName: string): Promise<string[][]> {
  const result = await client.query<{ columns: string | string[] }>(`
    SELECT
      ARRAY(
        SELECT a.attname::text
        FROM unnest(c.conkey) WITH ORDINALITY AS cols(col, ord)
        JOIN pg_attribute a ON a.attrelid = c.conrelid AND a.attnum = cols.col
        ORDER BY cols.ord
      ) AS columns
    FROM pg_constraint c
    JOIN pg_class cl ON cl.oid = c.conrelid
    JOIN pg_namespace n ON n.oid = cl.relnamespace
    WHERE c.contype = 'u'
      AND n.nspname = $1
      AND cl.relname = $2
    ORDER BY c.conname
  `, [schemaName, tableName]);

  return result.rows.map(row => parsePostgresArray(row.columns));
}

async function extractCheckConstraints(client: DbClient, schemaName: string, tableName: string): Promise<string[]> {
  const result = await client.query<{ definition: string }>(`
    SELECT pg_get_constraintdef(c.oid) AS definition
    FROM pg_constraint c
    JOIN pg_class cl ON cl.oid = c.conrelid
    JOIN pg_namespace n ON n.oid = cl.relnamespace
    WHERE c.contype = 'c'
      AND n.nspname = $1
      AND cl.relname = $2
    ORDER BY c.conname
  `, [schemaName, tableName]);

  // pg_get_constraintdef renders "CHECK ((expr))"
  return result.rows.map(row => row.definition.replace(/^CHECK\s*\(([\s\S]*)\)$/, '$1'));
}

/**
 * Parse a PostgreSQL array string like "{a,b,c}" into a JavaScript array.
 * Handles the case where the driver returns arrays as strings.
 */
function parsePostgresArray(value: string | string[]): string[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (value.startsWith('{') && value.endsWith('}')) {
    const inner = value.slice(1, -1);
    if (inner === '') return [];
    return inner.split(',').map(item => item.replace(/^"(.*)"$/, '$1'));
  }
  return [value];
}

async function extractForeignKeys(client: DbClient, schemaName: string): Promise<Map<string, ForeignKeyRef[]>> {
  const result = await client.query<{
    from_table: string;
    from_columns: string | string[];
    to_schema: string;
    to_table: string;
    to_columns: string | string[];
  }>(`
    SELECT
      cl.relname AS from_table,
      ARRAY(
        SELECT a.attname::text
        FROM unnest(c.conkey) WITH ORDINALITY AS cols(col, ord)
        JOIN pg_attribute a ON a.attrelid = c.conrelid AND a.attnum = cols.col
        ORDER BY cols.ord
      ) AS from_columns,
      n2.nspname AS to_schema,
      cl2.relname AS to_table,
      ARRAY(
        SELECT a.attname::text
        FROM unnest(c.confkey) WITH ORDINALITY AS cols(col, ord)
        JOIN pg_attribute a ON a.attrelid = c.confrelid AND a.attnum = cols.col
        ORDER BY cols.ord
      ) AS to_columns
    FROM pg_constraint c
    JOIN pg_class cl ON cl.oid = c.conrelid
    JOIN pg_class cl2 ON cl2.oid = c.confrelid
    JOIN pg_namespace n ON n.oid = cl.relnamespace
    JOIN pg_namespace n2 ON n2.oid = cl2.relnamespace
    WHERE c.contype = 'f'
      AND n.nspname = $1
    ORDER BY c.conname
  `, [schemaName]);

  const byTable = new Map<string, ForeignKeyRef[]>();
  for (const row of result.rows) {
    const list = byTable.get(row.from_table) ?? [];
    list.push({
      columns: parsePostgresArray(row.from_columns),
      referencedSchema: row.to_schema,
      referencedTable: row.to_table,
      referencedColumns: parsePostgresArray(row.to_columns),
    });
    byTable.set(row.from_table, list);
  }
  return byTable;
}

async function extractRoutines(client: DbClient, schemaName: string): Promise<ParsedRoutine[]> {
  const result = await client.query<{
    name: string;
    kind: string;
    arguments: string;
    returns: string | null;
    language: string;
    body: string;
  }>(`
    SELECT
      p.proname AS name,
      p.prokind::text AS kind,
      pg_get_function_arguments(p.oid) AS arguments,
      pg_get_function_result(p.oid) AS returns,
      l.lanname AS language,
      p.prosrc AS body
    FROM pg_proc p
    JOIN pg_namespace n ON n.oid = p.pronamespace
    JOIN pg_language l ON l.oid = p.prolang
    WHERE n.nspname = $1
      AND p.prokind IN ('f', 'p')
      AND l.lanname IN ('plpgsql', 'sql')
    ORDER BY p.proname
  `, [schemaName]);

  return result.rows.map(row => {
    const routine: ParsedRoutine = {
      schema: schemaName,
      name: row.name,
      kind: row.kind === 'p' ? 'procedure' : 'function',
      parameters: parseParameters(row.arguments),
      language: row.language,
      body: row.body,
    };
    return row.returns !== null ? { ...routine, returns: row.returns } : routine;
  });
}
