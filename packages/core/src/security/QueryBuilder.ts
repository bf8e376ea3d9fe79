/**
 * Parameterized Query Builder
 *
 * Builds SELECT / COUNT / DELETE / UPSERT statements over validated storage
 * objects. The object name is the only text substituted into SQL; every
 * literal value, including LIMIT and OFFSET, travels as a bound parameter.
 */

import { assertColumnName, storageObjectName, type StorageObject } from './identifiers.js'

/**
 * Values better-sqlite3 can bind
 */
export type SqlValue = string | number | bigint | Buffer | null

export type ComparisonOperator = '=' | '!=' | '<' | '<=' | '>' | '>=' | 'LIKE' | 'NOT LIKE'

/**
 * A single `column op ?` condition; conditions are joined with AND
 */
export interface Condition {
  column: string
  op: ComparisonOperator
  value: SqlValue
  /** Escape character for LIKE / NOT LIKE patterns */
  escape?: '\\'
}

export interface OrderBy {
  column: string
  direction?: 'ASC' | 'DESC'
}

export interface BuiltQuery {
  sql: string
  params: SqlValue[]
}

export interface SelectQueryOptions {
  table: StorageObject
  /** Columns to return; omitted means `*` */
  columns?: string[]
  where?: Condition[]
  orderBy?: OrderBy[]
  limit?: number
  offset?: number
}

const OPERATORS: ReadonlySet<ComparisonOperator> = new Set([
  '=',
  '!=',
  '<',
  '<=',
  '>',
  '>=',
  'LIKE',
  'NOT LIKE',
])

function buildWhere(where: Condition[] | undefined): BuiltQuery {
  if (!where || where.length === 0) {
    return { sql: '', params: [] }
  }

  const clauses: string[] = []
  const params: SqlValue[] = []
  for (const condition of where) {
    if (!OPERATORS.has(condition.op)) {
      throw new Error(`Unsupported operator: ${String(condition.op)}`)
    }
    const column = assertColumnName(condition.column)
    const escape = condition.escape !== undefined ? ` ESCAPE '\\'` : ''
    clauses.push(`${column} ${condition.op} ?${escape}`)
    params.push(condition.value)
  }

  return { sql: ` WHERE ${clauses.join(' AND ')}`, params }
}

function assertCount(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got ${value}`)
  }
  return value
}

/**
 * Build a parameterized SELECT
 *
 * @example
 * ```typescript
 * buildSelectQuery({
 *   table: titlesTable(source),
 *   columns: ['external_id', 'title'],
 *   where: [{ column: 'title_normalized', op: '=', value: 'bebop' }],
 *   orderBy: [{ column: 'title_type' }],
 *   limit: 10,
 * })
 * // { sql: 'SELECT external_id, title FROM anidb_titles WHERE title_normalized = ? ORDER BY title_type ASC LIMIT ?',
 * //   params: ['bebop', 10] }
 * ```
 */
export function buildSelectQuery(options: SelectQueryOptions): BuiltQuery {
  const table = storageObjectName(options.table)
  const columns =
    options.columns && options.columns.length > 0
      ? options.columns.map((c) => assertColumnName(c)).join(', ')
      : '*'

  const where = buildWhere(options.where)
  let sql = `SELECT ${columns} FROM ${table}${where.sql}`
  const params = [...where.params]

  if (options.orderBy && options.orderBy.length > 0) {
    const order = options.orderBy
      .map((o) => `${assertColumnName(o.column)} ${o.direction === 'DESC' ? 'DESC' : 'ASC'}`)
      .join(', ')
    sql += ` ORDER BY ${order}`
  }

  if (options.limit !== undefined) {
    sql += ' LIMIT ?'
    params.push(assertCount('limit', options.limit))
    if (options.offset !== undefined) {
      sql += ' OFFSET ?'
      params.push(assertCount('offset', options.offset))
    }
  }

  return { sql, params }
}

/**
 * Build `SELECT COUNT(*) AS count`
 */
export function buildCountQuery(options: { table: StorageObject; where?: Condition[] }): BuiltQuery {
  const where = buildWhere(options.where)
  return {
    sql: `SELECT COUNT(*) AS count FROM ${storageObjectName(options.table)}${where.sql}`,
    params: where.params,
  }
}

/**
 * Build a DELETE; without conditions every row is removed
 */
export function buildDeleteQuery(options: { table: StorageObject; where?: Condition[] }): BuiltQuery {
  const where = buildWhere(options.where)
  return {
    sql: `DELETE FROM ${storageObjectName(options.table)}${where.sql}`,
    params: where.params,
  }
}

/**
 * Build `INSERT ... ON CONFLICT(conflict) DO UPDATE` for the given values.
 * With `onConflict: 'ignore'` an existing row is left untouched.
 */
export function buildUpsertQuery(options: {
  table: StorageObject
  values: Record<string, SqlValue>
  conflict: string
  onConflict?: 'update' | 'ignore'
}): BuiltQuery {
  const entries = Object.entries(options.values)
  if (entries.length === 0) {
    throw new Error('Upsert needs at least one column')
  }
  const conflict = assertColumnName(options.conflict)
  const columns = entries.map(([column]) => assertColumnName(column))
  const updates = columns.filter((c) => c !== conflict).map((c) => `${c} = excluded.${c}`)
  const action =
    options.onConflict !== 'ignore' && updates.length > 0
      ? `DO UPDATE SET ${updates.join(', ')}`
      : 'DO NOTHING'

  return {
    sql: `INSERT INTO ${storageObjectName(options.table)} (${columns.join(', ')}) VALUES (${columns
      .map(() => '?')
      .join(', ')}) ON CONFLICT(${conflict}) ${action}`,
    params: entries.map(([, value]) => value),
  }
}

/**
 * Escape `%`, `_` and `\` so user text is matched literally inside LIKE
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`)
}
