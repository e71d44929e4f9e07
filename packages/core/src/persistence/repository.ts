/**
 * Persistence collaborator for resource services.
 *
 * @packageDocumentation
 */

import { InvalidArgumentError } from "../contracts/errors.js"
import type { SortDirection } from "../contracts/types.js"
import type { SqliteDatabase, SqlValue } from "./database.js"

export type ConditionOperator = "=" | "!=" | ">=" | "<=" | ">" | "<"

export interface Condition {
  column: string
  operator: ConditionOperator
  value: SqlValue
}

export interface QueryOptions {
  where?: Condition[]
  /** Case-insensitive substring match OR'ed across the columns */
  search?: { columns: string[]; term: string }
  orderBy?: { column: string; direction: SortDirection }
  limit?: number
  offset?: number
}

export interface Repository<T> {
  find(id: number): Promise<T | undefined>
  findOne(where: Condition[]): Promise<T | undefined>
  findMany(options?: QueryOptions): Promise<T[]>
  count(options?: QueryOptions): Promise<number>
  exists(id: number): Promise<boolean>
  create(values: Record<string, SqlValue>): Promise<T>
  update(id: number, values: Record<string, SqlValue>): Promise<T | undefined>
  delete(id: number): Promise<boolean>
}

export interface TableMapping<T, Row> {
  table: string
  primaryKey: string
  /** Every column the repository may read, filter, sort or write */
  columns: readonly string[]
  /** Maintain created_at / updated_at as epoch milliseconds */
  timestamps: boolean
  fromRow(row: Row): T
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`)
}

/**
 * SqliteRepository - table-backed Repository over better-sqlite3
 *
 * Column names are never taken from callers verbatim: each one is checked
 * against the mapping before it reaches SQL. Values are always bound.
 */
export class SqliteRepository<T, Row> implements Repository<T> {
  private db: SqliteDatabase
  private mapping: TableMapping<T, Row>

  constructor(database: SqliteDatabase, mapping: TableMapping<T, Row>) {
    this.db = database
    this.mapping = mapping
  }

  private assertColumn(column: string): string {
    if (column !== this.mapping.primaryKey && !this.mapping.columns.includes(column)) {
      throw new InvalidArgumentError(
        `unknown column ${column} for ${this.mapping.table}`,
        column,
      )
    }
    return column
  }

  private buildWhere(
    where: Condition[] = [],
    search?: QueryOptions["search"],
  ): { clause: string; params: SqlValue[] } {
    const parts: string[] = []
    const params: SqlValue[] = []

    for (const condition of where) {
      parts.push(`${this.assertColumn(condition.column)} ${condition.operator} ?`)
      params.push(condition.value)
    }

    if (search && search.term !== "" && search.columns.length > 0) {
      const pattern = `%${escapeLike(search.term)}%`
      const likes = search.columns.map(
        (column) => `${this.assertColumn(column)} LIKE ? ESCAPE '\\'`,
      )
      parts.push(`(${likes.join(" OR ")})`)
      params.push(...search.columns.map(() => pattern))
    }

    return {
      clause: parts.length > 0 ? ` WHERE ${parts.join(" AND ")}` : "",
      params,
    }
  }

  async find(id: number): Promise<T | undefined> {
    return this.findOne([
      { column: this.mapping.primaryKey, operator: "=", value: id },
    ])
  }

  async findOne(where: Condition[]): Promise<T | undefined> {
    const { clause, params } = this.buildWhere(where)
    const row = this.db
      .prepare<SqlValue[], Row>(`SELECT * FROM ${this.mapping.table}${clause} LIMIT 1`)
      .get(...params)
    return row ? this.mapping.fromRow(row) : undefined
  }

  async findMany(options: QueryOptions = {}): Promise<T[]> {
    const { clause, params } = this.buildWhere(options.where, options.search)
    let sql = `SELECT * FROM ${this.mapping.table}${clause}`

    if (options.orderBy) {
      sql += ` ORDER BY ${this.assertColumn(options.orderBy.column)} ${options.orderBy.direction}`
      // Stable paging when the sort column has ties
      if (options.orderBy.column !== this.mapping.primaryKey) {
        sql += `, ${this.mapping.primaryKey} ${options.orderBy.direction}`
      }
    }
    if (options.limit !== undefined) {
      sql += " LIMIT ?"
      params.push(options.limit)
      if (options.offset !== undefined) {
        sql += " OFFSET ?"
        params.push(options.offset)
      }
    }

    return this.db
      .prepare<SqlValue[], Row>(sql)
      .all(...params)
      .map((row) => this.mapping.fromRow(row))
  }

  async count(options: QueryOptions = {}): Promise<number> {
    const { clause, params } = this.buildWhere(options.where, options.search)
    const row = this.db
      .prepare<SqlValue[], { total: number }>(
        `SELECT COUNT(*) AS total FROM ${this.mapping.table}${clause}`,
      )
      .get(...params)
    return row?.total ?? 0
  }

  async exists(id: number): Promise<boolean> {
    const row = this.db
      .prepare<[number], { found: number }>(
        `SELECT 1 AS found FROM ${this.mapping.table} WHERE ${this.mapping.primaryKey} = ?`,
      )
      .get(id)
    return row !== undefined
  }

  async create(values: Record<string, SqlValue>): Promise<T> {
    const row: Record<string, SqlValue> = { ...values }
    if (this.mapping.timestamps) {
      const now = Date.now()
      row.created_at = now
      row.updated_at = now
    }

    const columns = Object.keys(row).map((column) => this.assertColumn(column))
    const result = this.db
      .prepare<SqlValue[]>(
        `INSERT INTO ${this.mapping.table} (${columns.join(", ")}) VALUES (${columns.map(() => "?").join(", ")})`,
      )
      .run(...columns.map((column) => row[column]))

    const created = await this.find(Number(result.lastInsertRowid))
    if (!created) {
      throw new Error(`${this.mapping.table} row vanished after insert`)
    }
    return created
  }

  async update(
    id: number,
    values: Record<string, SqlValue>,
  ): Promise<T | undefined> {
    const row: Record<string, SqlValue> = { ...values }
    if (this.mapping.timestamps) {
      row.updated_at = Date.now()
    }

    const columns = Object.keys(row).map((column) => this.assertColumn(column))
    if (columns.length > 0) {
      this.db
        .prepare<SqlValue[]>(
          `UPDATE ${this.mapping.table} SET ${columns.map((column) => `${column} = ?`).join(", ")} WHERE ${this.mapping.primaryKey} = ?`,
        )
        .run(...columns.map((column) => row[column]), id)
    }
    return this.find(id)
  }

  async delete(id: number): Promise<boolean> {
    const result = this.db
      .prepare<[number]>(
        `DELETE FROM ${this.mapping.table} WHERE ${this.mapping.primaryKey} = ?`,
      )
      .run(id)
    return result.changes > 0
  }
}
