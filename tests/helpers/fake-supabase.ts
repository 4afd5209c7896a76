/**
 * In-memory stand-in for the subset of the Supabase query builder the
 * coordinator uses. Installed in tests with:
 *
 *   vi.mock("@supabase/supabase-js", async () => {
 *     const { FakeSupabase } = await import("../helpers/fake-supabase.js");
 *     return { createClient: () => new FakeSupabase() };
 *   });
 *
 * Each query executes synchronously when awaited, so a conditional update
 * is atomic the same way a single-row UPDATE is in Postgres.
 */

type Row = Record<string, unknown>;

export interface FakeDbError {
  message: string;
  code?: string;
}

export interface FakeResult {
  data: unknown;
  error: FakeDbError | null;
}

const UNIQUE_KEYS: Record<string, string[][]> = {
  service_records: [["name"]],
  trading_cycles: [["cycle_id"]],
  phase_executions: [["cycle_id", "phase"], ["cycle_id", "sequence"]],
  schedule_config: [["id"]],
  config: [["key"]],
  cycle_lock: [["id"]],
  _migrations: [["name"]],
};

function clone<T>(value: T): T {
  return structuredClone(value);
}

function compare(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a) < String(b) ? -1 : 1;
}

export class FakeSupabase {
  readonly tables = new Map<string, Row[]>();
  readonly rpcCalls: Array<{ fn: string; args: Record<string, unknown> }> = [];
  rpcError: string | null = null;
  private failures = new Map<string, string>();
  private nextId = 1;

  from(table: string): FakeQuery {
    return new FakeQuery(this, table);
  }

  async rpc(fn: string, args: Record<string, unknown> = {}): Promise<FakeResult> {
    this.rpcCalls.push({ fn, args });
    if (this.rpcError) return { data: null, error: { message: this.rpcError } };
    return { data: null, error: null };
  }

  rows(table: string): Row[] {
    let rows = this.tables.get(table);
    if (!rows) {
      rows = [];
      this.tables.set(table, rows);
    }
    return rows;
  }

  /** Every query on `table` fails until `clearFailures()`. */
  failOn(table: string, message = "connection refused"): void {
    this.failures.set(table, message);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  failureFor(table: string): string | undefined {
    return this.failures.get(table);
  }

  assignId(): number {
    return this.nextId++;
  }
}

export function fakeOf(client: unknown): FakeSupabase {
  if (client instanceof FakeSupabase) return client;
  throw new Error("Supabase client is not the in-memory fake; is vi.mock installed?");
}

type Operation = "select" | "insert" | "update" | "upsert";

export class FakeQuery implements PromiseLike<FakeResult> {
  private op: Operation = "select";
  private payload: Row[] = [];
  private patch: Row = {};
  private filters: Array<(row: Row) => boolean> = [];
  private ordering: { column: string; ascending: boolean } | null = null;
  private limitCount: number | null = null;
  private columns = "*";
  private returning = false;
  private mode: "many" | "single" | "maybeSingle" = "many";
  private conflictKeys: string[] | null = null;
  private ignoreDuplicates = false;

  constructor(
    private readonly db: FakeSupabase,
    private readonly table: string
  ) {}

  select(columns = "*"): this {
    if (this.op !== "select") this.returning = true;
    this.columns = columns;
    return this;
  }

  insert(values: Row | Row[]): this {
    this.op = "insert";
    this.payload = Array.isArray(values) ? values : [values];
    return this;
  }

  upsert(values: Row | Row[], options: { onConflict?: string; ignoreDuplicates?: boolean } = {}): this {
    this.op = "upsert";
    this.payload = Array.isArray(values) ? values : [values];
    this.conflictKeys = options.onConflict ? options.onConflict.split(",").map((c) => c.trim()) : null;
    this.ignoreDuplicates = options.ignoreDuplicates ?? false;
    return this;
  }

  update(values: Row): this {
    this.op = "update";
    this.patch = values;
    return this;
  }

  eq(column: string, value: unknown): this {
    this.filters.push((row) => row[column] === value);
    return this;
  }

  is(column: string, value: null): this {
    this.filters.push((row) => (row[column] ?? null) === value);
    return this;
  }

  in(column: string, values: readonly unknown[]): this {
    this.filters.push((row) => values.includes(row[column]));
    return this;
  }

  order(column: string, options: { ascending?: boolean } = {}): this {
    this.ordering = { column, ascending: options.ascending ?? true };
    return this;
  }

  limit(count: number): this {
    this.limitCount = count;
    return this;
  }

  single(): this {
    this.mode = "single";
    return this;
  }

  maybeSingle(): this {
    this.mode = "maybeSingle";
    return this;
  }

  then<TResult1 = FakeResult, TResult2 = never>(
    onfulfilled?: ((value: FakeResult) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return Promise.resolve(this.execute()).then(onfulfilled, onrejected);
  }

  private matches(row: Row): boolean {
    return this.filters.every((f) => f(row));
  }

  private violation(rows: Row[], candidate: Row, except?: Row): FakeDbError | null {
    for (const keys of UNIQUE_KEYS[this.table] ?? []) {
      const clash = rows.find(
        (r) => r !== except && keys.every((k) => r[k] !== undefined && r[k] === candidate[k])
      );
      if (clash) {
        return {
          code: "23505",
          message: `duplicate key value violates unique constraint "${this.table}_${keys.join("_")}_key"`,
        };
      }
    }
    return null;
  }

  private insertRow(rows: Row[], value: Row): { ok: true; row: Row } | { ok: false; error: FakeDbError } {
    const row: Row = { id: this.db.assignId(), ...clone(value) };
    const clash = this.violation(rows, row);
    if (clash) return { ok: false, error: clash };
    rows.push(row);
    return { ok: true, row };
  }

  private execute(): FakeResult {
    const failure = this.db.failureFor(this.table);
    if (failure) return { data: null, error: { message: failure } };

    const rows = this.db.rows(this.table);
    let affected: Row[] = [];

    switch (this.op) {
      case "select":
        affected = rows.filter((r) => this.matches(r));
        break;

      case "insert":
        for (const value of this.payload) {
          const result = this.insertRow(rows, value);
          if (!result.ok) return { data: null, error: result.error };
          affected.push(result.row);
        }
        break;

      case "upsert":
        for (const value of this.payload) {
          const keys = this.conflictKeys ?? UNIQUE_KEYS[this.table]?.[0] ?? ["id"];
          const existing = rows.find((r) => keys.every((k) => r[k] === value[k]));
          if (existing) {
            if (this.ignoreDuplicates) continue;
            Object.assign(existing, clone(value));
            affected.push(existing);
          } else {
            const result = this.insertRow(rows, value);
            if (!result.ok) return { data: null, error: result.error };
            affected.push(result.row);
          }
        }
        break;

      case "update":
        affected = rows.filter((r) => this.matches(r));
        for (const row of affected) {
          const next = { ...row, ...clone(this.patch) };
          const clash = this.violation(rows, next, row);
          if (clash) return { data: null, error: clash };
        }
        for (const row of affected) Object.assign(row, clone(this.patch));
        break;
    }

    if (this.ordering) {
      const { column, ascending } = this.ordering;
      affected = [...affected].sort((a, b) => {
        const c = compare(a[column], b[column]);
        return ascending ? c : -c;
      });
    }
    if (this.limitCount !== null) affected = affected.slice(0, this.limitCount);

    if (this.op !== "select" && !this.returning) return { data: null, error: null };

    const projected = affected.map((r) => this.project(r));

    if (this.mode === "single") {
      if (projected.length !== 1) {
        return {
          data: null,
          error: { code: "PGRST116", message: "JSON object requested, multiple (or no) rows returned" },
        };
      }
      return { data: projected[0], error: null };
    }

    if (this.mode === "maybeSingle") {
      if (projected.length > 1) {
        return { data: null, error: { code: "PGRST116", message: "multiple rows returned" } };
      }
      return { data: projected[0] ?? null, error: null };
    }

    return { data: projected, error: null };
  }

  private project(row: Row): Row {
    if (this.columns.trim() === "*") return clone(row);
    const out: Row = {};
    for (const col of this.columns.split(",").map((c) => c.trim())) {
      out[col] = clone(row[col]);
    }
    return out;
  }
}
