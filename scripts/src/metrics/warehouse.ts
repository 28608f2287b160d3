export type WarehouseRow = Readonly<Record<string, unknown>>;

export type Bind = string | number;

/** Minimal SQL surface the collectors and validators need. */
export interface WarehouseClient {
  query(sql: string, binds?: readonly Bind[]): Promise<WarehouseRow[]>;
  close(): Promise<void>;
}

/** Read a numeric column; drivers may hand back large numbers as strings. */
export function numberColumn(row: WarehouseRow, column: string): number | null {
  const value = row[column];
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

export function stringColumn(row: WarehouseRow, column: string): string | null {
  const value = row[column];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  return null;
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => "?").join(", ");
}
