import snowflake from "snowflake-sdk";
import type { Connection } from "snowflake-sdk";

import type { WarehouseConnection } from "../config/loader.js";
import { WarehouseError } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { Bind, WarehouseClient, WarehouseRow } from "./warehouse.js";

const DEFAULT_ROLE = "ACCOUNTADMIN";

class SnowflakeClient implements WarehouseClient {
  constructor(private readonly connection: Connection) {}

  query(sql: string, binds: readonly Bind[] = []): Promise<WarehouseRow[]> {
    return new Promise((resolve, reject) => {
      this.connection.execute({
        sqlText: sql,
        binds: [...binds],
        complete: (error, _statement, rows) => {
          if (error) {
            reject(new WarehouseError(`Query failed: ${error.message}`, error));
            return;
          }
          const result: WarehouseRow[] = rows ?? [];
          resolve(result);
        }
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.connection.destroy((error) => {
        if (error) {
          logger.warn("Error closing warehouse connection", { error: error.message });
        } else {
          logger.debug("Warehouse connection closed");
        }
        resolve();
      });
    });
  }
}

export function connectSnowflake(options: WarehouseConnection): Promise<WarehouseClient> {
  logger.info("Connecting to warehouse", { database: options.database, warehouse: options.warehouse });
  const connection = snowflake.createConnection({
    account: options.account,
    username: options.user,
    password: options.password,
    database: options.database,
    warehouse: options.warehouse,
    role: options.role ?? DEFAULT_ROLE
  });

  return new Promise((resolve, reject) => {
    connection.connect((error) => {
      if (error) {
        reject(new WarehouseError(`Unable to connect to warehouse: ${error.message}`, error));
        return;
      }
      resolve(new SnowflakeClient(connection));
    });
  });
}
