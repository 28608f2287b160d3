import type { Bind, WarehouseClient, WarehouseRow } from "../../src/metrics/warehouse.js";
import type { CommandExecutor, ExecResult } from "../../src/utils/exec.js";

type Responder = WarehouseRow[] | Error | ((binds: readonly Bind[]) => WarehouseRow[] | Error);

/** Answers queries from the first route whose pattern matches the SQL; unmatched queries return no rows. */
export class FakeWarehouseClient implements WarehouseClient {
  readonly queries: Array<{ sql: string; binds: readonly Bind[] }> = [];
  closed = false;

  constructor(private readonly routes: Array<[RegExp, Responder]> = []) {}

  async query(sql: string, binds: readonly Bind[] = []): Promise<WarehouseRow[]> {
    this.queries.push({ sql, binds });
    const route = this.routes.find(([pattern]) => pattern.test(sql));
    if (!route) {
      return [];
    }
    const responder = route[1];
    const response = typeof responder === "function" ? responder(binds) : responder;
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Canned results keyed by the full command line; anything else rejects. */
export class FakeExecutor {
  readonly calls: string[] = [];

  constructor(private readonly responses: Record<string, Partial<ExecResult> | Error> = {}) {}

  readonly exec: CommandExecutor = async (command, args) => {
    const key = [command, ...args].join(" ");
    this.calls.push(key);
    const response = this.responses[key];
    if (response === undefined) {
      throw new Error(`Unexpected command: ${key}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    return { stdout: "", stderr: "", exitCode: 0, timedOut: false, ...response };
  };
}
