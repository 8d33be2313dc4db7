import type { CommandInvoker } from "./commands.js";
import type { RpcResult, StructColumn, StructData, StructFilter } from "./types.js";

export interface AggregationOptions {
  filter?: StructFilter[];
  /** Column to sort by, prefixed with `^` for descending order. */
  sort?: string;
}

/**
 * Structured data of the struct plugin, available as `wiki.structs`.
 */
export class Structs {
  constructor(private readonly wiki: CommandInvoker) {}

  /**
   * Struct data of `page`: every schema, or only `schema` when given, as of
   * `timestamp` (0 for the current revision).
   */
  getData(page: string, schema = "", timestamp = 0): Promise<RpcResult<StructData>> {
    return this.wiki.invoke("plugin.struct.getData", [page, schema, timestamp]);
  }

  saveData(page: string, data: StructData, summary = "", minor = false): Promise<RpcResult<boolean>> {
    return this.wiki.invoke("plugin.struct.saveData", [page, data, summary, minor]);
  }

  /** Column definitions of `name`, or of every schema. */
  getSchema(name?: string): Promise<RpcResult<Record<string, StructColumn[]>>> {
    return name === undefined
      ? this.wiki.invoke("plugin.struct.getSchema", [])
      : this.wiki.invoke("plugin.struct.getSchema", [name]);
  }

  getAggregationData(
    schemas: string[],
    columns: string[],
    options: AggregationOptions = {},
  ): Promise<RpcResult<Record<string, string>[]>> {
    return this.wiki.invoke("plugin.struct.getAggregationData", [
      schemas,
      columns,
      options.filter ?? [],
      options.sort ?? "",
    ]);
  }
}
